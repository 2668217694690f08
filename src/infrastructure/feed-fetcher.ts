import { logger, errorMessage } from '@/utils/logger';

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

export interface FeedFetcherOptions {
    userAgent?: string;
    timeoutMs?: number;
}

export interface FeedFetcher {
    /** Resolves to the response body, or `''` when anything goes wrong. */
    fetchText(url: string): Promise<string>;
}

export class HttpFeedFetcher implements FeedFetcher {
    private readonly userAgent: string;
    private readonly timeoutMs: number;

    constructor(options: FeedFetcherOptions = {}) {
        this.userAgent = options.userAgent || DEFAULT_USER_AGENT;
        this.timeoutMs = options.timeoutMs ?? 15000;
    }

    async fetchText(url: string): Promise<string> {
        try {
            const response = await fetch(url, {
                method: 'GET',
                redirect: 'follow',
                headers: {
                    'User-Agent': this.userAgent,
                },
                signal: AbortSignal.timeout(this.timeoutMs),
            });

            if (!response.ok) {
                logger.error('Feed request returned an error status', { url, status: response.status });
                return '';
            }

            const body = await response.text();
            logger.debug('Feed fetched', { url, bytes: body.length });
            return body;
        } catch (error) {
            logger.error('Failed to fetch feed', { url, error: errorMessage(error) });
            return '';
        }
    }
}
