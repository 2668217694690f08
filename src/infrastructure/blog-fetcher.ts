import Parser from 'rss-parser';
import { BlogDigest, BlogPost } from '@/domain/article';
import { BlogSource, DateFallbackPolicy } from '@/domain/digest-config';
import { isRecent, parseFeedDate, hours } from '@/domain/recency';
import { logger, errorMessage } from '@/utils/logger';
import { DEFAULT_USER_AGENT } from './feed-fetcher';

export interface BlogFetchOptions {
    lookbackHours: number;
    postsPerBlog: number;
    dateFallback: DateFallbackPolicy;
    now?: Date;
}

export interface BlogFetcher {
    fetchBlog(source: BlogSource, options: BlogFetchOptions): Promise<BlogDigest | null>;
}

type RssItem = {
    title?: string;
    link?: string;
    pubDate?: string;
    isoDate?: string;
};

export interface RssBlogFetcherOptions {
    userAgent?: string;
    timeoutMs?: number;
}

export class RssBlogFetcher implements BlogFetcher {
    private rssParser: Parser<Record<string, unknown>, RssItem>;

    constructor(options: RssBlogFetcherOptions = {}) {
        this.rssParser = new Parser<Record<string, unknown>, RssItem>({
            timeout: options.timeoutMs ?? 15000,
            headers: {
                'User-Agent': options.userAgent || DEFAULT_USER_AGENT,
            },
        });
    }

    /**
     * Looks at the first `postsPerBlog` entries of a blog feed and keeps the
     * recent ones. Resolves to `null` when the blog has nothing recent or the
     * feed cannot be read.
     */
    async fetchBlog(source: BlogSource, options: BlogFetchOptions): Promise<BlogDigest | null> {
        logger.info('Checking blog', { name: source.name, url: source.rss_url });

        try {
            const feed = await this.rssParser.parseURL(source.rss_url);
            const now = options.now ?? new Date();
            const windowMs = hours(options.lookbackHours);

            const recentPosts: BlogPost[] = [];
            for (const item of (feed.items || []).slice(0, options.postsPerBlog)) {
                const title = item.title?.trim();
                const link = item.link?.trim();
                if (!title || !link) {
                    continue;
                }
                const publishedAt = parseFeedDate(item.isoDate || item.pubDate);
                if (!isRecent(publishedAt, windowMs, now, options.dateFallback)) {
                    continue;
                }
                recentPosts.push({ title, link, published_at: publishedAt });
            }

            logger.info('Blog checked', {
                name: source.name,
                itemCount: feed.items?.length || 0,
                recentPosts: recentPosts.length,
            });

            if (recentPosts.length === 0) {
                return null;
            }

            return {
                name: source.name,
                rss_url: source.rss_url,
                recent_posts: recentPosts,
            };
        } catch (error) {
            logger.error('Failed to fetch blog', {
                name: source.name,
                url: source.rss_url,
                error: errorMessage(error),
            });
            return null;
        }
    }
}
