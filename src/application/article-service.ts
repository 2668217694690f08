import { Article } from '@/domain/article';
import { ArticleSource, DigestConfiguration } from '@/domain/digest-config';
import { categorize } from '@/domain/categorizer';
import { scorePriority } from '@/domain/priority-scorer';
import { isRelevant } from '@/domain/relevance-filter';
import { hours, isRecent, parseFeedDate } from '@/domain/recency';
import { FeedFetcher } from '@/infrastructure/feed-fetcher';
import { parseFeedXml } from '@/infrastructure/feed-parser';
import { canonicalizeUrl } from '@/utils/url-utils';
import { logger, errorMessage } from '@/utils/logger';

export class ArticleService {
    constructor(
        private config: DigestConfiguration,
        private fetcher: FeedFetcher,
        private clock: () => Date = () => new Date(),
    ) {}

    /**
     * Fetches every enabled article source one after another and returns the
     * recent, relevant articles, deduplicated and ordered by priority. Ties
     * keep the configured source order.
     */
    async collectArticles(): Promise<Article[]> {
        const now = this.clock();
        const collected: Article[] = [];

        for (const source of this.config.sources.articles.filter((s) => s.enabled)) {
            collected.push(...(await this.collectFromSource(source, now)));
        }

        const unique = this.removeDuplicates(collected);
        unique.sort((a, b) => b.priority - a.priority);

        logger.info('Articles collected', {
            total: collected.length,
            unique: unique.length,
        });

        return unique;
    }

    async collectFromSource(source: ArticleSource, now: Date): Promise<Article[]> {
        logger.info('Fetching articles', { source: source.name, url: source.url });

        try {
            const content = await this.fetcher.fetchText(source.url);
            if (!content) {
                return [];
            }

            const items = (await parseFeedXml(content, source.name)).slice(0, source.max_items);
            const { scan_config, content: contentConfig, categories, scoring } = this.config;
            const windowMs = hours(scan_config.article_lookback_hours);

            const articles: Article[] = [];
            for (const item of items) {
                const publishedAt = parseFeedDate(item.published);
                if (!isRecent(publishedAt, windowMs, now, scan_config.date_fallback.rss)) {
                    continue;
                }
                if (!isRelevant(item.title, item.description, contentConfig)) {
                    continue;
                }

                articles.push({
                    ...item,
                    published_at: publishedAt,
                    source: source.name,
                    category: categorize(item.title, item.description, categories),
                    priority: scorePriority(item.title, item.description, scoring),
                });
            }

            logger.info('Source processed', {
                source: source.name,
                items: items.length,
                relevant: articles.length,
            });

            return articles;
        } catch (error) {
            logger.error('Failed to process source', { source: source.name, error: errorMessage(error) });
            return [];
        }
    }

    private removeDuplicates(articles: Article[]): Article[] {
        const seenLinks = new Set<string>();
        const seenTitles = new Set<string>();

        return articles.filter((article) => {
            const link = canonicalizeUrl(article.link);
            const title = article.title.toLowerCase().replace(/\s+/g, ' ').trim();
            if (seenLinks.has(link) || seenTitles.has(title)) {
                return false;
            }
            seenLinks.add(link);
            seenTitles.add(title);
            return true;
        });
    }
}
