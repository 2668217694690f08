import { BlogDigest } from '@/domain/article';
import { DigestConfiguration } from '@/domain/digest-config';
import { BlogFetcher } from '@/infrastructure/blog-fetcher';
import { logger } from '@/utils/logger';

export class BlogService {
    constructor(
        private config: DigestConfiguration,
        private blogFetcher: BlogFetcher,
        private clock: () => Date = () => new Date(),
    ) {}

    /** Blogs with recent posts, busiest first, capped at the blog section limit. */
    async collectBlogs(): Promise<BlogDigest[]> {
        const now = this.clock();
        const { sources, scan_config, content } = this.config;
        const digests: BlogDigest[] = [];

        for (const source of sources.blogs.filter((blog) => blog.enabled)) {
            const digest = await this.blogFetcher.fetchBlog(source, {
                lookbackHours: scan_config.blog_lookback_hours,
                postsPerBlog: sources.posts_per_blog_fetch,
                dateFallback: scan_config.date_fallback.rss,
                now,
            });
            if (digest) {
                digests.push(digest);
            }
        }

        digests.sort((a, b) => b.recent_posts.length - a.recent_posts.length);
        const active = digests.slice(0, content.section_limits.blogs);

        logger.info('Active blogs collected', { active: active.length, checked: sources.blogs.length });

        return active;
    }
}
