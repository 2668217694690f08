import { ArticleCategory, BlogDigest, DigestArticle, DigestResult, VulnerabilityRecord } from '@/domain/article';
import { ContentConfig } from '@/domain/digest-config';
import { truncate } from '@/domain/article-summary';
import { formatLocalDay, formatLongDate, formatTimestamp } from '@/utils/date-format';

export interface ReportRenderer {
    render(digest: DigestResult): string;
}

interface ArticleSection {
    category: ArticleCategory;
    heading: string;
    empty: string;
}

const ARTICLE_SECTIONS: ArticleSection[] = [
    {
        category: 'cybersecurity',
        heading: 'CYBERSECURITY NEWS',
        empty: 'No major cybersecurity news found in current feeds.',
    },
    {
        category: 'regulation',
        heading: 'CYBERSECURITY REGULATION NEWS',
        empty: 'No cybersecurity regulation news found in current feeds.',
    },
    {
        category: 'ai',
        heading: 'AI NEWS',
        empty: 'No AI-related cybersecurity news found in current feeds.',
    },
];

const VULNERABILITIES_HEADING = 'NOTABLE VULNERABILITIES';
const VULNERABILITIES_EMPTY = 'No new notable vulnerabilities in recent weeks.';
const BLOGS_HEADING = 'ACTIVE SECURITY BLOGS';
const BLOGS_EMPTY = 'Unable to retrieve active security blog content at this time.';
const FOOTER_RULE = '='.repeat(40);

/**
 * Plain-text digest. Every section heading is always printed; an empty
 * section gets its own "none found" line instead of entries.
 */
export class TextReportRenderer implements ReportRenderer {
    constructor(private readonly content: ContentConfig) {}

    render(digest: DigestResult): string {
        const blocks: string[] = [this.renderHeader(digest)];

        for (const section of ARTICLE_SECTIONS) {
            const articles = digest.sections[section.category];
            blocks.push(
                this.renderSection(
                    section.heading,
                    articles.map((article) => this.renderArticle(article)),
                    section.empty,
                ),
            );
        }

        blocks.push(
            this.renderSection(
                VULNERABILITIES_HEADING,
                digest.vulnerabilities.map((vuln) => this.renderVulnerability(vuln)),
                VULNERABILITIES_EMPTY,
            ),
        );

        blocks.push(
            this.renderSection(
                BLOGS_HEADING,
                digest.blogs.map((blog, idx) => this.renderBlog(blog, idx + 1)),
                BLOGS_EMPTY,
            ),
        );

        blocks.push(this.renderFooter(digest));

        return `${blocks.join('\n\n')}\n`;
    }

    private renderHeader(digest: DigestResult): string {
        return [
            this.content.title.toUpperCase(),
            this.content.tagline,
            formatLongDate(digest.generated_at, digest.timezone),
        ].join('\n');
    }

    private renderSection(heading: string, entries: string[], empty: string): string {
        const body = entries.length > 0 ? entries.join('\n\n') : empty;
        return `${heading}\n${'='.repeat(heading.length)}\n\n${body}`;
    }

    private renderArticle(article: DigestArticle): string {
        const marker = article.priority >= this.content.priority_threshold ? ` ${this.content.priority_marker}` : '';
        return [
            `• ${article.title}${marker}`,
            `  ${article.summary}`,
            `  ${article.impact}`,
            `  Source: ${article.source} | ${article.link}`,
        ].join('\n');
    }

    private renderVulnerability(vuln: VulnerabilityRecord): string {
        const lines = [
            `• ${vuln.cve_id} - ${vuln.vendor_project} ${vuln.product}`,
            `  Added: ${formatLocalDay(vuln.date_added)}`,
            `  Risk: ${truncate(vuln.short_description, this.content.truncation.risk)}`,
        ];
        if (vuln.required_action) {
            lines.push(`  Action: ${truncate(vuln.required_action, this.content.truncation.action)}`);
        }
        return lines.join('\n');
    }

    private renderBlog(blog: BlogDigest, position: number): string {
        const lines = [`${position}. ${blog.name}`];
        for (const post of blog.recent_posts.slice(0, this.content.section_limits.posts_per_blog)) {
            lines.push(`   • ${post.title}`);
            lines.push(`     ${post.link}`);
        }
        return lines.join('\n');
    }

    private renderFooter(digest: DigestResult): string {
        const lines = [
            FOOTER_RULE,
            this.content.title,
            `Generated: ${formatTimestamp(digest.generated_at, digest.timezone)} ${digest.timezone}`,
        ];
        if (digest.sources.length > 0) {
            lines.push(`Sources: ${digest.sources.join(', ')}`);
        }
        lines.push(`${this.content.priority_marker} = ${this.content.priority_legend}`);
        return lines.join('\n');
    }
}
