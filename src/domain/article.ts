export type ArticleCategory = 'cybersecurity' | 'regulation' | 'ai';

export const ARTICLE_CATEGORIES: readonly ArticleCategory[] = ['cybersecurity', 'regulation', 'ai'];

/**
 * One item as it comes out of an RSS or Atom document, before any filtering.
 * Every field is trimmed text; `published` is the raw timestamp string.
 */
export interface FeedItem {
    title: string;
    link: string;
    description: string;
    published: string;
}

export interface Article {
    title: string;
    link: string;
    description: string;
    published: string;
    published_at: Date | null;
    source: string;
    category: ArticleCategory;
    priority: number;
}

export interface DigestArticle extends Article {
    summary: string;
    impact: string;
}

export interface VulnerabilityRecord {
    cve_id: string;
    vendor_project: string;
    product: string;
    vulnerability_name: string;
    date_added: Date;
    short_description: string;
    required_action?: string;
    due_date?: string;
}

export interface BlogPost {
    title: string;
    link: string;
    published_at: Date | null;
}

export interface BlogDigest {
    name: string;
    rss_url: string;
    recent_posts: BlogPost[];
}

export type DigestSections = Record<ArticleCategory, DigestArticle[]>;

export interface DigestResult {
    date: string;
    timezone: string;
    generated_at: Date;
    sections: DigestSections;
    vulnerabilities: VulnerabilityRecord[];
    blogs: BlogDigest[];
    sources: string[];
}
