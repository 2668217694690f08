import { ArticleCategory } from './article';

export type DateFallbackPolicy = 'include' | 'exclude';

export interface EmailConfig {
    smtp_server: string;
    smtp_port: number;
    username: string;
    password: string;
    from_address: string;
    to_addresses: string[];
    subject_prefix: string;
}

export interface OpenAIConfig {
    enabled: boolean;
    api_key: string;
    model: string;
    max_tokens: number;
}

export interface ScanConfig {
    timezone: string;
    user_agent: string;
    fetch_timeout_ms: number;
    article_lookback_hours: number;
    blog_lookback_hours: number;
    vulnerability_lookback_days: number;
    date_fallback: {
        rss: DateFallbackPolicy;
        csv: DateFallbackPolicy;
    };
}

export interface ArticleSource {
    name: string;
    url: string;
    enabled: boolean;
    max_items: number;
}

export interface VulnerabilitySource {
    name: string;
    url: string;
    enabled: boolean;
    max_items: number;
}

export interface BlogSource {
    name: string;
    rss_url: string;
    enabled: boolean;
}

export interface SourcesConfig {
    articles: ArticleSource[];
    vulnerabilities: VulnerabilitySource;
    blogs: BlogSource[];
    posts_per_blog_fetch: number;
}

export interface SectionLimits {
    cybersecurity: number;
    regulation: number;
    ai: number;
    vulnerabilities: number;
    blogs: number;
    posts_per_blog: number;
}

export interface RelevanceRules {
    exclude_topics: string[];
    exclude_combinations: string[][];
    exclude_title_prefixes: string[];
    focus_areas: string[];
}

export interface ContentConfig extends RelevanceRules {
    title: string;
    tagline: string;
    section_limits: SectionLimits;
    truncation: {
        risk: number;
        action: number;
    };
    priority_threshold: number;
    priority_marker: string;
    priority_legend: string;
}

export interface CategoryRule {
    category: ArticleCategory;
    keywords: string[];
}

export interface ScoringGroup {
    name: string;
    weight: number;
    keywords: string[];
}

export interface StorageConfig {
    output_dir: string;
    file_prefix: string;
    s3_bucket: string;
    s3_region: string;
}

export interface DigestConfiguration {
    email: EmailConfig;
    openai: OpenAIConfig;
    scan_config: ScanConfig;
    sources: SourcesConfig;
    content: ContentConfig;
    categories: CategoryRule[];
    scoring: ScoringGroup[];
    storage: StorageConfig;
}
