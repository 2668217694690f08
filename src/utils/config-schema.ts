import { ARTICLE_CATEGORIES, ArticleCategory } from '@/domain/article';
import {
    ArticleSource,
    BlogSource,
    CategoryRule,
    ContentConfig,
    DateFallbackPolicy,
    DigestConfiguration,
    EmailConfig,
    OpenAIConfig,
    ScanConfig,
    ScoringGroup,
    SourcesConfig,
    StorageConfig,
} from '@/domain/digest-config';

export class ConfigError extends Error {
    constructor(path: string, problem: string) {
        super(`Invalid configuration at ${path}: ${problem}`);
        this.name = 'ConfigError';
    }
}

export type ConfigNode = Record<string, unknown>;

export function isConfigNode(value: unknown): value is ConfigNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(parent: ConfigNode, key: string, path: string): ConfigNode {
    const value = parent[key];
    if (!isConfigNode(value)) {
        throw new ConfigError(`${path}.${key}`, 'expected a mapping');
    }
    return value;
}

function readString(node: ConfigNode, key: string, path: string): string {
    const value = node[key];
    if (value === undefined || value === null) {
        return '';
    }
    if (typeof value === 'string') {
        return value.trim();
    }
    if (typeof value === 'number') {
        return String(value);
    }
    throw new ConfigError(`${path}.${key}`, 'expected a string');
}

function readNumber(node: ConfigNode, key: string, path: string, min = 0): number {
    const value = node[key];
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < min) {
        throw new ConfigError(`${path}.${key}`, `expected a number >= ${min}`);
    }
    return parsed;
}

function readBoolean(node: ConfigNode, key: string, path: string, fallback: boolean): boolean {
    const value = node[key];
    if (value === undefined || value === null || value === '') {
        return fallback;
    }
    if (typeof value === 'boolean') {
        return value;
    }
    if (value === 'true' || value === 'false') {
        return value === 'true';
    }
    throw new ConfigError(`${path}.${key}`, 'expected true or false');
}

function readStringList(node: ConfigNode, key: string, path: string): string[] {
    const value = node[key];
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value) || !value.every((entry) => typeof entry === 'string')) {
        throw new ConfigError(`${path}.${key}`, 'expected a list of strings');
    }
    // Terms keep surrounding spaces: " ai" only matches at the start of a word.
    return value.filter((entry: string) => entry.trim().length > 0);
}

function readList<T>(node: ConfigNode, key: string, path: string, read: (entry: ConfigNode, at: string) => T): T[] {
    const value = node[key];
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new ConfigError(`${path}.${key}`, 'expected a list');
    }
    return value.map((entry: unknown, index: number) => {
        const at = `${path}.${key}[${index}]`;
        if (!isConfigNode(entry)) {
            throw new ConfigError(at, 'expected a mapping');
        }
        return read(entry, at);
    });
}

function readFallback(node: ConfigNode, key: string, path: string): DateFallbackPolicy {
    const value = readString(node, key, path);
    if (value !== 'include' && value !== 'exclude') {
        throw new ConfigError(`${path}.${key}`, 'expected "include" or "exclude"');
    }
    return value;
}

function isArticleCategory(value: string): value is ArticleCategory {
    return ARTICLE_CATEGORIES.some((category) => category === value);
}

function parseEmail(node: ConfigNode, path: string): EmailConfig {
    return {
        smtp_server: readString(node, 'smtp_server', path),
        smtp_port: readNumber(node, 'smtp_port', path, 1),
        username: readString(node, 'username', path),
        password: readString(node, 'password', path),
        from_address: readString(node, 'from_address', path),
        to_addresses: readStringList(node, 'to_addresses', path),
        subject_prefix: readString(node, 'subject_prefix', path),
    };
}

function parseOpenAI(node: ConfigNode, path: string): OpenAIConfig {
    return {
        enabled: readBoolean(node, 'enabled', path, false),
        api_key: readString(node, 'api_key', path),
        model: readString(node, 'model', path),
        max_tokens: readNumber(node, 'max_tokens', path, 1),
    };
}

function parseScan(node: ConfigNode, path: string): ScanConfig {
    const fallback = child(node, 'date_fallback', path);
    return {
        timezone: readString(node, 'timezone', path) || 'UTC',
        user_agent: readString(node, 'user_agent', path),
        fetch_timeout_ms: readNumber(node, 'fetch_timeout_ms', path, 1),
        article_lookback_hours: readNumber(node, 'article_lookback_hours', path),
        blog_lookback_hours: readNumber(node, 'blog_lookback_hours', path),
        vulnerability_lookback_days: readNumber(node, 'vulnerability_lookback_days', path),
        date_fallback: {
            rss: readFallback(fallback, 'rss', `${path}.date_fallback`),
            csv: readFallback(fallback, 'csv', `${path}.date_fallback`),
        },
    };
}

function parseSources(node: ConfigNode, path: string): SourcesConfig {
    const vulnerabilities = child(node, 'vulnerabilities', path);
    const vulnerabilitiesPath = `${path}.vulnerabilities`;
    return {
        articles: readList(node, 'articles', path, (entry, at): ArticleSource => ({
            name: readString(entry, 'name', at),
            url: readString(entry, 'url', at),
            enabled: readBoolean(entry, 'enabled', at, true),
            max_items: readNumber(entry, 'max_items', at, 1),
        })),
        vulnerabilities: {
            name: readString(vulnerabilities, 'name', vulnerabilitiesPath),
            url: readString(vulnerabilities, 'url', vulnerabilitiesPath),
            enabled: readBoolean(vulnerabilities, 'enabled', vulnerabilitiesPath, true),
            max_items: readNumber(vulnerabilities, 'max_items', vulnerabilitiesPath, 1),
        },
        blogs: readList(node, 'blogs', path, (entry, at): BlogSource => ({
            name: readString(entry, 'name', at),
            rss_url: readString(entry, 'rss_url', at),
            enabled: readBoolean(entry, 'enabled', at, true),
        })),
        posts_per_blog_fetch: readNumber(node, 'posts_per_blog_fetch', path, 1),
    };
}

function parseContent(node: ConfigNode, path: string): ContentConfig {
    const limits = child(node, 'section_limits', path);
    const limitsPath = `${path}.section_limits`;
    const truncation = child(node, 'truncation', path);
    const truncationPath = `${path}.truncation`;
    const combinations = node.exclude_combinations;
    if (
        combinations !== undefined &&
        combinations !== null &&
        !(Array.isArray(combinations) && combinations.every((terms) => Array.isArray(terms)))
    ) {
        throw new ConfigError(`${path}.exclude_combinations`, 'expected a list of term lists');
    }

    return {
        title: readString(node, 'title', path),
        tagline: readString(node, 'tagline', path),
        section_limits: {
            cybersecurity: readNumber(limits, 'cybersecurity', limitsPath),
            regulation: readNumber(limits, 'regulation', limitsPath),
            ai: readNumber(limits, 'ai', limitsPath),
            vulnerabilities: readNumber(limits, 'vulnerabilities', limitsPath),
            blogs: readNumber(limits, 'blogs', limitsPath),
            posts_per_blog: readNumber(limits, 'posts_per_blog', limitsPath),
        },
        truncation: {
            risk: readNumber(truncation, 'risk', truncationPath, 1),
            action: readNumber(truncation, 'action', truncationPath, 1),
        },
        priority_threshold: readNumber(node, 'priority_threshold', path),
        priority_marker: readString(node, 'priority_marker', path),
        priority_legend: readString(node, 'priority_legend', path),
        exclude_topics: readStringList(node, 'exclude_topics', path),
        exclude_combinations: Array.isArray(combinations)
            ? combinations.map((terms: unknown, index: number) =>
                  readStringList({ terms }, 'terms', `${path}.exclude_combinations[${index}]`),
              )
            : [],
        exclude_title_prefixes: readStringList(node, 'exclude_title_prefixes', path),
        focus_areas: readStringList(node, 'focus_areas', path),
    };
}

function parseCategoryRule(entry: ConfigNode, at: string): CategoryRule {
    const category = readString(entry, 'category', at);
    if (!isArticleCategory(category)) {
        throw new ConfigError(`${at}.category`, `expected one of ${ARTICLE_CATEGORIES.join(', ')}`);
    }
    return { category, keywords: readStringList(entry, 'keywords', at) };
}

function parseScoringGroup(entry: ConfigNode, at: string): ScoringGroup {
    return {
        name: readString(entry, 'name', at),
        weight: readNumber(entry, 'weight', at),
        keywords: readStringList(entry, 'keywords', at),
    };
}

function parseStorage(node: ConfigNode, path: string): StorageConfig {
    return {
        output_dir: readString(node, 'output_dir', path) || 'newsletters',
        file_prefix: readString(node, 'file_prefix', path) || 'cyberbrief',
        s3_bucket: readString(node, 's3_bucket', path),
        s3_region: readString(node, 's3_region', path),
    };
}

/** Validates a merged, env-resolved document into a typed configuration. */
export function parseConfiguration(raw: unknown): DigestConfiguration {
    if (!isConfigNode(raw)) {
        throw new ConfigError('(root)', 'expected a mapping');
    }
    const root = '(root)';
    return {
        email: parseEmail(child(raw, 'email', root), `${root}.email`),
        openai: parseOpenAI(child(raw, 'openai', root), `${root}.openai`),
        scan_config: parseScan(child(raw, 'scan_config', root), `${root}.scan_config`),
        sources: parseSources(child(raw, 'sources', root), `${root}.sources`),
        content: parseContent(child(raw, 'content', root), `${root}.content`),
        categories: readList(raw, 'categories', root, parseCategoryRule),
        scoring: readList(raw, 'scoring', root, parseScoringGroup),
        storage: parseStorage(child(raw, 'storage', root), `${root}.storage`),
    };
}
