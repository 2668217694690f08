import { parseStringPromise, processors } from 'xml2js';
import { parse as parseCsv } from 'csv-parse/sync';
import { FeedItem, VulnerabilityRecord } from '@/domain/article';
import { DateFallbackPolicy } from '@/domain/digest-config';
import { parseIsoDay } from '@/domain/recency';
import { logger, errorMessage } from '@/utils/logger';

type XmlNode = Record<string, unknown>;
type FieldSelector = (item: XmlNode) => string;

// Prefixes are stripped so `atom:entry` and a default-namespace `entry` look the same.
const XML_OPTIONS = {
    explicitArray: true,
    trim: true,
    tagNameProcessors: [processors.stripPrefix],
};

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
    if (value === undefined || value === null) {
        return [];
    }
    return Array.isArray(value) ? value : [value];
}

function nodeText(value: unknown): string {
    if (typeof value === 'string') {
        return value.trim();
    }
    if (isNode(value)) {
        const text = value._;
        return typeof text === 'string' ? text.trim() : '';
    }
    return '';
}

function attribute(value: unknown, name: string): string {
    const attributes = isNode(value) ? value.$ : undefined;
    if (!isNode(attributes)) {
        return '';
    }
    const attr = attributes[name];
    return typeof attr === 'string' ? attr.trim() : '';
}

function childText(name: string): FieldSelector {
    return (item) => {
        for (const child of asList(item[name])) {
            const text = nodeText(child);
            if (text) {
                return text;
            }
        }
        return '';
    };
}

// Atom links: the alternate (or rel-less) link is the article itself.
const linkHref: FieldSelector = (item) => {
    const links = asList(item.link);
    const alternate = links.find((link) => {
        const rel = attribute(link, 'rel');
        return (rel === '' || rel === 'alternate') && attribute(link, 'href');
    });
    if (alternate) {
        return attribute(alternate, 'href');
    }
    for (const link of links) {
        const href = attribute(link, 'href');
        if (href) {
            return href;
        }
    }
    return '';
};

/**
 * Candidate selectors per logical field, tried in order until one yields
 * text. RSS element names come first, Atom aliases after.
 */
const FIELD_SELECTORS: Record<keyof FeedItem, FieldSelector[]> = {
    title: [childText('title')],
    link: [childText('link'), linkHref],
    description: [childText('description'), childText('summary'), childText('content'), childText('encoded')],
    published: [childText('pubDate'), childText('published'), childText('updated'), childText('date')],
};

function selectField(item: XmlNode, field: keyof FeedItem): string {
    for (const selector of FIELD_SELECTORS[field]) {
        const value = selector(item);
        if (value) {
            return value;
        }
    }
    return '';
}

function collectElements(node: unknown, name: string, found: unknown[] = []): unknown[] {
    if (Array.isArray(node)) {
        node.forEach((child) => collectElements(child, name, found));
        return found;
    }
    if (!isNode(node)) {
        return found;
    }
    for (const [key, value] of Object.entries(node)) {
        if (key === '$' || key === '_') {
            continue;
        }
        if (key === name) {
            found.push(...asList(value));
        } else {
            collectElements(value, name, found);
        }
    }
    return found;
}

export function extractFeedItem(node: unknown): FeedItem | null {
    if (!isNode(node)) {
        return null;
    }
    const item: FeedItem = {
        title: selectField(node, 'title'),
        link: selectField(node, 'link'),
        description: selectField(node, 'description'),
        published: selectField(node, 'published'),
    };
    return item.title && item.link ? item : null;
}

/**
 * Parses an RSS 2.0, RSS 1.0 or Atom document into uniform feed items.
 * Malformed documents yield no items; a bad item is skipped on its own.
 */
export async function parseFeedXml(xml: string, sourceName = 'feed'): Promise<FeedItem[]> {
    let document: unknown;
    try {
        document = await parseStringPromise(xml, XML_OPTIONS);
    } catch (error) {
        logger.error('Failed to parse feed XML', { source: sourceName, error: errorMessage(error) });
        return [];
    }

    let nodes = collectElements(document, 'item');
    if (nodes.length === 0) {
        nodes = collectElements(document, 'entry');
    }

    const items: FeedItem[] = [];
    nodes.forEach((node, index) => {
        try {
            const item = extractFeedItem(node);
            if (item) {
                items.push(item);
            } else {
                logger.debug('Skipping feed item without title or link', { source: sourceName, index });
            }
        } catch (error) {
            logger.warn('Failed to parse feed item', { source: sourceName, index, error: errorMessage(error) });
        }
    });

    return items;
}

export interface KevParseOptions {
    dateFallback: DateFallbackPolicy;
    now?: Date;
}

function column(row: Record<string, unknown>, name: string): string {
    const value = row[name];
    return typeof value === 'string' ? value.trim() : '';
}

/**
 * Parses the CISA Known Exploited Vulnerabilities CSV. Rows without a CVE id
 * are dropped, as are rows whose `dateAdded` is not a strict `YYYY-MM-DD`
 * date unless the fallback policy is `include`, in which case they are dated
 * today.
 */
export function parseKevCsv(csv: string, options: KevParseOptions): VulnerabilityRecord[] {
    let rows: unknown;
    try {
        rows = parseCsv(csv, {
            columns: true,
            skip_empty_lines: true,
            relax_column_count: true,
            bom: true,
        });
    } catch (error) {
        logger.error('Failed to parse KEV CSV', { error: errorMessage(error) });
        return [];
    }

    if (!Array.isArray(rows)) {
        return [];
    }

    const now = options.now ?? new Date();
    const records: VulnerabilityRecord[] = [];

    rows.forEach((row: unknown, index: number) => {
        if (!isNode(row)) {
            return;
        }
        const cveId = column(row, 'cveID');
        if (!cveId) {
            logger.warn('Skipping KEV row without cveID', { row: index + 1 });
            return;
        }

        let dateAdded = parseIsoDay(column(row, 'dateAdded'));
        if (!dateAdded) {
            if (options.dateFallback === 'exclude') {
                logger.warn('Skipping KEV row with unparseable dateAdded', {
                    cve: cveId,
                    dateAdded: column(row, 'dateAdded'),
                });
                return;
            }
            dateAdded = new Date(now.getFullYear(), now.getMonth(), now.getDate());
        }

        const record: VulnerabilityRecord = {
            cve_id: cveId,
            vendor_project: column(row, 'vendorProject'),
            product: column(row, 'product'),
            vulnerability_name: column(row, 'vulnerabilityName'),
            date_added: dateAdded,
            short_description: column(row, 'shortDescription'),
        };
        const requiredAction = column(row, 'requiredAction');
        if (requiredAction) {
            record.required_action = requiredAction;
        }
        const dueDate = column(row, 'dueDate');
        if (dueDate) {
            record.due_date = dueDate;
        }
        records.push(record);
    });

    return records;
}
