import { DateFallbackPolicy } from './digest-config';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;
const ISO_DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

export function hours(count: number): number {
    return count * HOUR_MS;
}

export function days(count: number): number {
    return count * DAY_MS;
}

// Date.parse also accepts loose strings such as "Issue 12"; only RFC 2822 and
// ISO 8601 shapes are handed to it.
const RFC_2822_PATTERN = /^(\w{3},\s*)?\d{1,2}\s+\w{3}\s+\d{2,4}\s+\d{1,2}:\d{2}/;
const ISO_8601_PATTERN = /^\d{4}-\d{2}-\d{2}/;

/**
 * Parses RSS/Atom timestamps: RFC 2822 (including numeric and named zone
 * offsets) and ISO 8601. Anything else is `null`.
 */
export function parseFeedDate(raw: string | undefined): Date | null {
    const value = raw?.trim();
    if (!value || !(RFC_2822_PATTERN.test(value) || ISO_8601_PATTERN.test(value))) {
        return null;
    }
    const time = Date.parse(value);
    return Number.isNaN(time) ? null : new Date(time);
}

/**
 * Strict `YYYY-MM-DD`, interpreted as local midnight. Rejects impossible days
 * such as 2024-02-31 instead of rolling them over.
 */
export function parseIsoDay(raw: string | undefined): Date | null {
    const match = raw?.trim().match(ISO_DAY_PATTERN);
    if (!match) {
        return null;
    }
    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const date = new Date(year, month - 1, day);
    if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
        return null;
    }
    return date;
}

export function isRecent(
    publishedAt: Date | null,
    windowMs: number,
    now: Date,
    fallback: DateFallbackPolicy,
): boolean {
    if (!publishedAt) {
        return fallback === 'include';
    }
    return publishedAt.getTime() > now.getTime() - windowMs;
}
