export interface DateParts {
    year: string;
    month: string;
    day: string;
    hour: string;
    minute: string;
    second: string;
}

export function dateParts(date: Date, timeZone: string): DateParts {
    const parts = new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
    }).formatToParts(date);

    const pick = (type: Intl.DateTimeFormatPartTypes): string =>
        parts.find((part) => part.type === type)?.value ?? '00';

    return {
        year: pick('year'),
        month: pick('month'),
        day: pick('day'),
        hour: pick('hour'),
        minute: pick('minute'),
        second: pick('second'),
    };
}

/** `YYYY-MM-DD` in the given zone. */
export function formatIsoDay(date: Date, timeZone: string): string {
    const { year, month, day } = dateParts(date, timeZone);
    return `${year}-${month}-${day}`;
}

/** `YYYY-MM-DD HH:MM:SS` in the given zone. */
export function formatTimestamp(date: Date, timeZone: string): string {
    const { hour, minute, second } = dateParts(date, timeZone);
    return `${formatIsoDay(date, timeZone)} ${hour}:${minute}:${second}`;
}

export function formatCompactTimestamp(date: Date, timeZone: string): string {
    const { year, month, day, hour, minute, second } = dateParts(date, timeZone);
    return `${year}${month}${day}_${hour}${minute}${second}`;
}

export function formatLongDate(date: Date, timeZone: string): string {
    return new Intl.DateTimeFormat('en-US', {
        timeZone,
        year: 'numeric',
        month: 'long',
        day: 'numeric',
    }).format(date);
}

// Vulnerability dates are calendar days held as local midnight.
export function formatLocalDay(date: Date): string {
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const day = String(date.getDate()).padStart(2, '0');
    return `${date.getFullYear()}-${month}-${day}`;
}
