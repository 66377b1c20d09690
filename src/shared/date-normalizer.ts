/**
 * Date normalization for school bulletin listings.
 *
 * Listings mix Western dates (2025-11-21) with offset-calendar dates (114/11/21,
 * where the year is the Western year minus 1911). Every source publishes in
 * UTC+8, so resolved dates are midnight of that day in UTC+8.
 */

export const OFFSET_CALENDAR_EPOCH = 1911;

const UTC8_OFFSET_MS = 8 * 60 * 60 * 1000;

// Both separators must match: 2025-11-21, 2025/11/21, 2025.11.21
const WESTERN_DATE = /(?<!\d)(\d{4})([./-])(\d{1,2})\2(\d{1,2})/;
const OFFSET_DATE = /(?<!\d)(\d{3})([./-])(\d{1,2})\2(\d{1,2})/;

function toUtc8Midnight(year: number, month: number, day: number): Date | null {
    if (month < 1 || month > 12 || day < 1 || day > 31) return null;
    const utc = new Date(Date.UTC(year, month - 1, day));
    // Date.UTC rolls Feb 30 over into March; treat that as unreadable
    if (utc.getUTCFullYear() !== year || utc.getUTCMonth() !== month - 1 || utc.getUTCDate() !== day) {
        return null;
    }
    return new Date(utc.getTime() - UTC8_OFFSET_MS);
}

/**
 * Resolve the first date found in `raw`.
 *
 * A four-digit year is always tried first: the three-digit pattern also
 * matches the tail of "2025-11-21" and would read it as year 25 + 1911.
 */
export function normalizeDate(raw: string): Date | null {
    if (!raw) return null;

    const western = WESTERN_DATE.exec(raw);
    if (western) {
        return toUtc8Midnight(Number(western[1]), Number(western[3]), Number(western[4]));
    }

    const offset = OFFSET_DATE.exec(raw);
    if (offset) {
        return toUtc8Midnight(Number(offset[1]) + OFFSET_CALENDAR_EPOCH, Number(offset[3]), Number(offset[4]));
    }

    return null;
}

/**
 * Format a resolved date as YYYY-MM-DD in UTC+8.
 */
export function formatDate(date: Date): string {
    return new Date(date.getTime() + UTC8_OFFSET_MS).toISOString().split('T')[0];
}
