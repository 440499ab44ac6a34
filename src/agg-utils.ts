/**
 * crime-agg Utilities
 *
 * @module crime-agg
 *
 * Timestamp parsing and calendar arithmetic shared by the aggregator and the
 * query layer. Everything works on the UTC wall clock.
 */

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const ISO_PATTERN =
    /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

// Data-portal export format, e.g. "01/15/2020 10:30:00 PM"
const US_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(AM|PM)?)?$/i;

/**
 * Builds a UTC timestamp, rejecting out-of-range components instead of
 * letting Date roll them over (e.g. Feb 30 -> Mar 2).
 */
function utcFromParts(
    year: number,
    month: number,
    day: number,
    hour = 0,
    minute = 0,
    second = 0,
    millis = 0,
): number | null {
    if (month < 1 || month > 12 || day < 1 || day > 31) return null;
    if (hour > 23 || minute > 59 || second > 59) return null;

    const ms = Date.UTC(year, month - 1, day, hour, minute, second, millis);
    const check = new Date(ms);
    if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) {
        return null;
    }
    return ms;
}

function parseOffsetMinutes(offset: string): number {
    if (offset.toUpperCase() === 'Z') return 0;
    const sign = offset.startsWith('-') ? -1 : 1;
    const digits = offset.slice(1).replace(':', '');
    const hours = Number(digits.slice(0, 2));
    const minutes = Number(digits.slice(2, 4));
    return sign * (hours * 60 + minutes);
}

function parseTimestampString(raw: string): number | null {
    const text = raw.trim();
    if (text.length === 0) return null;

    const iso = ISO_PATTERN.exec(text);
    if (iso) {
        const fraction = iso[7] ? Number(iso[7].slice(0, 3).padEnd(3, '0')) : 0;
        const base = utcFromParts(
            Number(iso[1]), Number(iso[2]), Number(iso[3]),
            Number(iso[4] ?? 0), Number(iso[5] ?? 0), Number(iso[6] ?? 0), fraction,
        );
        if (base === null) return null;
        return iso[8] ? base - parseOffsetMinutes(iso[8]) * 60_000 : base;
    }

    const us = US_PATTERN.exec(text);
    if (us) {
        let hour = Number(us[4] ?? 0);
        const meridiem = us[7]?.toUpperCase();
        if (meridiem) {
            if (hour < 1 || hour > 12) return null;
            if (meridiem === 'AM' && hour === 12) hour = 0;
            if (meridiem === 'PM' && hour !== 12) hour += 12;
        }
        return utcFromParts(Number(us[3]), Number(us[1]), Number(us[2]), hour, Number(us[5] ?? 0), Number(us[6] ?? 0));
    }

    return null;
}

/**
 * Coerces a raw timestamp value to epoch ms, or null when it cannot be read.
 * Accepts epoch ms (number/bigint), Date, and ISO-8601 or portal-format
 * strings. Strings without an offset are taken as UTC wall-clock time.
 */
export function parseTimestamp(value: unknown): number | null {
    if (value === null || value === undefined) return null;
    if (typeof value === 'number') return withinDateRange(value);
    if (typeof value === 'bigint') return withinDateRange(Number(value));
    if (value instanceof Date) return withinDateRange(value.getTime());
    if (typeof value === 'string') {
        const ms = parseTimestampString(value);
        return ms === null ? null : withinDateRange(ms);
    }
    return null;
}

// Its month must be representable too, or month keys come out NaN.
function withinDateRange(ms: number): number | null {
    return Number.isFinite(ms) && Number.isFinite(floorToMonth(ms)) ? ms : null;
}

/** First instant of the UTC calendar month containing `ms`. */
export function floorToMonth(ms: number): number {
    const d = new Date(ms);
    return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), 1);
}

/** First instant of the UTC calendar day containing `ms`. */
export function floorToDay(ms: number): number {
    const d = new Date(ms);
    return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

/** First instant of the month after the one starting at `month`. */
export function nextMonth(month: number): number {
    const d = new Date(month);
    return Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 1);
}

/** 'YYYY-MM' */
export function formatMonth(ms: number): string {
    return new Date(ms).toISOString().slice(0, 7);
}

/** 'YYYY-MM-DD' */
export function formatDay(ms: number): string {
    return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Wait for N ms
 */
export const wait = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));
