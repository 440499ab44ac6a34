import { floorToMonth, parseTimestamp } from '../agg-utils.js';
import type { CleanIncident, RawIncident } from '../agg-types.js';

export interface CleanResult {
    rows: CleanIncident[];
    rowsRead: number;
    rowsDropped: number;
}

function coerceCoordinate(value: unknown): number | null {
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && value.trim().length > 0) {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

function coerceCategory(value: unknown): string | null {
    if (typeof value !== 'string') return null;
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}

/**
 * Returns the usable form of a raw row, or null when any of date, latitude,
 * longitude or primary type is missing or unreadable.
 */
export function cleanIncident(raw: RawIncident): CleanIncident | null {
    const date = parseTimestamp(raw.date);
    if (date === null) return null;

    const latitude = coerceCoordinate(raw.latitude);
    const longitude = coerceCoordinate(raw.longitude);
    const primaryType = coerceCategory(raw.primary_type);
    if (latitude === null || longitude === null || primaryType === null) return null;

    return {
        date,
        primary_type: primaryType,
        latitude,
        longitude,
        month: floorToMonth(date),
    };
}

/**
 * Drops unusable rows. Drops are counted, never raised.
 */
export function cleanRows(rows: Iterable<RawIncident>): CleanResult {
    const kept: CleanIncident[] = [];
    let rowsRead = 0;

    for (const raw of rows) {
        rowsRead++;
        const clean = cleanIncident(raw);
        if (clean) kept.push(clean);
    }

    return { rows: kept, rowsRead, rowsDropped: rowsRead - kept.length };
}
