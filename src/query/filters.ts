import { MS_PER_DAY, floorToDay, floorToMonth, formatDay, parseTimestamp } from '../agg-utils.js';
import { MalformedFilterError } from '../errors.js';

export type DateInput = string | number | Date;

/** Inclusive day range as supplied by a caller. */
export interface DateRangeInput {
    start: DateInput;
    end: DateInput;
}

export interface ResolvedDateRange {
    /** First instant of the start day */
    start: number;
    /** First instant of the day after the end day */
    endExclusive: number;
    /** Start widened to its month */
    monthStart: number;
    /** End widened to its month (first instant of that month) */
    monthEnd: number;
}

function resolveBound(value: DateInput, label: 'start' | 'end'): number {
    const ms = parseTimestamp(value);
    if (ms === null) {
        throw new MalformedFilterError(`Invalid ${label} date: ${String(value)}`);
    }
    return floorToDay(ms);
}

/**
 * Validates a day range and derives the month bounds used against the
 * monthly artifacts. An end before the start is rejected, not normalized.
 */
export function resolveDateRange(range: DateRangeInput): ResolvedDateRange {
    const start = resolveBound(range.start, 'start');
    const end = resolveBound(range.end, 'end');
    if (end < start) {
        throw new MalformedFilterError(
            `Date range is inverted: end ${formatDay(end)} is before start ${formatDay(start)}`
        );
    }
    return {
        start,
        endExclusive: end + MS_PER_DAY,
        monthStart: floorToMonth(start),
        monthEnd: floorToMonth(end),
    };
}

export function inMonthRange(month: number, range: ResolvedDateRange): boolean {
    return month >= range.monthStart && month <= range.monthEnd;
}

export function inDayRange(date: number, range: ResolvedDateRange): boolean {
    return date >= range.start && date < range.endExclusive;
}

/**
 * Category filter. `all` places no restriction; `subset` keeps only the named
 * types, so an empty subset matches nothing.
 */
export type TypeFilter =
    | { kind: 'all' }
    | { kind: 'subset'; types: ReadonlySet<string> };

export const TypeFilter = {
    all(): TypeFilter {
        return { kind: 'all' };
    },

    subset(types: Iterable<string>): TypeFilter {
        return { kind: 'subset', types: new Set(types) };
    },

    /**
     * For multiselect widgets, where clearing the selection means "show all".
     */
    fromSelection(selection: Iterable<string>): TypeFilter {
        const types = new Set(selection);
        return types.size === 0 ? { kind: 'all' } : { kind: 'subset', types };
    },

    matches(filter: TypeFilter, primaryType: string): boolean {
        return filter.kind === 'all' || filter.types.has(primaryType);
    },
};
