/**
 * Query layer.
 *
 * Every view is derived from the three artifacts only. Month-keyed views use
 * the range widened to whole months; the map view filters sample points at
 * exact day granularity. Calls are pure: same artifacts and arguments give
 * the same result.
 */
import type { ArtifactSet, MonthlyByTypeRow, MonthlyTotalRow, SamplePoint } from '../agg-types.js';
import { formatDay, formatMonth, nextMonth } from '../agg-utils.js';
import { DEFAULT_SEED } from '../aggregate/aggregator.js';
import { sampleRows } from '../aggregate/sampler.js';
import {
    TypeFilter,
    inDayRange,
    inMonthRange,
    resolveDateRange,
    type DateRangeInput,
    type ResolvedDateRange,
} from './filters.js';

export const DEFAULT_MAP_POINT_CAP = 200_000;
export const DEFAULT_TOP_N = 10;

export type QueryOptions = {
    /** Max map points returned. Default 200 000. */
    mapPointCap?: number;
    /** Length of the category ranking. Default 10. */
    topN?: number;
    /** Seed for the map sub-sample. Default 42. */
    seed?: number;
    /** Emit months with no events as count 0. Default false. */
    zeroFill?: boolean;
};

export type QueryView = 'mapPoints' | 'trend' | 'topTypes';

/**
 * A view with no rows. This is a normal state to show the user, not a failure.
 */
export interface EmptyResultNotice {
    view: QueryView;
    message: string;
}

export const EMPTY_VIEW_MESSAGES: Record<QueryView, string> = {
    mapPoints: 'No data for current filters. Try expanding the date range or selecting different crime types.',
    trend: 'No trend data for current filters.',
    topTypes: 'No type data for current date range.',
};

export interface TopTypeRow {
    primary_type: string;
    count: number;
}

export interface QueryTotals {
    /** All incidents in the month-widened range */
    totalInRange: number;
    /** Incidents of the selected types in the month-widened range */
    totalSelectedTypes: number;
    /** Sample points matching the filters, before the render cap */
    matchedPoints: number;
    /** Sample points returned in mapPoints */
    renderedPoints: number;
}

export interface QueryResult {
    range: { start: string; end: string; monthStart: string; monthEnd: string };
    mapPoints: SamplePoint[];
    trend: MonthlyTotalRow[];
    topTypes: TopTypeRow[];
    totals: QueryTotals;
    empty: EmptyResultNotice[];
}

export interface MapSelection {
    points: SamplePoint[];
    matched: number;
}

export function selectMapPoints(
    samplePoints: readonly SamplePoint[],
    range: ResolvedDateRange,
    filter: TypeFilter,
    cap: number = DEFAULT_MAP_POINT_CAP,
    seed: number = DEFAULT_SEED,
): MapSelection {
    const matches = samplePoints.filter(
        (p) => inDayRange(p.date, range) && TypeFilter.matches(filter, p.primary_type)
    );
    return { points: sampleRows(matches, cap, seed), matched: matches.length };
}

function zeroFillMonths(
    rows: MonthlyTotalRow[],
    range: ResolvedDateRange,
    extent: { first: number; last: number } | null,
): MonthlyTotalRow[] {
    if (!extent) return rows;
    const from = Math.max(range.monthStart, extent.first);
    const to = Math.min(range.monthEnd, extent.last);

    const byMonth = new Map(rows.map((r) => [r.month, r.count]));
    const filled: MonthlyTotalRow[] = [];
    for (let month = from; month <= to; month = nextMonth(month)) {
        filled.push({ month, count: byMonth.get(month) ?? 0 });
    }
    return filled;
}

function monthExtent(monthlyTotal: readonly MonthlyTotalRow[]): { first: number; last: number } | null {
    if (monthlyTotal.length === 0) return null;
    let first = monthlyTotal[0].month;
    let last = first;
    for (const row of monthlyTotal) {
        if (row.month < first) first = row.month;
        if (row.month > last) last = row.month;
    }
    return { first, last };
}

/**
 * Monthly series over the month-widened range. With a type subset the series
 * is summed from the per-type table; otherwise the total table is used as is.
 */
export function buildTrend(
    artifacts: ArtifactSet,
    range: ResolvedDateRange,
    filter: TypeFilter,
    zeroFill = false,
): MonthlyTotalRow[] {
    let rows: MonthlyTotalRow[];
    if (filter.kind === 'all') {
        rows = artifacts.monthlyTotal
            .filter((r) => inMonthRange(r.month, range))
            .map((r) => ({ month: r.month, count: r.count }));
    } else {
        const sums = new Map<number, number>();
        for (const r of artifacts.monthlyByType) {
            if (inMonthRange(r.month, range) && filter.types.has(r.primary_type)) {
                sums.set(r.month, (sums.get(r.month) ?? 0) + r.count);
            }
        }
        rows = Array.from(sums, ([month, count]) => ({ month, count }));
    }
    rows.sort((a, b) => a.month - b.month);

    return zeroFill ? zeroFillMonths(rows, range, monthExtent(artifacts.monthlyTotal)) : rows;
}

/**
 * Category ranking over the month-widened range, across all categories
 * regardless of the type filter. Ties go to the lexicographically smaller name.
 */
export function rankTypes(
    monthlyByType: readonly MonthlyByTypeRow[],
    range: ResolvedDateRange,
    topN: number = DEFAULT_TOP_N,
): TopTypeRow[] {
    const sums = new Map<string, number>();
    for (const r of monthlyByType) {
        if (inMonthRange(r.month, range)) {
            sums.set(r.primary_type, (sums.get(r.primary_type) ?? 0) + r.count);
        }
    }
    return Array.from(sums, ([primary_type, count]) => ({ primary_type, count }))
        .sort((a, b) => b.count - a.count || (a.primary_type < b.primary_type ? -1 : a.primary_type > b.primary_type ? 1 : 0))
        .slice(0, Math.max(0, topN));
}

export function computeTotals(
    artifacts: ArtifactSet,
    range: ResolvedDateRange,
    filter: TypeFilter,
): Pick<QueryTotals, 'totalInRange' | 'totalSelectedTypes'> {
    let totalInRange = 0;
    for (const r of artifacts.monthlyTotal) {
        if (inMonthRange(r.month, range)) totalInRange += r.count;
    }

    if (filter.kind === 'all') {
        return { totalInRange, totalSelectedTypes: totalInRange };
    }

    let totalSelectedTypes = 0;
    for (const r of artifacts.monthlyByType) {
        if (inMonthRange(r.month, range) && filter.types.has(r.primary_type)) {
            totalSelectedTypes += r.count;
        }
    }
    return { totalInRange, totalSelectedTypes };
}

export function query(
    artifacts: ArtifactSet,
    dateRange: DateRangeInput,
    typeFilter: TypeFilter = TypeFilter.all(),
    options: QueryOptions = {},
): QueryResult {
    const range = resolveDateRange(dateRange);

    const map = selectMapPoints(
        artifacts.samplePoints,
        range,
        typeFilter,
        options.mapPointCap ?? DEFAULT_MAP_POINT_CAP,
        options.seed ?? DEFAULT_SEED,
    );
    const trend = buildTrend(artifacts, range, typeFilter, options.zeroFill ?? false);
    const topTypes = rankTypes(artifacts.monthlyByType, range, options.topN ?? DEFAULT_TOP_N);
    const totals = computeTotals(artifacts, range, typeFilter);

    const empty: EmptyResultNotice[] = [];
    if (map.points.length === 0) empty.push({ view: 'mapPoints', message: EMPTY_VIEW_MESSAGES.mapPoints });
    if (trend.length === 0) empty.push({ view: 'trend', message: EMPTY_VIEW_MESSAGES.trend });
    if (topTypes.length === 0) empty.push({ view: 'topTypes', message: EMPTY_VIEW_MESSAGES.topTypes });

    return {
        range: {
            start: formatDay(range.start),
            end: formatDay(range.endExclusive - 1),
            monthStart: formatMonth(range.monthStart),
            monthEnd: formatMonth(range.monthEnd),
        },
        mapPoints: map.points,
        trend,
        topTypes,
        totals: { ...totals, matchedPoints: map.matched, renderedPoints: map.points.length },
        empty,
    };
}
