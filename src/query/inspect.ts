import type { ArtifactSet } from '../agg-types.js';

export interface ArtifactDescription {
    /** Earliest sample point date; the natural default range start */
    minDate: number | null;
    maxDate: number | null;
    /** Every category in monthly_type, sorted */
    primaryTypes: string[];
    firstMonth: number | null;
    lastMonth: number | null;
    rows: { monthlyTotal: number; monthlyByType: number; samplePoints: number };
}

export interface ConsistencyIssue {
    month: number;
    /** null when the month is absent from monthly_total */
    total: number | null;
    /** null when the month is absent from monthly_type */
    typeSum: number | null;
}

export function describeArtifacts(artifacts: ArtifactSet): ArtifactDescription {
    let minDate: number | null = null;
    let maxDate: number | null = null;
    for (const p of artifacts.samplePoints) {
        if (minDate === null || p.date < minDate) minDate = p.date;
        if (maxDate === null || p.date > maxDate) maxDate = p.date;
    }

    let firstMonth: number | null = null;
    let lastMonth: number | null = null;
    for (const r of artifacts.monthlyTotal) {
        if (firstMonth === null || r.month < firstMonth) firstMonth = r.month;
        if (lastMonth === null || r.month > lastMonth) lastMonth = r.month;
    }

    const primaryTypes = Array.from(new Set(artifacts.monthlyByType.map((r) => r.primary_type)))
        .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));

    return {
        minDate,
        maxDate,
        primaryTypes,
        firstMonth,
        lastMonth,
        rows: {
            monthlyTotal: artifacts.monthlyTotal.length,
            monthlyByType: artifacts.monthlyByType.length,
            samplePoints: artifacts.samplePoints.length,
        },
    };
}

/**
 * Months where the per-type counts do not add up to the monthly total.
 * An empty list means the set is consistent.
 */
export function checkConsistency(artifacts: ArtifactSet): ConsistencyIssue[] {
    const totals = new Map<number, number>();
    for (const r of artifacts.monthlyTotal) {
        totals.set(r.month, (totals.get(r.month) ?? 0) + r.count);
    }
    const typeSums = new Map<number, number>();
    for (const r of artifacts.monthlyByType) {
        typeSums.set(r.month, (typeSums.get(r.month) ?? 0) + r.count);
    }

    const months = new Set([...totals.keys(), ...typeSums.keys()]);
    const issues: ConsistencyIssue[] = [];
    for (const month of Array.from(months).sort((a, b) => a - b)) {
        const total = totals.get(month) ?? null;
        const typeSum = typeSums.get(month) ?? null;
        if (total !== typeSum) issues.push({ month, total, typeSum });
    }
    return issues;
}
