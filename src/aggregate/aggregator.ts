import type {
    AggregateSummary,
    ArtifactSet,
    CleanIncident,
    CrimeAggLogger,
    MonthlyByTypeRow,
    MonthlyTotalRow,
    PartitionReport,
    RawPartition,
    SamplePoint,
} from '../agg-types.js';
import { formatMonth } from '../agg-utils.js';
import { AggregatorStateError, FatalInputError, NoPartitionsError } from '../errors.js';
import { cleanRows } from './clean.js';
import { sampleRows } from './sampler.js';

export const DEFAULT_SAMPLE_PER_YEAR = 30_000;
export const DEFAULT_SEED = 42;

export type AggregatorOptions = {
    /** Max sample points kept per year. Default 30 000. */
    samplePerYear?: number;
    /** Seed for the per-year sample. Default 42. */
    seed?: number;
    logger?: CrimeAggLogger | null;
};

/**
 * Per-month and per-(month, type) counts. Combining two of these with
 * mergeCounts is associative and commutative.
 */
export interface PartialCounts {
    totals: Map<number, number>;
    byType: Map<number, Map<string, number>>;
}

export interface AggregateResult {
    artifacts: ArtifactSet;
    summary: AggregateSummary;
}

export function emptyCounts(): PartialCounts {
    return { totals: new Map(), byType: new Map() };
}

export function countIncidents(rows: readonly CleanIncident[]): PartialCounts {
    const counts = emptyCounts();
    for (const row of rows) {
        counts.totals.set(row.month, (counts.totals.get(row.month) ?? 0) + 1);

        let types = counts.byType.get(row.month);
        if (!types) {
            types = new Map();
            counts.byType.set(row.month, types);
        }
        types.set(row.primary_type, (types.get(row.primary_type) ?? 0) + 1);
    }
    return counts;
}

/**
 * Adds `source` into `target` (sums, never concatenates) and returns `target`.
 */
export function mergeCounts(target: PartialCounts, source: PartialCounts): PartialCounts {
    for (const [month, count] of source.totals) {
        target.totals.set(month, (target.totals.get(month) ?? 0) + count);
    }
    for (const [month, types] of source.byType) {
        let into = target.byType.get(month);
        if (!into) {
            into = new Map();
            target.byType.set(month, into);
        }
        for (const [type, count] of types) {
            into.set(type, (into.get(type) ?? 0) + count);
        }
    }
    return target;
}

function compareText(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

export function toMonthlyTotal(counts: PartialCounts): MonthlyTotalRow[] {
    return Array.from(counts.totals, ([month, count]) => ({ month, count }))
        .sort((a, b) => a.month - b.month);
}

export function toMonthlyByType(counts: PartialCounts): MonthlyByTypeRow[] {
    const rows: MonthlyByTypeRow[] = [];
    for (const [month, types] of counts.byType) {
        for (const [primary_type, count] of types) {
            rows.push({ month, primary_type, count });
        }
    }
    return rows.sort((a, b) => a.month - b.month || compareText(a.primary_type, b.primary_type));
}

/**
 * Batch aggregator. Partitions are added one at a time (any order) and the
 * three artifacts are materialized on finish().
 */
export class IncidentAggregator {
    private readonly counts: PartialCounts = emptyCounts();
    private readonly samples = new Map<number, SamplePoint[]>();
    private readonly reports: PartitionReport[] = [];
    private readonly samplePerYear: number;
    private readonly seed: number;
    private readonly logger: CrimeAggLogger | null;
    private isFinalized = false;

    constructor(options: AggregatorOptions = {}) {
        this.samplePerYear = options.samplePerYear ?? DEFAULT_SAMPLE_PER_YEAR;
        this.seed = options.seed ?? DEFAULT_SEED;
        this.logger = options.logger ?? null;

        if (!Number.isInteger(this.samplePerYear) || this.samplePerYear < 0) {
            throw new RangeError(`samplePerYear must be a non-negative integer (got ${this.samplePerYear})`);
        }
    }

    get partitionCount(): number {
        return this.reports.length;
    }

    addPartition(partition: RawPartition): PartitionReport {
        if (this.isFinalized) throw new AggregatorStateError('IncidentAggregator: Cannot add partitions after finish()');

        const { year } = partition;
        if (!Number.isInteger(year)) {
            throw new FatalInputError(`Partition year must be an integer (got ${year})`);
        }
        if (this.samples.has(year)) {
            throw new FatalInputError(`Duplicate partition for year ${year}`);
        }

        const cleaned = cleanRows(partition.rows);
        mergeCounts(this.counts, countIncidents(cleaned.rows));

        const sampled = sampleRows(cleaned.rows, this.samplePerYear, this.seed);
        this.samples.set(year, sampled.map((row) => ({
            date: row.date,
            primary_type: row.primary_type,
            latitude: row.latitude,
            longitude: row.longitude,
            year,
        })));

        const report: PartitionReport = {
            year,
            rowsRead: cleaned.rowsRead,
            rowsDropped: cleaned.rowsDropped,
            rowsKept: cleaned.rows.length,
            rowsSampled: sampled.length,
        };
        this.reports.push(report);

        this.logger?.info?.(
            `[crime-agg] year=${year}: read=${report.rowsRead} dropped=${report.rowsDropped} sampled=${report.rowsSampled}`
        );
        return report;
    }

    finish(): AggregateResult {
        if (this.isFinalized) throw new AggregatorStateError('IncidentAggregator: finish() already called');
        if (this.reports.length === 0) throw new NoPartitionsError('no partitions were added');
        this.isFinalized = true;

        const monthlyTotal = toMonthlyTotal(this.counts);
        const monthlyByType = toMonthlyByType(this.counts);

        const years = Array.from(this.samples.keys()).sort((a, b) => a - b);
        const samplePoints: SamplePoint[] = [];
        for (const year of years) {
            for (const point of this.samples.get(year) ?? []) samplePoints.push(point);
        }

        const types = new Set(monthlyByType.map((r) => r.primary_type));
        if (monthlyTotal.length > 0) {
            this.logger?.info?.(
                `[crime-agg] ${monthlyTotal.length} months (${formatMonth(monthlyTotal[0].month)}..${formatMonth(monthlyTotal[monthlyTotal.length - 1].month)}), ` +
                `${types.size} types, ${samplePoints.length} sample points`
            );
        } else {
            this.logger?.warn?.('[crime-agg] No usable rows in any partition; artifacts are empty');
        }

        return {
            artifacts: { monthlyTotal, monthlyByType, samplePoints },
            summary: {
                partitions: [...this.reports].sort((a, b) => a.year - b.year),
                months: monthlyTotal.length,
                primaryTypes: types.size,
                samplePoints: samplePoints.length,
            },
        };
    }
}

/**
 * One-shot aggregation over in-memory partitions.
 */
export function aggregate(partitions: Iterable<RawPartition>, options: AggregatorOptions = {}): AggregateResult {
    const aggregator = new IncidentAggregator(options);
    for (const partition of partitions) {
        aggregator.addPartition(partition);
    }
    if (aggregator.partitionCount === 0) {
        throw new NoPartitionsError('empty partition list');
    }
    return aggregator.finish();
}
