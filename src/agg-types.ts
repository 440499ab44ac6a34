/**
 * crime-agg Types - Core type definitions
 *
 * @module crime-agg
 *
 * All timestamps are epoch milliseconds on the UTC wall clock. Month keys are
 * the first instant of the calendar month (YYYY-MM-01T00:00:00Z).
 */

export const CRIME_AGG_VERSION = '1.0.0';

// ============================================================================
// Raw input
// ============================================================================

/**
 * One recorded incident as it comes out of a raw yearly partition.
 * Fields are loosely typed: the cleaning stage decides what is usable.
 */
export interface RawIncident {
    date: unknown;
    primary_type: unknown;
    latitude: unknown;
    longitude: unknown;
}

/** A single year's raw incidents. */
export interface RawPartition {
    year: number;
    rows: Iterable<RawIncident>;
}

/** A raw row that survived cleaning. */
export interface CleanIncident {
    /** Epoch ms */
    date: number;
    primary_type: string;
    latitude: number;
    longitude: number;
    /** First instant of the incident's month, epoch ms */
    month: number;
}

// ============================================================================
// Artifacts
// ============================================================================

export interface MonthlyTotalRow {
    month: number;
    count: number;
}

export interface MonthlyByTypeRow {
    month: number;
    primary_type: string;
    count: number;
}

export interface SamplePoint {
    date: number;
    primary_type: string;
    latitude: number;
    longitude: number;
    year: number;
}

/**
 * The three derived artifacts of one aggregation run. Treated as immutable
 * once produced; a refresh replaces the whole set.
 */
export interface ArtifactSet {
    readonly monthlyTotal: readonly MonthlyTotalRow[];
    readonly monthlyByType: readonly MonthlyByTypeRow[];
    readonly samplePoints: readonly SamplePoint[];
}

/** Persisted table names, also the artifact file stems. */
export type ArtifactName = 'monthly_total' | 'monthly_type' | 'sample_points';

export const ARTIFACT_NAMES: readonly ArtifactName[] = ['monthly_total', 'monthly_type', 'sample_points'];

// ============================================================================
// Run reporting
// ============================================================================

export interface PartitionReport {
    year: number;
    rowsRead: number;
    rowsDropped: number;
    rowsKept: number;
    rowsSampled: number;
}

export interface AggregateSummary {
    partitions: PartitionReport[];
    months: number;
    primaryTypes: number;
    samplePoints: number;
}

/**
 * Optional logger hook. Library code reports through this instead of console.*.
 */
export type CrimeAggLogger = {
    info?: (msg: string) => void;
    warn?: (msg: string) => void;
    error?: (msg: string) => void;
};
