/**
 * crime-agg Public API
 *
 * @module crime-agg
 */

import { aggregate, type AggregateResult, type AggregatorOptions } from './aggregate/aggregator.js';
import type { ArtifactSet, RawPartition } from './agg-types.js';
import { query, type QueryOptions, type QueryResult } from './query/engine.js';
import { TypeFilter, type DateRangeInput } from './query/filters.js';
import { ArtifactHandle, type ArtifactHandleOptions } from './query/handle.js';
import {
    loadArtifacts,
    publishArtifacts,
    verifyArtifactDir,
    type LoadOptions,
    type LoadedArtifacts,
    type PublishOptions,
    type PublishResult,
    type VerifyReport,
} from './storage/artifact-store.js';

export type {
    RawIncident,
    RawPartition,
    CleanIncident,
    MonthlyTotalRow,
    MonthlyByTypeRow,
    SamplePoint,
    ArtifactSet,
    ArtifactName,
    PartitionReport,
    AggregateSummary,
    CrimeAggLogger as Logger,
} from './agg-types.js';
export { CRIME_AGG_VERSION, ARTIFACT_NAMES } from './agg-types.js';
export {
    CrimeAggError,
    FatalInputError,
    NoPartitionsError,
    PartitionReadError,
    MalformedFilterError,
    ArtifactIntegrityError,
    ArtifactNotFoundError,
    AggregatorStateError,
    LockTimeoutError,
} from './errors.js';

export {
    IncidentAggregator,
    aggregate,
    countIncidents,
    mergeCounts,
    emptyCounts,
    DEFAULT_SAMPLE_PER_YEAR,
    DEFAULT_SEED,
} from './aggregate/aggregator.js';
export type { AggregatorOptions, AggregateResult, PartialCounts } from './aggregate/aggregator.js';
export { cleanIncident, cleanRows } from './aggregate/clean.js';
export { SeededRng, sampleIndices, sampleRows } from './aggregate/sampler.js';

export {
    query,
    selectMapPoints,
    buildTrend,
    rankTypes,
    computeTotals,
    DEFAULT_MAP_POINT_CAP,
    DEFAULT_TOP_N,
    EMPTY_VIEW_MESSAGES,
} from './query/engine.js';
export type { QueryOptions, QueryResult, QueryTotals, TopTypeRow, EmptyResultNotice, QueryView } from './query/engine.js';
export { TypeFilter, resolveDateRange } from './query/filters.js';
export type { DateInput, DateRangeInput, ResolvedDateRange } from './query/filters.js';
export { ArtifactHandle } from './query/handle.js';
export type { ArtifactHandleOptions, ArtifactSnapshot } from './query/handle.js';
export { describeArtifacts, checkConsistency } from './query/inspect.js';
export type { ArtifactDescription, ConsistencyIssue } from './query/inspect.js';

export {
    publishArtifacts,
    loadArtifacts,
    verifyArtifactDir,
    readCurrentVersion,
    listVersions,
} from './storage/artifact-store.js';
export type {
    ArtifactManifest,
    ManifestEntry,
    PublishOptions,
    PublishResult,
    LoadOptions,
    LoadedArtifacts,
    VerifyReport,
} from './storage/artifact-store.js';
export { discoverPartitions, readPartition, writePartition, partitionFileName } from './storage/partitions.js';
export type { PartitionFile } from './storage/partitions.js';
export type { RawIncidentRecord } from './storage/columnar.js';
export type { CodecName } from './storage/format.js';
export { BatchLock, readBatchLockOwner, withArtifactDir, type BatchLockOwner, type DirAccess } from './storage/dir-lock.js';

export { loadConfig, DEFAULT_CONFIG, CONFIG_ENV_VARS } from './config.js';
export type { CrimeAggConfig } from './config.js';
export { runAggregation } from './pipeline.js';
export type { AggregationRunOptions, AggregationRunResult } from './pipeline.js';

// The CrimeAgg Namespace Object
export const CrimeAgg = {
    /**
     * Aggregates in-memory yearly partitions into the three artifacts.
     */
    aggregate: (partitions: Iterable<RawPartition>, options?: AggregatorOptions): AggregateResult => {
        return aggregate(partitions, options);
    },

    /**
     * Runs the filtered views against an artifact set.
     */
    query: (artifacts: ArtifactSet, dateRange: DateRangeInput, typeFilter?: TypeFilter, options?: QueryOptions): QueryResult => {
        return query(artifacts, dateRange, typeFilter, options);
    },

    /**
     * Writes a new artifact version and makes it current.
     */
    publish: async (dir: string, artifacts: ArtifactSet, options?: PublishOptions): Promise<PublishResult> => {
        return await publishArtifacts(dir, artifacts, options);
    },

    /**
     * Loads the current artifact version.
     */
    load: async (dir: string, options?: LoadOptions): Promise<LoadedArtifacts> => {
        return await loadArtifacts(dir, options);
    },

    /**
     * Checks frames and CRCs of the current version WITHOUT decoding tables.
     */
    verify: async (dir: string): Promise<VerifyReport> => {
        return await verifyArtifactDir(dir);
    },

    /**
     * Opens a refreshable handle on the current artifact version.
     */
    open: async (dir: string, options?: ArtifactHandleOptions): Promise<ArtifactHandle> => {
        return await ArtifactHandle.open(dir, options);
    },

    TypeFilter,
};

export default CrimeAgg;
