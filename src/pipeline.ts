import type { AggregateSummary, CrimeAggLogger } from './agg-types.js';
import { IncidentAggregator } from './aggregate/aggregator.js';
import type { CrimeAggConfig } from './config.js';
import { publishArtifacts, type PublishResult } from './storage/artifact-store.js';
import { BatchLock } from './storage/dir-lock.js';
import { discoverPartitions, readPartition } from './storage/partitions.js';

export type AggregationRunOptions = {
    logger?: CrimeAggLogger | null;
    runId?: string;
    /** How long to wait for another batch run holding the artifact directory. Default 5000. */
    lockTimeoutMs?: number;
};

export interface AggregationRunResult {
    runId: string;
    summary: AggregateSummary;
    publish: PublishResult;
    durationMs: number;
}

/**
 * Full batch run: discover the yearly partitions, aggregate them one at a
 * time, publish the new set and swap it in.
 *
 * Any fatal input error aborts before a version directory is created, so the
 * previously published set stays current.
 */
export async function runAggregation(
    config: Pick<CrimeAggConfig, 'rawDir' | 'artifactDir' | 'partitionPattern' | 'samplePerYear' | 'seed' | 'codec' | 'keepVersions'>,
    options: AggregationRunOptions = {},
): Promise<AggregationRunResult> {
    const logger = options.logger ?? null;
    const runId = options.runId ?? `run_${Date.now()}_${Math.random().toString(36).slice(2, 7)}`;
    const lockTimeoutMs = options.lockTimeoutMs ?? 5000;
    const startedAt = Date.now();

    const files = await discoverPartitions(config.rawDir, config.partitionPattern);
    logger?.info?.(`[crime-agg] ${runId}: ${files.length} partition(s) in ${config.rawDir}`);

    const lock = new BatchLock(config.artifactDir, runId);
    await lock.acquire(lockTimeoutMs);
    try {
        const aggregator = new IncidentAggregator({
            samplePerYear: config.samplePerYear,
            seed: config.seed,
            logger,
        });
        for (const file of files) {
            aggregator.addPartition(await readPartition(file));
        }
        const { artifacts, summary } = aggregator.finish();

        const publish = await publishArtifacts(config.artifactDir, artifacts, {
            codec: config.codec,
            keepVersions: config.keepVersions,
            runId,
            logger,
            lockTimeoutMs,
        });

        const durationMs = Date.now() - startedAt;
        logger?.info?.(`[crime-agg] ${runId}: done in ${durationMs}ms`);
        return { runId, summary, publish, durationMs };
    } catch (err) {
        logger?.error?.(`[crime-agg] ${runId}: failed: ${err instanceof Error ? err.message : String(err)}`);
        throw err;
    } finally {
        await lock.release();
    }
}
