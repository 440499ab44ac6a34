import type { CrimeAggLogger } from './agg-types.js';
import { DEFAULT_SAMPLE_PER_YEAR, DEFAULT_SEED } from './aggregate/aggregator.js';
import { DEFAULT_MAP_POINT_CAP } from './query/engine.js';
import type { CodecName } from './storage/format.js';
import { DEFAULT_PARTITION_PATTERN, compilePartitionPattern } from './storage/partitions.js';

export interface CrimeAggConfig {
    rawDir: string;
    artifactDir: string;
    partitionPattern: string;
    samplePerYear: number;
    mapPointCap: number;
    seed: number;
    codec: CodecName;
    keepVersions: number;
}

export const DEFAULT_CONFIG: Readonly<CrimeAggConfig> = {
    rawDir: 'data/processed',
    artifactDir: 'data/agg',
    partitionPattern: DEFAULT_PARTITION_PATTERN,
    samplePerYear: DEFAULT_SAMPLE_PER_YEAR,
    mapPointCap: DEFAULT_MAP_POINT_CAP,
    seed: DEFAULT_SEED,
    codec: 'zstd',
    keepVersions: 2,
};

export const CONFIG_ENV_VARS = {
    rawDir: 'CRIME_AGG_RAW_DIR',
    artifactDir: 'CRIME_AGG_ARTIFACT_DIR',
    partitionPattern: 'CRIME_AGG_PARTITION_PATTERN',
    samplePerYear: 'CRIME_AGG_SAMPLE_PER_YEAR',
    mapPointCap: 'CRIME_AGG_MAP_POINT_CAP',
    seed: 'CRIME_AGG_SEED',
    codec: 'CRIME_AGG_CODEC',
    keepVersions: 'CRIME_AGG_KEEP_VERSIONS',
} as const satisfies Record<keyof CrimeAggConfig, string>;

type Env = Record<string, string | undefined>;

function readText(env: Env, name: string, fallback: string): string {
    const value = env[name]?.trim();
    return value ? value : fallback;
}

function readInt(env: Env, name: string, fallback: number, min: number, logger: CrimeAggLogger | null): number {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        logger?.warn?.(`[crime-agg] ${name}=${raw} is not an integer >= ${min}; using ${fallback}`);
        return fallback;
    }
    return value;
}

/**
 * Resolves the configuration from environment variables over the defaults.
 * Unusable values fall back to the default with a warning.
 */
export function loadConfig(env: Env = process.env, logger: CrimeAggLogger | null = null): CrimeAggConfig {
    let partitionPattern = readText(env, CONFIG_ENV_VARS.partitionPattern, DEFAULT_CONFIG.partitionPattern);
    try {
        compilePartitionPattern(partitionPattern);
    } catch (err) {
        logger?.warn?.(`[crime-agg] ${err instanceof Error ? err.message : String(err)}; using ${DEFAULT_CONFIG.partitionPattern}`);
        partitionPattern = DEFAULT_CONFIG.partitionPattern;
    }

    const codecRaw = readText(env, CONFIG_ENV_VARS.codec, DEFAULT_CONFIG.codec).toLowerCase();
    let codec: CodecName = DEFAULT_CONFIG.codec;
    if (codecRaw === 'zstd' || codecRaw === 'none') {
        codec = codecRaw;
    } else {
        logger?.warn?.(`[crime-agg] ${CONFIG_ENV_VARS.codec}=${codecRaw} is not zstd|none; using ${DEFAULT_CONFIG.codec}`);
    }

    return {
        rawDir: readText(env, CONFIG_ENV_VARS.rawDir, DEFAULT_CONFIG.rawDir),
        artifactDir: readText(env, CONFIG_ENV_VARS.artifactDir, DEFAULT_CONFIG.artifactDir),
        partitionPattern,
        samplePerYear: readInt(env, CONFIG_ENV_VARS.samplePerYear, DEFAULT_CONFIG.samplePerYear, 0, logger),
        mapPointCap: readInt(env, CONFIG_ENV_VARS.mapPointCap, DEFAULT_CONFIG.mapPointCap, 0, logger),
        seed: readInt(env, CONFIG_ENV_VARS.seed, DEFAULT_CONFIG.seed, 1, logger),
        codec,
        keepVersions: readInt(env, CONFIG_ENV_VARS.keepVersions, DEFAULT_CONFIG.keepVersions, 1, logger),
    };
}
