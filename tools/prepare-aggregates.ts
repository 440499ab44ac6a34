/**
 * CLI: Batch aggregation
 *
 * Usage:  tsx tools/prepare-aggregates.ts [--raw DIR] [--out DIR] [--codec zstd|none]
 *
 * Reads every yearly raw partition, builds the three artifacts and publishes
 * them as the new current version. Flags override the CRIME_AGG_* environment.
 */

import { loadConfig, runAggregation, type CrimeAggConfig, type Logger } from '../src/index.js';

// --- CLI args ---
const args = process.argv.slice(2);

function getArg(name: string, fallback: string): string {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 && args[idx + 1] ? args[idx + 1] : fallback;
}

const logger: Logger = {
    info: (msg) => console.log(msg),
    warn: (msg) => console.warn(msg),
    error: (msg) => console.error(msg),
};

function resolveConfig(): CrimeAggConfig {
    const config = loadConfig(process.env, logger);
    const codec = getArg('codec', config.codec);
    if (codec !== 'zstd' && codec !== 'none') {
        throw new Error(`--codec must be zstd or none (got ${codec})`);
    }
    return {
        ...config,
        rawDir: getArg('raw', config.rawDir),
        artifactDir: getArg('out', config.artifactDir),
        codec,
    };
}

// --- Main ---
async function main() {
    const config = resolveConfig();
    console.log(`crime-agg batch aggregation`);
    console.log(`Raw: ${config.rawDir} | Out: ${config.artifactDir} | Codec: ${config.codec} | Sample/year: ${config.samplePerYear}`);

    const result = await runAggregation(config, { logger });

    console.log();
    console.log(`  ${'Year'.padEnd(6)}${'Read'.padStart(12)}${'Dropped'.padStart(12)}${'Sampled'.padStart(12)}`);
    for (const p of result.summary.partitions) {
        console.log(`  ${String(p.year).padEnd(6)}${String(p.rowsRead).padStart(12)}${String(p.rowsDropped).padStart(12)}${String(p.rowsSampled).padStart(12)}`);
    }
    console.log();
    console.log(`  Months:        ${result.summary.months}`);
    console.log(`  Primary types: ${result.summary.primaryTypes}`);
    console.log(`  Sample points: ${result.summary.samplePoints}`);
    console.log(`  Version:       ${result.publish.version}`);
    console.log(`\nDone in ${result.durationMs}ms.`);
}

try {
    await main();
} catch (err: unknown) {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
}
