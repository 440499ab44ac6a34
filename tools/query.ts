/**
 * CLI: Query the published artifacts
 *
 * Usage:  tsx tools/query.ts [--dir DIR] [--from YYYY-MM-DD] [--to YYYY-MM-DD] [--types "THEFT,BATTERY"] [--points N]
 *
 * Without --from/--to the range spans every sample point. Without --types all
 * categories are selected.
 */

import { ArtifactHandle, TypeFilter, loadConfig, type Logger } from '../src/index.js';
import { formatDay, formatMonth } from '../src/agg-utils.js';

// --- CLI args ---
const args = process.argv.slice(2);

function getArg(name: string, fallback: string): string {
    const idx = args.indexOf(`--${name}`);
    return idx !== -1 && args[idx + 1] ? args[idx + 1] : fallback;
}

const logger: Logger = {
    warn: (msg) => console.warn(msg),
    error: (msg) => console.error(msg),
};

// --- Main ---
async function main() {
    const config = loadConfig(process.env, logger);
    const dir = getArg('dir', config.artifactDir);
    const handle = await ArtifactHandle.open(dir, {
        logger,
        queryDefaults: { mapPointCap: config.mapPointCap, seed: config.seed },
    });

    const described = handle.describe();
    const today = formatDay(Date.now());
    const from = getArg('from', described.minDate === null ? today : formatDay(described.minDate));
    const to = getArg('to', described.maxDate === null ? today : formatDay(described.maxDate));
    const selection = getArg('types', '').split(',').map((t) => t.trim()).filter((t) => t.length > 0);
    const shownPoints = parseInt(getArg('points', '5'), 10);

    const result = handle.query({ start: from, end: to }, TypeFilter.fromSelection(selection));

    console.log(`crime-agg query on ${handle.version}`);
    console.log(`Range: ${result.range.start}..${result.range.end} (months ${result.range.monthStart}..${result.range.monthEnd})`);
    console.log(`Types: ${selection.length > 0 ? selection.join(', ') : '(all)'}`);
    console.log();
    console.log(`  Total in range:      ${result.totals.totalInRange}`);
    console.log(`  Selected types:      ${result.totals.totalSelectedTypes}`);
    console.log(`  Map points:          ${result.totals.renderedPoints} of ${result.totals.matchedPoints}`);

    console.log(`\n  Trend`);
    for (const row of result.trend) {
        console.log(`    ${formatMonth(row.month)}${String(row.count).padStart(10)}`);
    }

    console.log(`\n  Top types`);
    for (const row of result.topTypes) {
        console.log(`    ${row.primary_type.padEnd(36)}${String(row.count).padStart(10)}`);
    }

    if (shownPoints > 0 && result.mapPoints.length > 0) {
        console.log(`\n  First ${Math.min(shownPoints, result.mapPoints.length)} map points`);
        for (const p of result.mapPoints.slice(0, shownPoints)) {
            console.log(`    ${new Date(p.date).toISOString()}  ${p.latitude.toFixed(5)}, ${p.longitude.toFixed(5)}  ${p.primary_type}`);
        }
    }

    for (const notice of result.empty) {
        console.log(`\n  [${notice.view}] ${notice.message}`);
    }
}

try {
    await main();
} catch (err: unknown) {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
}
