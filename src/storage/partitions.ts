import * as fs from 'fs/promises';
import * as path from 'path';
import type { RawPartition } from '../agg-types.js';
import { NoPartitionsError, PartitionReadError } from '../errors.js';
import { decodeRawPartition, encodeRawPartition, type RawIncidentRecord } from './columnar.js';

export const DEFAULT_PARTITION_PATTERN = 'crime_{year}.arrow';
const YEAR_TOKEN = '{year}';

export interface PartitionFile {
    year: number;
    filePath: string;
}

/**
 * Turns a file-name pattern such as `crime_{year}.arrow` into a matcher whose
 * first group is the four-digit year.
 */
export function compilePartitionPattern(pattern: string): RegExp {
    const at = pattern.indexOf(YEAR_TOKEN);
    if (at === -1 || pattern.indexOf(YEAR_TOKEN, at + 1) !== -1) {
        throw new RangeError(`Partition pattern must contain ${YEAR_TOKEN} exactly once (got '${pattern}')`);
    }
    const escape = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const before = pattern.slice(0, at);
    const after = pattern.slice(at + YEAR_TOKEN.length);
    return new RegExp(`^${escape(before)}(\\d{4})${escape(after)}$`);
}

export function partitionFileName(year: number, pattern: string = DEFAULT_PARTITION_PATTERN): string {
    compilePartitionPattern(pattern);
    return pattern.replace(YEAR_TOKEN, String(year).padStart(4, '0'));
}

/**
 * Lists the yearly partitions in `dir`, ascending by year. Finding none is
 * fatal for an aggregation run.
 */
export async function discoverPartitions(dir: string, pattern: string = DEFAULT_PARTITION_PATTERN): Promise<PartitionFile[]> {
    const matcher = compilePartitionPattern(pattern);
    const location = path.join(dir, pattern);

    let names: string[];
    try {
        names = await fs.readdir(dir);
    } catch (err) {
        if (err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT') {
            throw new NoPartitionsError(location);
        }
        throw err;
    }

    const found: PartitionFile[] = [];
    for (const name of names) {
        const match = matcher.exec(name);
        if (match) {
            found.push({ year: Number(match[1]), filePath: path.join(dir, name) });
        }
    }

    if (found.length === 0) throw new NoPartitionsError(location);
    return found.sort((a, b) => a.year - b.year);
}

export async function readPartition(file: PartitionFile): Promise<RawPartition> {
    let bytes: Uint8Array;
    try {
        bytes = await fs.readFile(file.filePath);
    } catch (err) {
        throw new PartitionReadError(file.filePath, err instanceof Error ? err.message : String(err), err);
    }
    return { year: file.year, rows: decodeRawPartition(bytes, file.filePath) };
}

/**
 * Writes one raw yearly partition in the format readPartition expects.
 */
export async function writePartition(
    dir: string,
    year: number,
    rows: readonly RawIncidentRecord[],
    pattern: string = DEFAULT_PARTITION_PATTERN,
): Promise<string> {
    await fs.mkdir(dir, { recursive: true });
    const filePath = path.join(dir, partitionFileName(year, pattern));
    await fs.writeFile(filePath, encodeRawPartition(rows));
    return filePath;
}
