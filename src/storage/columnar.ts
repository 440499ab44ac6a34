/**
 * Arrow IPC encoding for the artifact tables and raw partitions.
 *
 * Column types:
 *   month, date           Float64 (epoch ms)
 *   latitude, longitude   Float64
 *   count, year           Int32
 *   primary_type          Utf8 (dictionary-encoded)
 *
 * Readers only touch the columns they ask for; other column buffers stay as
 * unread slices of the IPC payload.
 */
import { tableFromArrays, tableFromIPC, tableToIPC, type Table } from 'apache-arrow';
import type { MonthlyByTypeRow, MonthlyTotalRow, RawIncident, SamplePoint } from '../agg-types.js';
import { ArtifactIntegrityError, PartitionReadError } from '../errors.js';

export const RAW_COLUMNS = ['date', 'primary_type', 'latitude', 'longitude'] as const;

/** A raw row in the shape a partition file can hold. */
export interface RawIncidentRecord {
    date: number | string | null;
    primary_type: string | null;
    latitude: number | null;
    longitude: number | null;
}

export function openTable(ipc: Uint8Array, source: string): Table {
    try {
        return tableFromIPC(ipc);
    } catch (err) {
        throw new ArtifactIntegrityError(`${source}: not a readable Arrow IPC payload (${String(err)})`);
    }
}

/**
 * Returns a column's values, or null when the table has no such column.
 */
export function readColumn(table: Table, name: string): unknown[] | null {
    const vector = table.getChild(name);
    if (!vector) return null;
    return Array.from(vector);
}

/**
 * Column-pruned read: decodes only `names` out of the payload.
 */
export function readArtifactColumns(ipc: Uint8Array, names: readonly string[], source: string): Map<string, unknown[]> {
    const table = openTable(ipc, source);
    const columns = new Map<string, unknown[]>();
    for (const name of names) {
        const values = readColumn(table, name);
        if (!values) throw new ArtifactIntegrityError(`${source}: missing column '${name}'`);
        columns.set(name, values);
    }
    return columns;
}

function requireColumn(columns: Map<string, unknown[]>, name: string): unknown[] {
    const values = columns.get(name);
    if (!values) throw new ArtifactIntegrityError(`missing column '${name}'`);
    return values;
}

function toFinite(value: unknown, source: string, column: string, row: number): number {
    const n = typeof value === 'bigint' ? Number(value) : value;
    if (typeof n !== 'number' || !Number.isFinite(n)) {
        throw new ArtifactIntegrityError(`${source}: invalid ${column} at row ${row}`);
    }
    return n;
}

function toCount(value: unknown, source: string, column: string, row: number): number {
    const n = toFinite(value, source, column, row);
    if (!Number.isInteger(n) || n < 0) {
        throw new ArtifactIntegrityError(`${source}: invalid ${column} at row ${row}`);
    }
    return n;
}

function toText(value: unknown, source: string, column: string, row: number): string {
    if (typeof value !== 'string') {
        throw new ArtifactIntegrityError(`${source}: invalid ${column} at row ${row}`);
    }
    return value;
}

// ── Artifact tables ──────────────────────────────────────────────────────────

export function encodeMonthlyTotal(rows: readonly MonthlyTotalRow[]): Uint8Array {
    return tableToIPC(tableFromArrays({
        month: Float64Array.from(rows, (r) => r.month),
        count: Int32Array.from(rows, (r) => r.count),
    }));
}

export function decodeMonthlyTotal(ipc: Uint8Array, source = 'monthly_total'): MonthlyTotalRow[] {
    const columns = readArtifactColumns(ipc, ['month', 'count'], source);
    const months = requireColumn(columns, 'month');
    const counts = requireColumn(columns, 'count');
    return months.map((month, i) => ({
        month: toFinite(month, source, 'month', i),
        count: toCount(counts[i], source, 'count', i),
    }));
}

export function encodeMonthlyByType(rows: readonly MonthlyByTypeRow[]): Uint8Array {
    return tableToIPC(tableFromArrays({
        month: Float64Array.from(rows, (r) => r.month),
        primary_type: rows.map((r) => r.primary_type),
        count: Int32Array.from(rows, (r) => r.count),
    }));
}

export function decodeMonthlyByType(ipc: Uint8Array, source = 'monthly_type'): MonthlyByTypeRow[] {
    const columns = readArtifactColumns(ipc, ['month', 'primary_type', 'count'], source);
    const months = requireColumn(columns, 'month');
    const types = requireColumn(columns, 'primary_type');
    const counts = requireColumn(columns, 'count');
    return months.map((month, i) => ({
        month: toFinite(month, source, 'month', i),
        primary_type: toText(types[i], source, 'primary_type', i),
        count: toCount(counts[i], source, 'count', i),
    }));
}

export function encodeSamplePoints(rows: readonly SamplePoint[]): Uint8Array {
    return tableToIPC(tableFromArrays({
        date: Float64Array.from(rows, (r) => r.date),
        primary_type: rows.map((r) => r.primary_type),
        latitude: Float64Array.from(rows, (r) => r.latitude),
        longitude: Float64Array.from(rows, (r) => r.longitude),
        year: Int32Array.from(rows, (r) => r.year),
    }));
}

export function decodeSamplePoints(ipc: Uint8Array, source = 'sample_points'): SamplePoint[] {
    const columns = readArtifactColumns(ipc, ['date', 'primary_type', 'latitude', 'longitude', 'year'], source);
    const dates = requireColumn(columns, 'date');
    const types = requireColumn(columns, 'primary_type');
    const lats = requireColumn(columns, 'latitude');
    const lons = requireColumn(columns, 'longitude');
    const years = requireColumn(columns, 'year');
    return dates.map((date, i) => ({
        date: toFinite(date, source, 'date', i),
        primary_type: toText(types[i], source, 'primary_type', i),
        latitude: toFinite(lats[i], source, 'latitude', i),
        longitude: toFinite(lons[i], source, 'longitude', i),
        year: toCount(years[i], source, 'year', i),
    }));
}

// ── Raw partitions ───────────────────────────────────────────────────────────

/**
 * Encodes raw rows. A date column holding only numbers (and nulls) is stored
 * as Float64 epoch ms; anything else is stored as strings.
 */
export function encodeRawPartition(rows: readonly RawIncidentRecord[]): Uint8Array {
    const numericDates = rows.every((r) => r.date === null || typeof r.date === 'number');
    const dates = numericDates
        ? rows.map((r) => (typeof r.date === 'number' ? r.date : null))
        : rows.map((r) => (r.date === null ? null : typeof r.date === 'number' ? new Date(r.date).toISOString() : r.date));

    return tableToIPC(tableFromArrays({
        date: dates,
        primary_type: rows.map((r) => r.primary_type),
        latitude: rows.map((r) => r.latitude),
        longitude: rows.map((r) => r.longitude),
    }));
}

/**
 * Reads the four required columns of a raw partition. Values are passed
 * through untyped; cleaning happens in the aggregator.
 */
export function decodeRawPartition(ipc: Uint8Array, filePath: string): RawIncident[] {
    let table: Table;
    try {
        table = tableFromIPC(ipc);
    } catch (err) {
        throw new PartitionReadError(filePath, 'not a readable Arrow IPC file', err);
    }

    const dates = readColumn(table, 'date');
    const types = readColumn(table, 'primary_type');
    const lats = readColumn(table, 'latitude');
    const lons = readColumn(table, 'longitude');
    if (!dates || !types || !lats || !lons) {
        const missing = RAW_COLUMNS.filter((name) => !table.getChild(name));
        throw new PartitionReadError(filePath, `missing column(s) ${missing.join(', ')}`);
    }

    return dates.map((date, i) => ({
        date,
        primary_type: types[i],
        latitude: lats[i],
        longitude: lons[i],
    }));
}
