/**
 * Versioned artifact directory.
 *
 * Layout:
 *   <dir>/CURRENT                      -> "v-<stamp>-<rand>\n"
 *   <dir>/v-<stamp>-<rand>/manifest.json
 *   <dir>/v-<stamp>-<rand>/monthly_total.cagg
 *   <dir>/v-<stamp>-<rand>/monthly_type.cagg
 *   <dir>/v-<stamp>-<rand>/sample_points.cagg
 *
 * A publish writes a complete version directory first and only then replaces
 * CURRENT (write temp + rename). Readers resolve CURRENT once and read
 * everything from that version, so a set is seen whole or not at all.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { ARTIFACT_NAMES, type ArtifactName, type ArtifactSet, type CrimeAggLogger } from '../agg-types.js';
import { ArtifactIntegrityError, ArtifactNotFoundError } from '../errors.js';
import { frameArtifact, unframeArtifact, verifyArtifactBytes } from './artifact-file.js';
import {
    decodeMonthlyByType,
    decodeMonthlyTotal,
    decodeSamplePoints,
    encodeMonthlyByType,
    encodeMonthlyTotal,
    encodeSamplePoints,
} from './columnar.js';
import { withArtifactDir } from './dir-lock.js';
import {
    ARTIFACT_EXTENSION,
    CURRENT_POINTER_FILE,
    MANIFEST_FILE,
    MANIFEST_FORMAT_VERSION,
    VERSION_DIR_PREFIX,
    type CodecName,
} from './format.js';

const VERSION_ID_PATTERN = /^v-\d{14}-[a-z0-9]+$/;

export interface ManifestEntry {
    file: string;
    rows: number;
    bytes: number;
    crc32: number;
}

export interface ArtifactManifest {
    formatVersion: number;
    version: string;
    runId: string;
    createdAt: string;
    codec: CodecName;
    years: number[];
    files: Record<ArtifactName, ManifestEntry>;
}

export type PublishOptions = {
    /** Outer codec. Default 'zstd'. */
    codec?: CodecName;
    /** Zstd level. Default 3. */
    compressionLevel?: number;
    /** Versions kept after a publish, including the new one. Default 2, minimum 1. */
    keepVersions?: number;
    runId?: string;
    logger?: CrimeAggLogger | null;
    lockTimeoutMs?: number;
};

export interface PublishResult {
    version: string;
    versionDir: string;
    manifest: ArtifactManifest;
    pruned: string[];
}

export type LoadOptions = {
    logger?: CrimeAggLogger | null;
    lockTimeoutMs?: number;
};

export interface LoadedArtifacts {
    version: string;
    manifest: ArtifactManifest;
    artifacts: ArtifactSet;
}

export interface VerifyReport {
    ok: boolean;
    version: string;
    problems: string[];
}

function newVersionId(): string {
    return `${VERSION_DIR_PREFIX}${String(Date.now()).padStart(14, '0')}-${Math.random().toString(36).slice(2, 10)}`;
}

function artifactFileName(name: ArtifactName): string {
    return `${name}${ARTIFACT_EXTENSION}`;
}

/**
 * Replaces `filePath` with `data` via a sibling temp file and rename.
 */
export async function writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
    const tmpPath = `${filePath}.tmp-${process.pid}-${Math.random().toString(36).slice(2)}`;
    try {
        const handle = await fs.open(tmpPath, 'w');
        try {
            await handle.writeFile(data);
            await handle.sync();
        } finally {
            await handle.close();
        }
        await fs.rename(tmpPath, filePath);
    } catch (err) {
        await fs.rm(tmpPath, { force: true });
        throw err;
    }
}

// ── Manifest validation ──────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isManifestEntry(value: unknown): value is ManifestEntry {
    return isRecord(value)
        && typeof value.file === 'string'
        && typeof value.rows === 'number'
        && typeof value.bytes === 'number'
        && typeof value.crc32 === 'number';
}

function isManifest(value: unknown): value is ArtifactManifest {
    if (!isRecord(value)) return false;
    const files = value.files;
    return value.formatVersion === MANIFEST_FORMAT_VERSION
        && typeof value.version === 'string'
        && typeof value.runId === 'string'
        && typeof value.createdAt === 'string'
        && (value.codec === 'zstd' || value.codec === 'none')
        && Array.isArray(value.years) && value.years.every((y) => typeof y === 'number')
        && isRecord(files)
        && ARTIFACT_NAMES.every((name) => isManifestEntry(files[name]));
}

async function readManifest(versionDir: string): Promise<ArtifactManifest> {
    const manifestPath = path.join(versionDir, MANIFEST_FILE);
    let parsed: unknown;
    try {
        parsed = JSON.parse(await fs.readFile(manifestPath, 'utf8'));
    } catch (err) {
        throw new ArtifactIntegrityError(`${manifestPath}: unreadable manifest (${String(err)})`);
    }
    if (!isManifest(parsed)) {
        throw new ArtifactIntegrityError(`${manifestPath}: malformed manifest`);
    }
    return parsed;
}

// ── Pointer ──────────────────────────────────────────────────────────────────

/**
 * Version id named by CURRENT. Throws ArtifactNotFoundError when nothing has
 * been published yet.
 */
export async function readCurrentVersion(dir: string): Promise<string> {
    let raw: string;
    try {
        raw = await fs.readFile(path.join(dir, CURRENT_POINTER_FILE), 'utf8');
    } catch (err) {
        if (err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT') {
            throw new ArtifactNotFoundError(dir);
        }
        throw err;
    }

    const version = raw.trim();
    if (!VERSION_ID_PATTERN.test(version)) {
        throw new ArtifactIntegrityError(`${dir}: CURRENT holds an invalid version id '${version}'`);
    }
    return version;
}

export async function listVersions(dir: string): Promise<string[]> {
    try {
        const entries = await fs.readdir(dir, { withFileTypes: true });
        return entries
            .filter((e) => e.isDirectory() && VERSION_ID_PATTERN.test(e.name))
            .map((e) => e.name)
            .sort();
    } catch (err) {
        if (err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT') return [];
        throw err;
    }
}

async function hasManifest(versionDir: string): Promise<boolean> {
    try {
        await fs.access(path.join(versionDir, MANIFEST_FILE));
        return true;
    } catch (err) {
        if (err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT') return false;
        throw err;
    }
}

/**
 * Removes complete versions beyond `keep`, newest first. Directories without
 * a manifest are neither counted nor removed.
 */
async function pruneVersions(dir: string, current: string, keep: number): Promise<string[]> {
    const complete: string[] = [];
    for (const version of (await listVersions(dir)).reverse()) {
        if (version !== current && await hasManifest(path.join(dir, version))) complete.push(version);
    }
    const doomed = complete.slice(Math.max(0, keep - 1));
    for (const version of doomed) {
        await fs.rm(path.join(dir, version), { recursive: true, force: true });
    }
    return doomed;
}

// ── Publish / load ───────────────────────────────────────────────────────────

export async function publishArtifacts(
    dir: string,
    artifacts: ArtifactSet,
    options: PublishOptions = {},
): Promise<PublishResult> {
    const codec = options.codec ?? 'zstd';
    const keepVersions = Math.max(1, options.keepVersions ?? 2);
    const logger = options.logger ?? null;
    const runId = options.runId ?? `run_${Date.now()}_${Math.random().toString(36).slice(2, 7)}`;

    const payloads: Record<ArtifactName, { ipc: Uint8Array; rows: number }> = {
        monthly_total: { ipc: encodeMonthlyTotal(artifacts.monthlyTotal), rows: artifacts.monthlyTotal.length },
        monthly_type: { ipc: encodeMonthlyByType(artifacts.monthlyByType), rows: artifacts.monthlyByType.length },
        sample_points: { ipc: encodeSamplePoints(artifacts.samplePoints), rows: artifacts.samplePoints.length },
    };

    return withArtifactDir(dir, 'write', async () => {
        await fs.mkdir(dir, { recursive: true });

        const version = newVersionId();
        const versionDir = path.join(dir, version);
        await fs.mkdir(versionDir);

        const writeEntry = async (name: ArtifactName): Promise<ManifestEntry> => {
            const framed = await frameArtifact(payloads[name].ipc, codec, options.compressionLevel);
            const file = artifactFileName(name);
            await fs.writeFile(path.join(versionDir, file), framed.bytes);
            return { file, rows: payloads[name].rows, bytes: framed.bytes.length, crc32: framed.crc32 };
        };

        let manifest: ArtifactManifest;
        try {
            const files: Record<ArtifactName, ManifestEntry> = {
                monthly_total: await writeEntry('monthly_total'),
                monthly_type: await writeEntry('monthly_type'),
                sample_points: await writeEntry('sample_points'),
            };

            const years = Array.from(new Set(artifacts.samplePoints.map((p) => p.year))).sort((a, b) => a - b);
            manifest = {
                formatVersion: MANIFEST_FORMAT_VERSION,
                version,
                runId,
                createdAt: new Date().toISOString(),
                codec,
                years,
                files,
            };
            await writeFileAtomic(path.join(versionDir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));

            // The swap: from here on readers see the new set.
            await writeFileAtomic(path.join(dir, CURRENT_POINTER_FILE), `${version}\n`);
        } catch (err) {
            logger?.error?.(`[crime-agg] Publish of ${version} failed, removing it: ${err instanceof Error ? err.message : String(err)}`);
            await fs.rm(versionDir, { recursive: true, force: true });
            throw err;
        }
        logger?.info?.(`[crime-agg] Published ${version} to ${dir}`);

        const pruned = await pruneVersions(dir, version, keepVersions);
        if (pruned.length > 0) {
            logger?.info?.(`[crime-agg] Pruned ${pruned.length} old version(s): ${pruned.join(', ')}`);
        }

        return { version, versionDir, manifest, pruned };
    }, options.lockTimeoutMs);
}

async function readArtifactPayload(versionDir: string, entry: ManifestEntry): Promise<Uint8Array> {
    const filePath = path.join(versionDir, entry.file);
    return unframeArtifact(await fs.readFile(filePath), filePath);
}

function checkRowCount(name: ArtifactName, actual: number, manifest: ArtifactManifest): void {
    const expected = manifest.files[name].rows;
    if (actual !== expected) {
        throw new ArtifactIntegrityError(`${name}: manifest lists ${expected} rows, file holds ${actual}`);
    }
}

/**
 * Loads the set named by CURRENT.
 */
export async function loadArtifacts(dir: string, options: LoadOptions = {}): Promise<LoadedArtifacts> {
    return withArtifactDir(dir, 'read', async () => {
        const version = await readCurrentVersion(dir);
        const versionDir = path.join(dir, version);
        const manifest = await readManifest(versionDir);
        if (manifest.version !== version) {
            throw new ArtifactIntegrityError(`${versionDir}: manifest names version ${manifest.version}`);
        }

        const monthlyTotal = decodeMonthlyTotal(await readArtifactPayload(versionDir, manifest.files.monthly_total));
        const monthlyByType = decodeMonthlyByType(await readArtifactPayload(versionDir, manifest.files.monthly_type));
        const samplePoints = decodeSamplePoints(await readArtifactPayload(versionDir, manifest.files.sample_points));

        checkRowCount('monthly_total', monthlyTotal.length, manifest);
        checkRowCount('monthly_type', monthlyByType.length, manifest);
        checkRowCount('sample_points', samplePoints.length, manifest);

        options.logger?.info?.(
            `[crime-agg] Loaded ${version}: ${monthlyTotal.length} months, ${monthlyByType.length} type rows, ${samplePoints.length} points`
        );
        return { version, manifest, artifacts: { monthlyTotal, monthlyByType, samplePoints } };
    }, options.lockTimeoutMs);
}

/**
 * Checks every file of the current version against its frame and the
 * manifest, without decompressing payloads.
 */
export async function verifyArtifactDir(dir: string): Promise<VerifyReport> {
    return withArtifactDir(dir, 'read', async () => {
        const version = await readCurrentVersion(dir);
        const versionDir = path.join(dir, version);
        const problems: string[] = [];

        let manifest: ArtifactManifest;
        try {
            manifest = await readManifest(versionDir);
        } catch (err) {
            if (err instanceof ArtifactIntegrityError) {
                return { ok: false, version, problems: [err.message] };
            }
            throw err;
        }

        for (const name of ARTIFACT_NAMES) {
            const entry = manifest.files[name];
            const filePath = path.join(versionDir, entry.file);
            try {
                const bytes = await fs.readFile(filePath);
                const header = verifyArtifactBytes(bytes, filePath);
                if (header.crc32 !== entry.crc32) problems.push(`${name}: CRC differs from manifest`);
                if (bytes.length !== entry.bytes) problems.push(`${name}: size differs from manifest`);
            } catch (err) {
                if (err instanceof ArtifactIntegrityError) {
                    problems.push(err.message);
                } else if (err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT') {
                    problems.push(`${name}: file missing`);
                } else {
                    throw err;
                }
            }
        }

        return { ok: problems.length === 0, version, problems };
    });
}
