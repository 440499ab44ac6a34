/**
 * Locking around an artifact directory.
 *
 * Two layers:
 *  - `withArtifactDir` serializes publishes against loads inside one process.
 *    Loads share the directory; a publish has it alone. A waiting publish
 *    holds back loads that arrive after it.
 *  - `BatchLock` keeps two batch runs (possibly in different processes) from
 *    aggregating into the same directory. It is a marker file created with
 *    O_EXCL next to the directory, recording who holds it.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { wait } from '../agg-utils.js';
import { LockTimeoutError } from '../errors.js';

export type DirAccess = 'read' | 'write';

interface Waiter {
    access: DirAccess;
    admit: () => void;
}

/** Per-directory admission state: >0 readers inside, -1 a writer, 0 idle. */
class DirGate {
    private occupancy = 0;
    private readonly waiting: Waiter[] = [];

    get idle(): boolean {
        return this.occupancy === 0 && this.waiting.length === 0;
    }

    private fits(access: DirAccess): boolean {
        return access === 'read' ? this.occupancy >= 0 : this.occupancy === 0;
    }

    private take(access: DirAccess): void {
        this.occupancy = access === 'read' ? this.occupancy + 1 : -1;
    }

    enter(access: DirAccess, dir: string, timeoutMs: number): Promise<void> {
        if (this.waiting.length === 0 && this.fits(access)) {
            this.take(access);
            return Promise.resolve();
        }

        return new Promise<void>((resolve, reject) => {
            const waiter: Waiter = {
                access,
                admit: () => {
                    clearTimeout(timer);
                    resolve();
                },
            };
            const timer = setTimeout(() => {
                const idx = this.waiting.indexOf(waiter);
                if (idx === -1) return;
                this.waiting.splice(idx, 1);
                reject(new LockTimeoutError(`${access} access to ${dir} not granted within ${timeoutMs}ms`));
                this.admitWaiting();
            }, timeoutMs);
            this.waiting.push(waiter);
        });
    }

    leave(): void {
        this.occupancy = this.occupancy > 0 ? this.occupancy - 1 : 0;
        this.admitWaiting();
    }

    private admitWaiting(): void {
        while (this.waiting.length > 0 && this.fits(this.waiting[0].access)) {
            const next = this.waiting.shift();
            if (!next) break;
            this.take(next.access);
            next.admit();
            if (next.access === 'write') break;
        }
    }
}

const gates = new Map<string, DirGate>();

/**
 * Runs `fn` with read or write access to `dir` within this process. Paths are
 * compared after `path.resolve`.
 */
export async function withArtifactDir<T>(
    dir: string,
    access: DirAccess,
    fn: () => Promise<T>,
    timeoutMs: number = 5000,
): Promise<T> {
    const key = path.resolve(dir);
    let gate = gates.get(key);
    if (!gate) {
        gate = new DirGate();
        gates.set(key, gate);
    }

    const entered = gate.enter(access, key, timeoutMs);
    try {
        await entered;
    } catch (err) {
        if (gate.idle) gates.delete(key);
        throw err;
    }
    try {
        return await fn();
    } finally {
        gate.leave();
        if (gate.idle) gates.delete(key);
    }
}

export interface BatchLockOwner {
    pid: number;
    runId: string;
    acquiredAt: string;
}

export function batchLockPath(artifactDir: string): string {
    return `${path.resolve(artifactDir)}.lock`;
}

function isBatchLockOwner(value: unknown): value is BatchLockOwner {
    if (typeof value !== 'object' || value === null) return false;
    const record: Record<string, unknown> = { ...value };
    return typeof record.pid === 'number'
        && typeof record.runId === 'string'
        && typeof record.acquiredAt === 'string';
}

/** Owner recorded in the marker, or null when there is none or it is unreadable. */
export async function readBatchLockOwner(artifactDir: string): Promise<BatchLockOwner | null> {
    let raw: string;
    try {
        raw = await fs.readFile(batchLockPath(artifactDir), 'utf8');
    } catch (err) {
        if (err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT') return null;
        throw err;
    }
    try {
        const parsed: unknown = JSON.parse(raw);
        return isBatchLockOwner(parsed) ? parsed : null;
    } catch (err) {
        // A holder that has created the marker but not yet written it.
        if (err instanceof SyntaxError) return null;
        throw err;
    }
}

export class BatchLock {
    private held = false;

    constructor(private readonly artifactDir: string, private readonly runId: string) {}

    get isHeld(): boolean {
        return this.held;
    }

    get markerPath(): string {
        return batchLockPath(this.artifactDir);
    }

    private async tryCreate(): Promise<boolean> {
        const owner: BatchLockOwner = { pid: process.pid, runId: this.runId, acquiredAt: new Date().toISOString() };
        try {
            await fs.writeFile(this.markerPath, JSON.stringify(owner), { flag: 'wx' });
            return true;
        } catch (err) {
            if (err instanceof Error && (err as NodeJS.ErrnoException).code === 'EEXIST') return false;
            throw err;
        }
    }

    async acquire(timeoutMs: number = 5000, retryIntervalMs: number = 100): Promise<void> {
        if (this.held) return;
        await fs.mkdir(path.dirname(this.markerPath), { recursive: true });

        const deadline = Date.now() + timeoutMs;
        while (!(await this.tryCreate())) {
            if (Date.now() >= deadline) {
                const owner = await readBatchLockOwner(this.artifactDir);
                const heldBy = owner ? ` (held by ${owner.runId}, pid ${owner.pid})` : '';
                throw new LockTimeoutError(`Batch lock ${this.markerPath} not acquired within ${timeoutMs}ms${heldBy}`);
            }
            await wait(retryIntervalMs);
        }
        this.held = true;
    }

    async release(): Promise<void> {
        if (!this.held) return;
        this.held = false;
        await fs.rm(this.markerPath, { force: true });
    }
}
