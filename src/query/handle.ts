/**
 * Process-level handle on the current artifact set.
 *
 * Built once at start-up and passed to whatever serves queries. Each query
 * reads the set referenced at the moment it starts; refresh() loads a newer
 * published set and swaps the reference in one assignment, so no caller ever
 * sees a mix of two sets.
 */
import type { ArtifactSet, CrimeAggLogger } from '../agg-types.js';
import { ArtifactIntegrityError, CrimeAggError } from '../errors.js';
import { loadArtifacts, readCurrentVersion } from '../storage/artifact-store.js';
import { query, type QueryOptions, type QueryResult } from './engine.js';
import { TypeFilter, type DateRangeInput } from './filters.js';
import { checkConsistency, describeArtifacts, type ArtifactDescription } from './inspect.js';
import { formatMonth } from '../agg-utils.js';

export type ArtifactHandleOptions = {
    logger?: CrimeAggLogger | null;
    /** Defaults merged under the options of every query. */
    queryDefaults?: QueryOptions;
    /** Reject sets whose per-type counts do not add up to the totals. Default true. */
    verifyConsistency?: boolean;
};

export interface ArtifactSnapshot {
    version: string;
    artifacts: ArtifactSet;
}

// Rows are copied as well: query results hand out the stored sample points.
function freezeRows<T extends object>(rows: readonly T[]): readonly T[] {
    return Object.freeze(rows.map((row) => Object.freeze({ ...row })));
}

function freezeSet(artifacts: ArtifactSet): ArtifactSet {
    return Object.freeze({
        monthlyTotal: freezeRows(artifacts.monthlyTotal),
        monthlyByType: freezeRows(artifacts.monthlyByType),
        samplePoints: freezeRows(artifacts.samplePoints),
    });
}

export class ArtifactHandle {
    private current: ArtifactSnapshot;
    private pendingRefresh: Promise<boolean> | null = null;
    private readonly logger: CrimeAggLogger | null;
    private readonly queryDefaults: QueryOptions;
    private readonly verifyConsistency: boolean;

    private constructor(
        private readonly dir: string | null,
        initial: ArtifactSnapshot,
        options: ArtifactHandleOptions,
    ) {
        this.logger = options.logger ?? null;
        this.queryDefaults = options.queryDefaults ?? {};
        this.verifyConsistency = options.verifyConsistency ?? true;
        this.current = this.accept(initial);
    }

    /** Loads the currently published set from `dir`. */
    static async open(dir: string, options: ArtifactHandleOptions = {}): Promise<ArtifactHandle> {
        const loaded = await loadArtifacts(dir, { logger: options.logger });
        return new ArtifactHandle(dir, { version: loaded.version, artifacts: loaded.artifacts }, options);
    }

    /** Wraps a set that never touched disk, e.g. straight out of the aggregator. */
    static fromArtifacts(artifacts: ArtifactSet, options: ArtifactHandleOptions = {}): ArtifactHandle {
        return new ArtifactHandle(null, { version: 'in-memory', artifacts }, options);
    }

    get version(): string {
        return this.current.version;
    }

    get artifacts(): ArtifactSet {
        return this.current.artifacts;
    }

    snapshot(): ArtifactSnapshot {
        return this.current;
    }

    query(dateRange: DateRangeInput, typeFilter: TypeFilter = TypeFilter.all(), options: QueryOptions = {}): QueryResult {
        const { artifacts } = this.current;
        return query(artifacts, dateRange, typeFilter, { ...this.queryDefaults, ...options });
    }

    describe(): ArtifactDescription {
        return describeArtifacts(this.current.artifacts);
    }

    /**
     * Swaps in a set directly. The previous set stays valid for anyone still
     * holding it.
     */
    replace(artifacts: ArtifactSet, version: string = `in-memory-${Date.now()}`): void {
        this.current = this.accept({ version, artifacts });
    }

    /**
     * Loads the newest published set if it differs from the one held.
     * Resolves true when a swap happened. Concurrent calls share one load.
     */
    async refresh(): Promise<boolean> {
        const dir = this.dir;
        if (dir === null) {
            throw new CrimeAggError('refresh() needs a handle opened from an artifact directory');
        }
        if (this.pendingRefresh) return this.pendingRefresh;

        const run = async (): Promise<boolean> => {
            const published = await readCurrentVersion(dir);
            if (published === this.current.version) return false;

            const loaded = await loadArtifacts(dir, { logger: this.logger });
            const previous = this.current.version;
            this.current = this.accept({ version: loaded.version, artifacts: loaded.artifacts });
            this.logger?.info?.(`[crime-agg] Swapped artifact set ${previous} -> ${loaded.version}`);
            return true;
        };

        this.pendingRefresh = run();
        try {
            return await this.pendingRefresh;
        } finally {
            this.pendingRefresh = null;
        }
    }

    private accept(snapshot: ArtifactSnapshot): ArtifactSnapshot {
        if (this.verifyConsistency) {
            const issues = checkConsistency(snapshot.artifacts);
            if (issues.length > 0) {
                const first = issues[0];
                throw new ArtifactIntegrityError(
                    `Artifact set ${snapshot.version} is inconsistent in ${issues.length} month(s), first ${formatMonth(first.month)}: ` +
                    `total=${first.total ?? 'missing'} typeSum=${first.typeSum ?? 'missing'}`
                );
            }
        }
        return { version: snapshot.version, artifacts: freezeSet(snapshot.artifacts) };
    }
}
