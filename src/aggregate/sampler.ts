/**
 * Seeded uniform sampling without replacement.
 *
 * Each call builds its own generator from the seed, so a sample depends only
 * on (input length, sample size, seed) and never on what ran before it.
 */

export class SeededRng {
    private state: number;

    constructor(seed: number) {
        this.state = Math.trunc(seed) % 2147483647;
        if (this.state <= 0) this.state += 2147483646;
    }

    /** Uniform in [0, 1). */
    next(): number {
        this.state = (this.state * 16807) % 2147483647;
        return (this.state - 1) / 2147483646;
    }

    nextInt(minInclusive: number, maxExclusive: number): number {
        return Math.floor(this.next() * (maxExclusive - minInclusive)) + minInclusive;
    }
}

/**
 * Picks `k` distinct indices out of `[0, n)`, returned in ascending order.
 * When `k >= n` every index is returned.
 */
export function sampleIndices(n: number, k: number, seed: number): number[] {
    if (k >= n) {
        return Array.from({ length: n }, (_, i) => i);
    }
    if (k <= 0) return [];

    const rng = new SeededRng(seed);
    const pool = new Int32Array(n);
    for (let i = 0; i < n; i++) pool[i] = i;

    // Partial Fisher-Yates: the first k slots end up holding the sample.
    for (let i = 0; i < k; i++) {
        const j = rng.nextInt(i, n);
        const tmp = pool[i];
        pool[i] = pool[j];
        pool[j] = tmp;
    }

    return Array.from(pool.subarray(0, k)).sort((a, b) => a - b);
}

/**
 * Returns `rows` unchanged (as a copy) when it fits under `cap`, otherwise a
 * seeded uniform sample of exactly `cap` rows in source order.
 */
export function sampleRows<T>(rows: readonly T[], cap: number, seed: number): T[] {
    if (rows.length <= cap) return rows.slice();
    return sampleIndices(rows.length, cap, seed).map((i) => rows[i]);
}
