import { SeededRng, sampleIndices, sampleRows } from '../src/aggregate/sampler.js';

describe('SeededRng', () => {
    it('repeats its sequence for the same seed', () => {
        const a = new SeededRng(42);
        const b = new SeededRng(42);
        for (let i = 0; i < 100; i++) {
            expect(a.next()).toBe(b.next());
        }
    });

    it('starts from the Park-Miller recurrence', () => {
        const rng = new SeededRng(1);
        expect(rng.next()).toBe((16807 - 1) / 2147483646);
        expect(rng.next()).toBe((282475249 - 1) / 2147483646);
    });

    it('stays in [0, 1) for degenerate seeds', () => {
        for (const seed of [0, -5, 2147483647, 3.7]) {
            const rng = new SeededRng(seed);
            for (let i = 0; i < 50; i++) {
                const v = rng.next();
                expect(v).toBeGreaterThanOrEqual(0);
                expect(v).toBeLessThan(1);
            }
        }
    });

    it('keeps nextInt inside its bounds', () => {
        const rng = new SeededRng(7);
        for (let i = 0; i < 200; i++) {
            const v = rng.nextInt(3, 9);
            expect(Number.isInteger(v)).toBe(true);
            expect(v).toBeGreaterThanOrEqual(3);
            expect(v).toBeLessThan(9);
        }
    });
});

describe('sampleIndices', () => {
    it('returns exactly k distinct ascending indices', () => {
        const picked = sampleIndices(1000, 25, 42);
        expect(picked).toHaveLength(25);
        expect(new Set(picked).size).toBe(25);
        expect([...picked].sort((a, b) => a - b)).toEqual(picked);
        expect(picked.every((i) => i >= 0 && i < 1000)).toBe(true);
    });

    it('is deterministic for (n, k, seed)', () => {
        expect(sampleIndices(500, 10, 42)).toEqual(sampleIndices(500, 10, 42));
    });

    it('does not depend on earlier calls', () => {
        const first = sampleIndices(50, 5, 42);
        sampleIndices(80, 5, 42);
        sampleIndices(50, 20, 7);
        expect(sampleIndices(50, 5, 42)).toEqual(first);
    });

    it('returns every index when k >= n', () => {
        expect(sampleIndices(4, 4, 42)).toEqual([0, 1, 2, 3]);
        expect(sampleIndices(3, 10, 42)).toEqual([0, 1, 2]);
    });

    it('returns nothing for k <= 0', () => {
        expect(sampleIndices(10, 0, 42)).toEqual([]);
    });
});

describe('sampleRows', () => {
    it('returns a copy when the rows fit under the cap', () => {
        const rows = ['a', 'b', 'c'];
        const out = sampleRows(rows, 3, 42);
        expect(out).toEqual(rows);
        expect(out).not.toBe(rows);
    });

    it('keeps source order when sampling down', () => {
        const rows = Array.from({ length: 200 }, (_, i) => ({ id: i }));
        const out = sampleRows(rows, 20, 42);
        expect(out).toHaveLength(20);
        for (let i = 1; i < out.length; i++) {
            expect(out[i].id).toBeGreaterThan(out[i - 1].id);
        }
    });
});
