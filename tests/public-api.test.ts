import CrimeAgg, { CRIME_AGG_VERSION, NoPartitionsError } from '../src/index.js';
import { incidents, partition, withTempDir } from './helpers/test-utils.js';

describe('CrimeAgg namespace', () => {
    it('aggregates, publishes, opens and queries', async () => {
        await withTempDir(async (dir) => {
            const { artifacts } = CrimeAgg.aggregate([
                partition(2020, [...incidents(2020, 1, 'THEFT', 4), ...incidents(2020, 1, 'BATTERY', 6)]),
            ]);
            const published = await CrimeAgg.publish(dir, artifacts);

            expect((await CrimeAgg.verify(dir)).ok).toBe(true);
            expect((await CrimeAgg.load(dir)).artifacts).toEqual(artifacts);

            const handle = await CrimeAgg.open(dir);
            const result = handle.query({ start: '2020-01-01', end: '2020-01-31' }, CrimeAgg.TypeFilter.subset(['THEFT']));

            expect(handle.version).toBe(published.version);
            expect(result.totals).toEqual({ totalInRange: 10, totalSelectedTypes: 4, matchedPoints: 4, renderedPoints: 4 });
            expect(CrimeAgg.query(artifacts, { start: '2020-01-01', end: '2020-01-31' })).toEqual(
                handle.query({ start: '2020-01-01', end: '2020-01-31' })
            );
        });
    });

    it('exposes the error classes', () => {
        expect(() => CrimeAgg.aggregate([])).toThrow(NoPartitionsError);
        expect(CRIME_AGG_VERSION).toBe('1.0.0');
    });
});
