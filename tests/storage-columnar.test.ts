import { tableFromArrays, tableToIPC } from 'apache-arrow';
import type { SamplePoint } from '../src/agg-types.js';
import { ArtifactIntegrityError } from '../src/errors.js';
import {
    decodeMonthlyByType,
    decodeMonthlyTotal,
    decodeSamplePoints,
    encodeMonthlyByType,
    encodeMonthlyTotal,
    encodeSamplePoints,
    readArtifactColumns,
} from '../src/storage/columnar.js';
import { utc } from './helpers/test-utils.js';

const points: SamplePoint[] = [
    { date: utc(2020, 1, 3, 9), primary_type: 'THEFT', latitude: 41.881, longitude: -87.623, year: 2020 },
    { date: utc(2021, 7, 4, 22), primary_type: 'BATTERY', latitude: 41.79, longitude: -87.6, year: 2021 },
];

describe('artifact tables', () => {
    it('restores every table', () => {
        const totals = [{ month: utc(2020, 1), count: 12 }, { month: utc(2020, 2), count: 0 }];
        const byType = [
            { month: utc(2020, 1), primary_type: 'BATTERY', count: 5 },
            { month: utc(2020, 1), primary_type: 'THEFT', count: 7 },
        ];

        expect(decodeMonthlyTotal(encodeMonthlyTotal(totals))).toEqual(totals);
        expect(decodeMonthlyByType(encodeMonthlyByType(byType))).toEqual(byType);
        expect(decodeSamplePoints(encodeSamplePoints(points))).toEqual(points);
    });

    it('reads only the requested columns', () => {
        const columns = readArtifactColumns(encodeSamplePoints(points), ['year', 'primary_type'], 'sample_points');

        expect(Array.from(columns.keys())).toEqual(['year', 'primary_type']);
        expect(columns.get('year')).toEqual([2020, 2021]);
        expect(columns.get('primary_type')).toEqual(['THEFT', 'BATTERY']);
    });

    it('fails on a missing column', () => {
        const ipc = tableToIPC(tableFromArrays({ month: Float64Array.from([utc(2020, 1)]) }));
        expect(() => decodeMonthlyTotal(ipc)).toThrow("monthly_total: missing column 'count'");
    });

    it('fails on a negative count', () => {
        const ipc = encodeMonthlyTotal([{ month: utc(2020, 1), count: -1 }]);
        expect(() => decodeMonthlyTotal(ipc)).toThrow(new ArtifactIntegrityError('monthly_total: invalid count at row 0'));
    });
});
