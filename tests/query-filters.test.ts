import { MalformedFilterError } from '../src/errors.js';
import { TypeFilter, inDayRange, inMonthRange, resolveDateRange } from '../src/query/filters.js';
import { utc } from './helpers/test-utils.js';

describe('resolveDateRange', () => {
    it('derives day and month bounds', () => {
        expect(resolveDateRange({ start: '2020-01-15', end: '2020-02-10' })).toEqual({
            start: utc(2020, 1, 15),
            endExclusive: utc(2020, 2, 11),
            monthStart: utc(2020, 1),
            monthEnd: utc(2020, 2),
        });
    });

    it('floors timestamps with a time of day to their day', () => {
        const range = resolveDateRange({ start: '2020-03-01T18:45:00', end: '2020-03-01T06:00:00' });
        expect(range.start).toBe(utc(2020, 3, 1));
        expect(range.endExclusive).toBe(utc(2020, 3, 2));
    });

    it('rejects an end before the start', () => {
        expect(() => resolveDateRange({ start: '2020-02-01', end: '2020-01-01' })).toThrow(
            new MalformedFilterError('Date range is inverted: end 2020-01-01 is before start 2020-02-01')
        );
    });

    it('names the bound it cannot read', () => {
        expect(() => resolveDateRange({ start: '2020-01-01', end: '2020-13-01' })).toThrow('Invalid end date: 2020-13-01');
    });

    it('rejects an epoch bound past the end of the Date range', () => {
        expect(() => resolveDateRange({ start: 0, end: 9e15 })).toThrow(
            new MalformedFilterError('Invalid end date: 9000000000000000')
        );
    });

    it('tests membership at month and day granularity', () => {
        const range = resolveDateRange({ start: '2020-01-15', end: '2020-02-10' });
        expect(inMonthRange(utc(2020, 1), range)).toBe(true);
        expect(inMonthRange(utc(2020, 3), range)).toBe(false);
        expect(inDayRange(utc(2020, 2, 10, 23), range)).toBe(true);
        expect(inDayRange(utc(2020, 2, 11), range)).toBe(false);
    });
});

describe('TypeFilter', () => {
    it('matches every type for all', () => {
        expect(TypeFilter.matches(TypeFilter.all(), 'ANYTHING')).toBe(true);
    });

    it('matches only the named types for a subset', () => {
        const filter = TypeFilter.subset(['THEFT', 'BATTERY']);
        expect(TypeFilter.matches(filter, 'THEFT')).toBe(true);
        expect(TypeFilter.matches(filter, 'ARSON')).toBe(false);
    });

    it('keeps an empty subset distinct from all', () => {
        expect(TypeFilter.subset([])).toEqual({ kind: 'subset', types: new Set() });
        expect(TypeFilter.matches(TypeFilter.subset([]), 'THEFT')).toBe(false);
    });

    it('maps an empty selection to all', () => {
        expect(TypeFilter.fromSelection([])).toEqual({ kind: 'all' });
        expect(TypeFilter.fromSelection(['THEFT'])).toEqual({ kind: 'subset', types: new Set(['THEFT']) });
    });
});
