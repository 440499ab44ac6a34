import { floorToDay, floorToMonth, formatDay, formatMonth, nextMonth, parseTimestamp } from '../src/agg-utils.js';
import { cleanIncident, cleanRows } from '../src/aggregate/clean.js';
import { incident, utc } from './helpers/test-utils.js';

describe('parseTimestamp', () => {
    it('reads ISO strings without an offset as UTC wall-clock time', () => {
        expect(parseTimestamp('2020-01-15T10:30:00')).toBe(Date.UTC(2020, 0, 15, 10, 30, 0));
        expect(parseTimestamp('2020-01-15 10:30')).toBe(Date.UTC(2020, 0, 15, 10, 30));
        expect(parseTimestamp('2020-01-15')).toBe(Date.UTC(2020, 0, 15));
    });

    it('keeps milliseconds from a fractional second', () => {
        expect(parseTimestamp('2020-01-15 10:30:00.5')).toBe(Date.UTC(2020, 0, 15, 10, 30, 0, 500));
        expect(parseTimestamp('2020-01-15T10:30:00.123456')).toBe(Date.UTC(2020, 0, 15, 10, 30, 0, 123));
    });

    it('applies explicit offsets', () => {
        expect(parseTimestamp('2020-01-15T10:30:00Z')).toBe(Date.UTC(2020, 0, 15, 10, 30));
        expect(parseTimestamp('2020-01-15T10:30:00+02:00')).toBe(Date.UTC(2020, 0, 15, 8, 30));
        expect(parseTimestamp('2020-01-15T10:30:00-0500')).toBe(Date.UTC(2020, 0, 15, 15, 30));
    });

    it('reads the portal export format with AM/PM', () => {
        expect(parseTimestamp('01/15/2020 10:30:00 PM')).toBe(Date.UTC(2020, 0, 15, 22, 30));
        expect(parseTimestamp('01/15/2020 12:05:00 AM')).toBe(Date.UTC(2020, 0, 15, 0, 5));
        expect(parseTimestamp('01/15/2020 12:05:00 PM')).toBe(Date.UTC(2020, 0, 15, 12, 5));
        expect(parseTimestamp('1/5/2020')).toBe(Date.UTC(2020, 0, 5));
    });

    it('accepts epoch numbers, bigints and Dates', () => {
        const ms = Date.UTC(2020, 0, 1);
        expect(parseTimestamp(ms)).toBe(ms);
        expect(parseTimestamp(BigInt(ms))).toBe(ms);
        expect(parseTimestamp(new Date(ms))).toBe(ms);
    });

    it('returns null for anything unreadable', () => {
        expect(parseTimestamp('2020-02-30')).toBeNull();
        expect(parseTimestamp('13/01/2020 10:00:00 AM')).toBeNull();
        expect(parseTimestamp('01/15/2020 13:00:00 PM')).toBeNull();
        expect(parseTimestamp('2020-01-15T24:00:00')).toBeNull();
        expect(parseTimestamp('yesterday')).toBeNull();
        expect(parseTimestamp('')).toBeNull();
        expect(parseTimestamp(Number.NaN)).toBeNull();
        expect(parseTimestamp(Number.POSITIVE_INFINITY)).toBeNull();
        expect(parseTimestamp(new Date('not a date'))).toBeNull();
        expect(parseTimestamp(null)).toBeNull();
        expect(parseTimestamp(undefined)).toBeNull();
        expect(parseTimestamp({})).toBeNull();
    });

    it('returns null for epoch values outside the Date range', () => {
        expect(parseTimestamp(9e15)).toBeNull();
        expect(parseTimestamp(BigInt(9e15))).toBeNull();
        expect(parseTimestamp(-8.64e15)).toBeNull();
        expect(parseTimestamp(8.64e15)).toBe(8.64e15);
    });
});

describe('calendar helpers', () => {
    it('floors to month and day on the UTC clock', () => {
        const ms = Date.UTC(2021, 6, 31, 23, 59, 59);
        expect(floorToMonth(ms)).toBe(Date.UTC(2021, 6, 1));
        expect(floorToDay(ms)).toBe(Date.UTC(2021, 6, 31));
    });

    it('steps across the year boundary', () => {
        expect(nextMonth(Date.UTC(2020, 11, 1))).toBe(Date.UTC(2021, 0, 1));
    });

    it('formats months and days', () => {
        expect(formatMonth(Date.UTC(2020, 1, 1))).toBe('2020-02');
        expect(formatDay(Date.UTC(2020, 1, 29, 13))).toBe('2020-02-29');
    });
});

describe('cleanIncident', () => {
    it('keeps a complete row and derives its month', () => {
        const clean = cleanIncident(incident('2020-03-05T08:00:00', 'THEFT', 41.9, -87.6));
        expect(clean).toEqual({
            date: Date.UTC(2020, 2, 5, 8),
            primary_type: 'THEFT',
            latitude: 41.9,
            longitude: -87.6,
            month: Date.UTC(2020, 2, 1),
        });
    });

    it('trims the category and accepts numeric coordinate strings', () => {
        const clean = cleanIncident(incident(utc(2020, 3, 5), '  BATTERY ', '41.75', '-87.55'));
        expect(clean?.primary_type).toBe('BATTERY');
        expect(clean?.latitude).toBe(41.75);
        expect(clean?.longitude).toBe(-87.55);
    });

    it.each([
        ['missing date', incident(null, 'THEFT')],
        ['unparseable date', incident('not-a-date', 'THEFT')],
        ['missing type', incident(utc(2020, 1), null)],
        ['blank type', incident(utc(2020, 1), '   ')],
        ['non-string type', incident(utc(2020, 1), 7)],
        ['missing latitude', incident(utc(2020, 1), 'THEFT', null)],
        ['missing longitude', incident(utc(2020, 1), 'THEFT', 41.9, null)],
        ['empty coordinate string', incident(utc(2020, 1), 'THEFT', '')],
        ['NaN coordinate', incident(utc(2020, 1), 'THEFT', Number.NaN)],
    ])('drops a row with %s', (_label, raw) => {
        expect(cleanIncident(raw)).toBeNull();
    });
});

describe('cleanRows', () => {
    it('counts drops instead of raising', () => {
        const result = cleanRows([
            incident(utc(2020, 1, 2), 'THEFT'),
            incident(null, 'THEFT'),
            incident(utc(2020, 1, 3), 'BATTERY'),
            incident(utc(2020, 1, 4), 'THEFT', null),
        ]);
        expect(result.rowsRead).toBe(4);
        expect(result.rowsDropped).toBe(2);
        expect(result.rows.map((r) => r.primary_type)).toEqual(['THEFT', 'BATTERY']);
    });

    it('drops a row whose epoch has no calendar month', () => {
        const result = cleanRows([incident(utc(2020, 1, 2), 'THEFT'), incident(9e15, 'THEFT')]);
        expect(result.rowsDropped).toBe(1);
        expect(result.rows.map((r) => r.month)).toEqual([utc(2020, 1)]);
    });
});
