import { describe, expect, it } from 'vitest';
import { normalizeReadings, parseMeasureNotation, parseTimestamp, parseValue, totalDropped } from './readings';

const S1 = { id: 'S1' };

describe('normalizeReadings', () => {
    it('drops records without a value and keeps the rest', () => {
        const { readings, dropped } = normalizeReadings([
            { ts: '2024-01-01T00:00:00Z', value: 1.2, unit: 'm' },
            { ts: '2024-01-01T01:00:00Z', value: null }
        ], S1);

        expect(readings).toEqual([{
            stationId: 'S1',
            timestamp: '2024-01-01T00:00:00.000Z',
            measure: 'level',
            value: 1.2,
            unit: 'm'
        }]);
        expect(dropped.missingValue).toBe(1);
        expect(totalDropped(dropped)).toBe(1);
    });

    it('returns an empty result for no input', () => {
        const result = normalizeReadings([], S1);
        expect(result.readings).toEqual([]);
        expect(totalDropped(result.dropped)).toBe(0);
    });

    it('sorts ascending by timestamp and keeps input order for ties', () => {
        const { readings } = normalizeReadings([
            { ts: '2024-01-01T02:00:00Z', value: 3 },
            { ts: '2024-01-01T00:00:00Z', value: 1 },
            { ts: '2024-01-01T01:00:00Z', value: 2, measure: 'flow' },
            { ts: '2024-01-01T01:00:00Z', value: 2.5 },
            { ts: '2024-01-01T00:30:00+01:00', value: 0 }
        ], S1);

        expect(readings.map(r => r.value)).toEqual([0, 1, 2, 2.5, 3]);
        expect(readings.map(r => r.timestamp)).toEqual([
            '2023-12-31T23:30:00.000Z',
            '2024-01-01T00:00:00.000Z',
            '2024-01-01T01:00:00.000Z',
            '2024-01-01T01:00:00.000Z',
            '2024-01-01T02:00:00.000Z'
        ]);
    });

    it('reads readings whose measure is a URI', () => {
        const { readings } = normalizeReadings([{
            '@id': 'http://environment.data.gov.uk/flood-monitoring/data/readings/1491TH-flow--i-15_min-m3_s/2024-01-01T00-00-00Z',
            dateTime: '2024-01-01T00:00:00Z',
            measure: 'http://environment.data.gov.uk/flood-monitoring/id/measures/1491TH-flow--i-15_min-m3_s',
            value: 0.412
        }], { id: '1491TH' });

        expect(readings).toEqual([{
            stationId: '1491TH',
            timestamp: '2024-01-01T00:00:00.000Z',
            measure: 'flow',
            value: 0.412,
            unit: 'm3_s',
            measureId: '1491TH-flow--i-15_min-m3_s'
        }]);
    });

    it('reads embedded measure objects', () => {
        const { readings } = normalizeReadings([{
            dateTime: '2024-01-01T00:15:00Z',
            measure: {
                '@id': 'http://environment.data.gov.uk/flood-monitoring/id/measures/E1-level-stage-i-15_min-mASD',
                parameter: 'level',
                qualifier: 'Stage',
                unitName: 'mASD',
                stationReference: 'E1'
            },
            value: 2.05
        }], { id: 'E1' });

        expect(readings[0]).toEqual({
            stationId: 'E1',
            timestamp: '2024-01-01T00:15:00.000Z',
            measure: 'level',
            value: 2.05,
            unit: 'mASD',
            qualifier: 'Stage',
            measureId: 'E1-level-stage-i-15_min-mASD'
        });
    });

    it('passes units through without conversion', () => {
        const { readings } = normalizeReadings([
            { ts: '2024-01-01T00:00:00Z', value: 120, unit: 'cm' },
            { ts: '2024-01-01T00:15:00Z', value: 1.21, unit: 'm' }
        ], S1);

        expect(readings.map(r => [r.value, r.unit])).toEqual([[120, 'cm'], [1.21, 'm']]);
    });

    it('counts each reason a record is dropped', () => {
        const { readings, dropped } = normalizeReadings([
            { value: 1 },
            { ts: 'yesterday', value: 1 },
            { ts: '2024-01-01T00:00:00Z', value: 'n/a' },
            { ts: '2024-01-01T00:00:00Z', value: 1, parameter: 'rainfall' },
            { ts: '2024-01-01T00:00:00Z', value: 1, stationId: 'S9' },
            { ts: '2024-01-01T00:00:00Z', value: '1.5', parameter: 'Water Level' }
        ], S1);

        expect(dropped).toEqual({ missingTimestamp: 2, missingValue: 1, unsupportedMeasure: 1, otherStation: 1 });
        expect(readings).toHaveLength(1);
        expect(readings[0]).toMatchObject({ value: 1.5, measure: 'level' });
    });
});

describe('parseTimestamp', () => {
    it('treats timestamps without an offset as UTC', () => {
        expect(parseTimestamp('2024-06-01T12:00:00')).toBe('2024-06-01T12:00:00.000Z');
        expect(parseTimestamp('2024-06-01')).toBe('2024-06-01T00:00:00.000Z');
    });

    it('applies explicit offsets', () => {
        expect(parseTimestamp('2024-06-01T12:00:00+01:00')).toBe('2024-06-01T11:00:00.000Z');
    });

    it('rejects missing and unparseable values', () => {
        expect(parseTimestamp(undefined)).toBeNull();
        expect(parseTimestamp('')).toBeNull();
        expect(parseTimestamp('01/06/2024 12:00')).toBeNull();
        expect(parseTimestamp(1717243200000)).toBeNull();
    });
});

describe('parseValue', () => {
    it('accepts finite numbers, numeric strings and array-wrapped values', () => {
        expect(parseValue(0)).toBe(0);
        expect(parseValue('2.5')).toBe(2.5);
        expect(parseValue([0.7, 0.8])).toBe(0.7);
    });

    it('rejects null, blanks and non-finite numbers', () => {
        expect(parseValue(null)).toBeNull();
        expect(parseValue('  ')).toBeNull();
        expect(parseValue(Number.NaN)).toBeNull();
        expect(parseValue(Infinity)).toBeNull();
    });
});

describe('parseMeasureNotation', () => {
    it('splits a measure notation into its parts', () => {
        expect(parseMeasureNotation('http://x/id/measures/1029TH-level-downstage-i-15_min-mASD')).toEqual({
            notation: '1029TH-level-downstage-i-15_min-mASD',
            stationRef: '1029TH',
            parameter: 'level',
            qualifier: 'downstage',
            unit: 'mASD'
        });
    });

    it('returns null for strings that are not notations', () => {
        expect(parseMeasureNotation('level')).toBeNull();
    });
});
