import type { DropCounts, MeasureType, NormalizeResult, Reading, Station } from '../types';
import { firstOf, isRecord, optionalString } from './records';

const MEASURE_ALIASES: Record<string, MeasureType> = {
    level: 'level',
    stage: 'level',
    'water level': 'level',
    flow: 'flow',
    discharge: 'flow'
};

const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;
const LOCAL_ISO = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?)?$/;

export const emptyDropCounts = (): DropCounts => ({
    missingTimestamp: 0,
    missingValue: 0,
    unsupportedMeasure: 0,
    otherStation: 0
});

/**
 * Parses a source timestamp to a UTC ISO string. Strings without an offset are
 * read as UTC, which is what the flood-monitoring API publishes.
 */
export function parseTimestamp(raw: unknown): string | null {
    if (typeof raw !== 'string') return null;
    const text = raw.trim();
    if (!text) return null;

    let ms: number;
    if (OFFSET_SUFFIX.test(text)) {
        ms = Date.parse(text);
    } else if (LOCAL_ISO.test(text)) {
        ms = Date.parse(text.includes('T') ? `${text}Z` : text);
    } else {
        return null;
    }
    return Number.isFinite(ms) ? new Date(ms).toISOString() : null;
}

export function parseValue(raw: unknown): number | null {
    const value = firstOf(raw);
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value === 'string' && value.trim() !== '') {
        const n = Number(value);
        return Number.isFinite(n) ? n : null;
    }
    return null;
}

interface MeasureNotation {
    notation: string;
    stationRef?: string;
    parameter?: string;
    qualifier?: string;
    unit?: string;
}

/**
 * Splits a measure notation such as `1029TH-level-downstage-i-15_min-mASD`
 * (or the URI ending in one) into its parts.
 */
export function parseMeasureNotation(uriOrNotation: string): MeasureNotation | null {
    const notation = uriOrNotation.trim().split('/').pop() ?? '';
    const parts = notation.split('-');
    if (parts.length < 3) return null;

    return {
        notation,
        stationRef: optionalString(parts[0]),
        parameter: optionalString(parts[1]),
        qualifier: optionalString(parts[2]),
        unit: parts.length >= 6 ? optionalString(parts[parts.length - 1]) : undefined
    };
}

const looksLikeNotation = (text: string) => text.includes('/') || text.includes('-');

interface MeasureFields {
    parameter?: string;
    qualifier?: string;
    unit?: string;
    stationRef?: string;
    measureId?: string;
}

function readMeasure(record: Record<string, unknown>): MeasureFields {
    const measure = record.measure;
    const embedded = isRecord(measure) ? measure : {};
    const uri = typeof measure === 'string'
        ? measure
        : optionalString(embedded.notation) ?? optionalString(embedded['@id']);
    const notation = uri && looksLikeNotation(uri) ? parseMeasureNotation(uri) : null;
    const bareMeasure = typeof measure === 'string' && !looksLikeNotation(measure) ? optionalString(measure) : undefined;

    return {
        parameter: optionalString(embedded.parameter)
            ?? optionalString(record.parameter)
            ?? optionalString(record.measureType)
            ?? bareMeasure
            ?? notation?.parameter,
        qualifier: optionalString(embedded.qualifier) ?? optionalString(record.qualifier) ?? notation?.qualifier,
        unit: optionalString(record.unit)
            ?? optionalString(record.unitName)
            ?? optionalString(embedded.unitName)
            ?? notation?.unit,
        stationRef: optionalString(record.stationId)
            ?? optionalString(record.stationReference)
            ?? optionalString(embedded.stationReference)
            ?? notation?.stationRef,
        measureId: notation?.notation
    };
}

export function parseMeasureType(parameter: string | undefined): MeasureType | null {
    if (parameter === undefined) return 'level';
    return MEASURE_ALIASES[parameter.toLowerCase()] ?? null;
}

/**
 * Maps raw reading records for one station onto the uniform Reading schema,
 * sorted ascending by timestamp. Input order breaks ties.
 */
export function normalizeReadings(rawReadings: readonly unknown[], station: Pick<Station, 'id'>): NormalizeResult {
    const dropped = emptyDropCounts();
    const rows: { reading: Reading; time: number; index: number }[] = [];

    rawReadings.forEach((raw, index) => {
        if (!isRecord(raw)) {
            dropped.missingTimestamp += 1;
            return;
        }

        const measure = readMeasure(raw);
        if (measure.stationRef !== undefined && measure.stationRef !== station.id) {
            dropped.otherStation += 1;
            return;
        }

        const timestamp = parseTimestamp(raw.dateTime ?? raw.ts ?? raw.timestamp);
        if (timestamp === null) {
            dropped.missingTimestamp += 1;
            return;
        }

        const value = parseValue(raw.value);
        if (value === null) {
            dropped.missingValue += 1;
            return;
        }

        const measureType = parseMeasureType(measure.parameter);
        if (measureType === null) {
            dropped.unsupportedMeasure += 1;
            return;
        }

        const reading: Reading = {
            stationId: station.id,
            timestamp,
            measure: measureType,
            value,
            unit: measure.unit ?? '',
            ...(measure.qualifier ? { qualifier: measure.qualifier } : {}),
            ...(measure.measureId ? { measureId: measure.measureId } : {})
        };
        rows.push({ reading, time: Date.parse(timestamp), index });
    });

    rows.sort((a, b) => a.time - b.time || a.index - b.index);
    return { readings: rows.map(r => r.reading), dropped };
}

export const totalDropped = (dropped: DropCounts): number =>
    dropped.missingTimestamp + dropped.missingValue + dropped.unsupportedMeasure + dropped.otherStation;
