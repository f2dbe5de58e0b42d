import { saveAs } from 'file-saver';
import type { MeasureType, Reading, Station } from '../types';
import { formatFileDate } from './dateUtils';

export const CSV_HEADER = ['timestamp', 'measure', 'value', 'unit'] as const;

export interface CsvReadingRow {
    timestamp: string;
    measure: MeasureType;
    value: number;
    unit: string;
}

const escapeCsvField = (value: string) => {
    if (/[",\r\n]/.test(value)) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
};

export function readingsToCsv(readings: readonly Reading[]): string {
    const rows = readings.map(r =>
        [r.timestamp, r.measure, String(r.value), r.unit].map(escapeCsvField).join(',')
    );
    return [CSV_HEADER.join(','), ...rows].join('\n');
}

/** Splits CSV text into records of fields, honouring quoted fields. */
function splitCsv(text: string): string[][] {
    const records: string[][] = [];
    let record: string[] = [];
    let field = '';
    let quoted = false;

    for (let i = 0; i < text.length; i++) {
        const ch = text[i];
        if (quoted) {
            if (ch === '"') {
                if (text[i + 1] === '"') {
                    field += '"';
                    i++;
                } else {
                    quoted = false;
                }
            } else {
                field += ch;
            }
        } else if (ch === '"') {
            quoted = true;
        } else if (ch === ',') {
            record.push(field);
            field = '';
        } else if (ch === '\n' || ch === '\r') {
            if (ch === '\r' && text[i + 1] === '\n') i++;
            record.push(field);
            records.push(record);
            record = [];
            field = '';
        } else {
            field += ch;
        }
    }

    if (field !== '' || record.length > 0) {
        record.push(field);
        records.push(record);
    }
    return records;
}

const isMeasureType = (value: string): value is MeasureType => value === 'level' || value === 'flow';

export function parseReadingsCsv(text: string): CsvReadingRow[] {
    const [, ...rows] = splitCsv(text.replace(/^\uFEFF/, ''));

    return rows.flatMap(fields => {
        if (fields.length !== CSV_HEADER.length) return [];
        const [timestamp, measure, rawValue, unit] = fields;
        const value = Number(rawValue);
        if (!isMeasureType(measure) || rawValue.trim() === '' || !Number.isFinite(value)) return [];
        return [{ timestamp, measure, value, unit }];
    });
}

export function csvFilename(station: Pick<Station, 'name'>, measure?: string, date: Date = new Date()): string {
    // Ensure name is a string and trim it. Remove any weird control chars.
    const rawName = String(station.name || 'Station').trim();
    const safeName = rawName.replace(/[^a-z0-9]/gi, '_').replace(/_+/g, '_').replace(/^_|_$/g, '');
    return `${safeName || 'Station'}_${measure || 'readings'}_${formatFileDate(date)}.csv`;
}

export function downloadReadingsCsv(station: Station, readings: readonly Reading[], measure?: string) {
    const content = readingsToCsv(readings);
    // Add BOM for Excel compatibility
    const blob = new Blob(['\uFEFF' + content], { type: 'text/csv;charset=utf-8' });
    saveAs(blob, csvFilename(station, measure));
}
