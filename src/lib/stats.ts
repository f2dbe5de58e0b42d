import type { MeasureType, Reading, ReadingSummary } from '../types';

export interface MeasureSeries {
    key: string;
    label: string;
    measure: MeasureType;
    qualifier?: string;
    readings: Reading[];
}

const capitalize = (text: string) => text.charAt(0).toUpperCase() + text.slice(1);

export const seriesKey = (reading: Pick<Reading, 'measure' | 'qualifier'>) =>
    reading.qualifier ? `${reading.measure}:${reading.qualifier}` : reading.measure;

/**
 * Groups readings into one series per measure and qualifier, in the order each
 * series first appears.
 */
export function groupByMeasure(readings: readonly Reading[]): MeasureSeries[] {
    const series = new Map<string, MeasureSeries>();

    readings.forEach(reading => {
        const key = seriesKey(reading);
        let entry = series.get(key);
        if (!entry) {
            entry = {
                key,
                label: reading.qualifier
                    ? `${capitalize(reading.measure)} (${reading.qualifier})`
                    : capitalize(reading.measure),
                measure: reading.measure,
                qualifier: reading.qualifier,
                readings: []
            };
            series.set(key, entry);
        }
        entry.readings.push(reading);
    });

    return Array.from(series.values());
}

export function summarizeReadings(readings: readonly Reading[]): ReadingSummary | null {
    if (readings.length === 0) return null;

    const ordered = [...readings].sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
    const values = ordered.map(r => r.value);
    const total = values.reduce((sum, v) => sum + v, 0);
    const units = Array.from(new Set(ordered.map(r => r.unit).filter(Boolean)));

    return {
        count: ordered.length,
        latest: ordered[ordered.length - 1].value,
        mean: total / ordered.length,
        min: Math.min(...values),
        max: Math.max(...values),
        first: ordered[0].timestamp,
        last: ordered[ordered.length - 1].timestamp,
        unit: units[0] ?? '',
        units
    };
}
