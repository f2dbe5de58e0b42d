export type StationStatus = 'active' | 'suspended' | 'closed' | 'unknown';

export const STATION_STATUSES: readonly StationStatus[] = ['active', 'suspended', 'closed', 'unknown'];

export interface Coordinates {
    latitude: number;
    longitude: number;
}

export interface Station {
    readonly id: string;
    readonly name: string;
    readonly river?: string;
    readonly town?: string;
    readonly catchment?: string;
    readonly status: StationStatus;
    readonly coordinates?: Coordinates;
    readonly measureCount: number;
}

export type MeasureType = 'level' | 'flow';

export interface Reading {
    readonly stationId: string;
    readonly timestamp: string; // ISO, UTC
    readonly measure: MeasureType;
    readonly value: number;
    readonly unit: string;
    readonly qualifier?: string;
    readonly measureId?: string;
}

export interface FilterCriteria {
    name?: string;
    river?: string;
    statuses?: StationStatus[];
}

export interface ReadingWindow {
    start: Date;
    end: Date;
}

export interface CatalogResult {
    stations: Station[];
    skipped: number;
}

export interface DropCounts {
    missingTimestamp: number;
    missingValue: number;
    unsupportedMeasure: number;
    otherStation: number;
}

export interface NormalizeResult {
    readings: Reading[];
    dropped: DropCounts;
}

export interface ReadingSummary {
    count: number;
    latest: number;
    mean: number;
    min: number;
    max: number;
    first: string;
    last: string;
    unit: string;
    /** Distinct non-empty units, in time order of first use. */
    units: string[];
}

export type { DataSource, DataSourceCapabilities, DataSourceOptions, FetchOptions } from './data-source';
