import { MalformedRecordError } from '../services/errors';
import { STATION_STATUSES, type CatalogResult, type Coordinates, type FilterCriteria, type Station, type StationStatus } from '../types';
import { logger } from './logger';
import { firstOf, isRecord, optionalString } from './records';

const KNOWN_STATUSES: Record<string, StationStatus> = {
    active: 'active',
    suspended: 'suspended',
    closed: 'closed'
};

/**
 * Maps the API's status vocabulary (plain words or URIs such as
 * `.../def/core/statusActive`) onto the four-value enum. Never throws.
 */
export function parseStatus(raw: unknown): StationStatus {
    let value = firstOf(raw);
    if (isRecord(value)) {
        value = value.label ?? value['@id'];
    }
    if (typeof value !== 'string') return 'unknown';

    const token = value.trim().split(/[#/]/).pop() ?? '';
    const word = token.replace(/^status/i, '').toLowerCase();
    return KNOWN_STATUSES[word] ?? 'unknown';
}

function requiredId(record: Record<string, unknown>): string {
    for (const key of ['stationReference', 'notation', 'id']) {
        const value = record[key];
        if (typeof value === 'number' && Number.isFinite(value)) return String(value);
        const text = optionalString(value);
        if (text) return text;
    }
    throw new MalformedRecordError('id');
}

function requiredName(record: Record<string, unknown>): string {
    const name = optionalString(firstOf(record.label)) ?? optionalString(record.name);
    if (!name) throw new MalformedRecordError('label');
    return name;
}

const toCoordinate = (value: unknown): number | undefined => {
    const v = firstOf(value);
    if (typeof v === 'number' && Number.isFinite(v)) return v;
    if (typeof v === 'string' && v.trim() !== '' && Number.isFinite(Number(v))) return Number(v);
    return undefined;
};

function parseCoordinates(record: Record<string, unknown>): Coordinates | undefined {
    const latitude = toCoordinate(record.lat ?? record.latitude);
    const longitude = toCoordinate(record.long ?? record.longitude);
    if (latitude === undefined || longitude === undefined) return undefined;
    return { latitude, longitude };
}

function countMeasures(measures: unknown): number {
    if (Array.isArray(measures)) return measures.length;
    return isRecord(measures) ? 1 : 0;
}

export function parseStation(raw: unknown): Station {
    if (!isRecord(raw)) throw new MalformedRecordError('id', 'Station record is not an object');

    return {
        id: requiredId(raw),
        name: requiredName(raw),
        river: optionalString(firstOf(raw.riverName ?? raw.river)),
        town: optionalString(firstOf(raw.town)),
        catchment: optionalString(firstOf(raw.catchmentName ?? raw.catchment)),
        status: parseStatus(raw.status),
        coordinates: parseCoordinates(raw),
        measureCount: countMeasures(raw.measures)
    };
}

export function buildCatalog(rawRecords: readonly unknown[]): CatalogResult {
    const stations: Station[] = [];
    const seen = new Set<string>();
    let skipped = 0;

    for (const raw of rawRecords) {
        try {
            const station = parseStation(raw);
            if (seen.has(station.id)) {
                logger.debug(`Skipping duplicate station ${station.id}`);
                skipped += 1;
                continue;
            }
            seen.add(station.id);
            stations.push(station);
        } catch (error) {
            if (!(error instanceof MalformedRecordError)) throw error;
            logger.debug(`Skipping station record: ${error.message}`);
            skipped += 1;
        }
    }

    if (skipped > 0) {
        logger.info(`Built catalog of ${stations.length} stations (${skipped} skipped)`);
    }
    return { stations, skipped };
}

const contains = (haystack: string, needle: string) =>
    haystack.toLowerCase().includes(needle.toLowerCase());

export function filterStations(stations: readonly Station[], criteria: FilterCriteria = {}): Station[] {
    const name = criteria.name?.trim() ?? '';
    const river = criteria.river?.trim() ?? '';
    const statuses = criteria.statuses && criteria.statuses.length > 0 ? new Set(criteria.statuses) : null;

    if (!name && !river && !statuses) return [...stations];

    return stations.filter(station => {
        if (name && !contains(station.name, name)) return false;
        if (river && !(station.river && contains(station.river, river))) return false;
        if (statuses && !statuses.has(station.status)) return false;
        return true;
    });
}

export function listRivers(stations: readonly Station[]): string[] {
    const rivers = new Set<string>();
    stations.forEach(s => {
        if (s.river) rivers.add(s.river);
    });
    return Array.from(rivers).sort((a, b) => a.localeCompare(b));
}

export function listStatuses(stations: readonly Station[]): StationStatus[] {
    const present = new Set(stations.map(s => s.status));
    return STATION_STATUSES.filter(status => present.has(status));
}
