import type { AxiosAdapter } from 'axios';
import type { DataSource, DataSourceCapabilities, DataSourceOptions, FetchOptions } from '../../types';
import { ApiClient } from '../apiClient';
import { DEFAULT_CONFIG } from '../../config';
import { isInWindow, resolveWindow } from '../../lib/dateUtils';
import { logger } from '../../lib/logger';
import { parseTimestamp } from '../../lib/readings';
import { isRecord } from '../../lib/records';

export const ENVIRONMENT_AGENCY_CAPABILITIES: DataSourceCapabilities = {
    id: 'environment-agency',
    name: 'Environment Agency',
    description: 'Real-time flood-monitoring API: river level and flow stations in England',
    supportsStationSearch: true,
    supportsReadings: true,
    requiresApiKey: false,
    maxWindowHours: 24
};

// A window ending this close to now is treated as "the last N hours".
const ROLLING_WINDOW_SLACK_MS = 60 * 1000;

export interface EnvironmentAgencyOptions extends DataSourceOptions {
    adapter?: AxiosAdapter;
    now?: () => Date;
}

export class EnvironmentAgencyService implements DataSource {
    static readonly ID = ENVIRONMENT_AGENCY_CAPABILITIES.id;
    static readonly NAME = ENVIRONMENT_AGENCY_CAPABILITIES.name;

    readonly id = EnvironmentAgencyService.ID;
    readonly name = EnvironmentAgencyService.NAME;
    readonly capabilities = ENVIRONMENT_AGENCY_CAPABILITIES;

    private client: ApiClient;
    private stationCacheTtlMs: number;
    private readingsCacheTtlMs: number;
    private now: () => Date;

    constructor(options: EnvironmentAgencyOptions = {}) {
        this.client = new ApiClient({
            baseUrl: options.baseUrl ?? DEFAULT_CONFIG.apiBaseUrl,
            timeoutMs: options.timeoutMs ?? DEFAULT_CONFIG.requestTimeoutMs,
            maxPages: options.maxPages ?? DEFAULT_CONFIG.maxPages,
            pageSize: options.pageSize ?? DEFAULT_CONFIG.pageSize,
            retries: options.retries ?? DEFAULT_CONFIG.retries,
            backoffMs: options.backoffMs,
            adapter: options.adapter
        });
        this.stationCacheTtlMs = options.stationCacheTtlMs ?? DEFAULT_CONFIG.stationCacheTtlMs;
        this.readingsCacheTtlMs = options.readingsCacheTtlMs ?? DEFAULT_CONFIG.readingsCacheTtlMs;
        this.now = options.now ?? (() => new Date());
    }

    async fetchStations(options: FetchOptions = {}): Promise<unknown[]> {
        const records = await this.client.fetchAll('/id/stations', {}, {
            bypassCache: options.bypassCache,
            cacheTtlMs: this.stationCacheTtlMs
        });
        logger.debug(`Fetched ${records.length} station records`);
        return records;
    }

    /**
     * Raw reading records for one station within `[windowStart, windowEnd]`,
     * defaulting to the last 24 hours. Records whose timestamp cannot be read are
     * passed through for the normalizer to count.
     */
    async fetchReadings(stationId: string, windowStart?: Date, windowEnd?: Date, options: FetchOptions = {}): Promise<unknown[]> {
        const now = this.now();
        const window = resolveWindow(windowStart, windowEnd, now);
        const lengthMs = window.end.getTime() - window.start.getTime();
        const rolling = now.getTime() - window.end.getTime() <= ROLLING_WINDOW_SLACK_MS;

        const records = await this.client.fetchAll(
            `/id/stations/${encodeURIComponent(stationId)}/readings`,
            { since: window.start.toISOString(), _sorted: true },
            {
                bypassCache: options.bypassCache,
                cacheTtlMs: this.readingsCacheTtlMs,
                // Rolling windows move with the clock, so they share one entry per length.
                cacheKey: rolling ? `readings:${stationId}:last-${lengthMs}ms` : undefined
            }
        );

        const inWindow = records.filter(record => {
            if (!isRecord(record)) return true;
            const timestamp = parseTimestamp(record.dateTime ?? record.ts ?? record.timestamp);
            return timestamp === null || isInWindow(Date.parse(timestamp), window);
        });

        logger.debug(`Fetched ${inWindow.length} readings for ${stationId} (${records.length - inWindow.length} outside window)`);
        return inWindow;
    }

    clearCache() {
        this.client.clearCache();
    }
}
