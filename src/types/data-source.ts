export interface DataSourceCapabilities {
    id: string;
    name: string;
    supportsStationSearch: boolean;
    supportsReadings: boolean;
    requiresApiKey: boolean;
    /**
     * Longest readings window the provider serves, in hours.
     */
    maxWindowHours: number;
    description?: string;
}

export interface DataSourceOptions {
    baseUrl?: string;
    timeoutMs?: number;
    maxPages?: number;
    pageSize?: number;
    retries?: number;
    backoffMs?: number;
    stationCacheTtlMs?: number;
    readingsCacheTtlMs?: number;
}

export interface FetchOptions {
    bypassCache?: boolean;
}

/**
 * A source of raw station and reading records. Records are returned undecoded;
 * the catalog builder and reading normalizer validate them.
 */
export interface DataSource {
    readonly id: string;
    readonly name: string;
    readonly capabilities: DataSourceCapabilities;

    fetchStations(options?: FetchOptions): Promise<unknown[]>;
    fetchReadings(stationId: string, windowStart?: Date, windowEnd?: Date, options?: FetchOptions): Promise<unknown[]>;
}
