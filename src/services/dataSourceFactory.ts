import type { AppConfig } from '../config';
import type { DataSource } from '../types';
import { createProvider, type ProviderId } from './providers';

export function createDataSource(config: AppConfig, providerId: ProviderId = 'environment-agency'): DataSource {
    const source = createProvider(providerId, {
        baseUrl: config.apiBaseUrl,
        timeoutMs: config.requestTimeoutMs,
        maxPages: config.maxPages,
        pageSize: config.pageSize,
        retries: config.retries,
        stationCacheTtlMs: config.stationCacheTtlMs,
        readingsCacheTtlMs: config.readingsCacheTtlMs
    });
    if (!source) {
        throw new Error(`Unknown data provider: ${providerId}`);
    }
    return source;
}
