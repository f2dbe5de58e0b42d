import { isLogLevel, logger, type LogLevel } from './lib/logger';

export const DEFAULT_API_BASE_URL = 'https://environment.data.gov.uk/flood-monitoring';

export interface AppConfig {
    apiBaseUrl: string;
    requestTimeoutMs: number;
    maxPages: number;
    pageSize: number;
    retries: number;
    stationCacheTtlMs: number;
    readingsCacheTtlMs: number;
    logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
    apiBaseUrl: DEFAULT_API_BASE_URL,
    requestTimeoutMs: 10000,
    maxPages: 10,
    pageSize: 2500,
    retries: 2,
    stationCacheTtlMs: 60 * 60 * 1000, // 1 hour
    readingsCacheTtlMs: 5 * 60 * 1000, // 5 minutes
    logLevel: 'info'
};

type Env = Record<string, string | boolean | undefined>;

function readInteger(env: Env, key: string, fallback: number, { allowZero = false } = {}): number {
    const raw = env[key];
    if (raw === undefined || raw === '') return fallback;

    const value = typeof raw === 'string' && /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : NaN;
    if (!Number.isSafeInteger(value) || value < 0 || (!allowZero && value === 0)) {
        logger.warn(`Ignoring invalid ${key}=${String(raw)}; using ${fallback}`);
        return fallback;
    }
    return value;
}

/**
 * Builds the runtime configuration from a Vite-style env map. Invalid values
 * fall back to their defaults.
 */
export function loadConfig(env: Env): AppConfig {
    const baseUrl = env.VITE_FLOOD_API_BASE_URL;
    const logLevel = env.VITE_LOG_LEVEL;

    if (logLevel !== undefined && logLevel !== '' && !isLogLevel(logLevel)) {
        logger.warn(`Ignoring invalid VITE_LOG_LEVEL=${String(logLevel)}; using ${DEFAULT_CONFIG.logLevel}`);
    }

    return {
        apiBaseUrl: typeof baseUrl === 'string' && baseUrl.trim()
            ? baseUrl.trim().replace(/\/+$/, '')
            : DEFAULT_CONFIG.apiBaseUrl,
        requestTimeoutMs: readInteger(env, 'VITE_REQUEST_TIMEOUT_MS', DEFAULT_CONFIG.requestTimeoutMs),
        maxPages: readInteger(env, 'VITE_MAX_PAGES', DEFAULT_CONFIG.maxPages),
        pageSize: readInteger(env, 'VITE_PAGE_SIZE', DEFAULT_CONFIG.pageSize),
        retries: readInteger(env, 'VITE_REQUEST_RETRIES', DEFAULT_CONFIG.retries, { allowZero: true }),
        stationCacheTtlMs: readInteger(env, 'VITE_STATION_CACHE_TTL_MS', DEFAULT_CONFIG.stationCacheTtlMs, { allowZero: true }),
        readingsCacheTtlMs: readInteger(env, 'VITE_READINGS_CACHE_TTL_MS', DEFAULT_CONFIG.readingsCacheTtlMs, { allowZero: true }),
        logLevel: isLogLevel(logLevel) ? logLevel : DEFAULT_CONFIG.logLevel
    };
}
