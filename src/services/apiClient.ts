import type { AxiosAdapter, AxiosInstance } from 'axios';
import { ResponseCache } from './cache';
import { createHttpClient, getJsonWithRetry } from './http';
import { logger } from '../lib/logger';
import { isRecord } from '../lib/records';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface ApiClientOptions {
    baseUrl: string;
    timeoutMs?: number;
    maxPages?: number;
    pageSize?: number;
    retries?: number;
    backoffMs?: number;
    adapter?: AxiosAdapter;
    cache?: ResponseCache;
}

export interface FetchAllOptions {
    bypassCache?: boolean;
    cacheTtlMs?: number;
    /** Overrides the URL-and-params cache key. */
    cacheKey?: string;
}

type ListPage = Record<string, unknown>;

const toListPage = (data: unknown): ListPage => (isRecord(data) ? data : {});

function pageItems(page: ListPage): unknown[] {
    if (Array.isArray(page.items)) return page.items;
    if (isRecord(page.items)) return [page.items];
    return [];
}

function nextLink(page: ListPage): string | null {
    const meta: Record<string, unknown> = isRecord(page.meta) ? page.meta : {};
    const link = meta.next ?? page.next;
    return typeof link === 'string' && link.trim() ? link : null;
}

/**
 * Client for the flood-monitoring list endpoints. Follows pagination until the
 * API runs out of pages or `maxPages` is reached.
 */
export class ApiClient {
    readonly baseUrl: string;
    readonly maxPages: number;
    readonly pageSize: number;

    private http: AxiosInstance;
    private retries: number;
    private backoffMs: number;
    private cache: ResponseCache;

    constructor(options: ApiClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.maxPages = options.maxPages ?? 10;
        this.pageSize = options.pageSize ?? 2500;
        this.retries = options.retries ?? 2;
        this.backoffMs = options.backoffMs ?? 500;
        this.cache = options.cache ?? new ResponseCache();
        this.http = createHttpClient({ timeoutMs: options.timeoutMs, adapter: options.adapter });
    }

    async fetchAll(endpoint: string, params: QueryParams = {}, options: FetchAllOptions = {}): Promise<unknown[]> {
        const url = `${this.baseUrl}${endpoint}`;
        const cacheKey = options.cacheKey ?? ResponseCache.key(url, params);

        if (!options.bypassCache) {
            const cached = this.cache.get(cacheKey);
            if (cached) {
                logger.debug(`Cache hit for ${cacheKey}`);
                return cached;
            }
        }

        const records: unknown[] = [];
        let offset = 0;
        let link: string | null = null;
        let pages = 0;
        let more = true;
        let linked = false;

        while (more && pages < this.maxPages) {
            const data = link
                ? await this.get(link)
                : await this.get(url, { ...params, _limit: this.pageSize, _offset: offset });
            const page = toListPage(data);
            const items = pageItems(page);
            records.push(...items);
            pages += 1;

            link = nextLink(page);
            if (link) {
                linked = true;
            } else {
                // Once the API pages by link, a missing link is the last page.
                more = !linked && items.length >= this.pageSize;
                offset += this.pageSize;
            }
        }

        if (more) {
            logger.warn(`Stopped paging ${endpoint} after ${pages} pages (${records.length} records); results may be incomplete`);
        }

        this.cache.set(cacheKey, records, options.cacheTtlMs ?? 0);
        return records;
    }

    clearCache() {
        this.cache.clear();
    }

    private get(url: string, params?: QueryParams): Promise<unknown> {
        return getJsonWithRetry<unknown>(this.http, url, params ? { params } : {}, {
            retries: this.retries,
            backoffMs: this.backoffMs
        });
    }
}
