interface CacheEntry<T> {
    value: T;
    expiresAt: number;
}

/**
 * In-memory response cache keyed by request URL and params. Lives only as long
 * as the client that owns it.
 */
export class ResponseCache {
    private entries = new Map<string, CacheEntry<unknown[]>>();

    constructor(private now: () => number = Date.now) { }

    static key(url: string, params: Record<string, string | number | boolean | undefined> = {}): string {
        const query = Object.keys(params)
            .filter(k => params[k] !== undefined)
            .sort()
            .map(k => `${k}=${String(params[k])}`)
            .join('&');
        return query ? `${url}?${query}` : url;
    }

    get(key: string): unknown[] | null {
        const entry = this.entries.get(key);
        if (!entry) return null;
        if (this.now() >= entry.expiresAt) {
            this.entries.delete(key);
            return null;
        }
        return entry.value;
    }

    set(key: string, value: unknown[], ttlMs: number) {
        if (ttlMs <= 0) return;
        this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
    }

    clear() {
        this.entries.clear();
    }

    get size(): number {
        return this.entries.size;
    }
}
