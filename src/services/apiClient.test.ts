import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ApiClient } from './apiClient';
import { logger } from '../lib/logger';
import { createFakeAdapter, type FakeReply } from '../test/fakeAdapter';

const BASE = 'http://api.test/flood-monitoring';

const client = (replies: FakeReply[] | (() => FakeReply), options: { pageSize?: number; maxPages?: number } = {}) => {
    const fake = createFakeAdapter(replies);
    return {
        api: new ApiClient({ baseUrl: `${BASE}/`, retries: 0, backoffMs: 0, adapter: fake.adapter, ...options }),
        requests: fake.requests
    };
};

describe('ApiClient.fetchAll', () => {
    beforeEach(() => {
        vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('pages by offset until a short page arrives', async () => {
        const { api, requests } = client([
            { data: { items: [{ id: 1 }, { id: 2 }] } },
            { data: { items: [{ id: 3 }, { id: 4 }] } },
            { data: { items: [{ id: 5 }] } }
        ], { pageSize: 2 });

        const records = await api.fetchAll('/id/stations', { parameter: 'level' });

        expect(records).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }, { id: 4 }, { id: 5 }]);
        expect(requests.map(r => r.url)).toEqual([
            `${BASE}/id/stations`,
            `${BASE}/id/stations`,
            `${BASE}/id/stations`
        ]);
        expect(requests.map(r => r.params)).toEqual([
            { parameter: 'level', _limit: 2, _offset: 0 },
            { parameter: 'level', _limit: 2, _offset: 2 },
            { parameter: 'level', _limit: 2, _offset: 4 }
        ]);
    });

    it('follows next links when the API provides them', async () => {
        const { api, requests } = client([
            { data: { meta: { next: `${BASE}/id/stations?page=2` }, items: [{ id: 1 }] } },
            { data: { items: [{ id: 2 }] } }
        ]);

        const records = await api.fetchAll('/id/stations');

        expect(records).toEqual([{ id: 1 }, { id: 2 }]);
        expect(requests[1]).toEqual({ url: `${BASE}/id/stations?page=2`, params: {} });
    });

    it('treats a page without a next link as the last once links were followed', async () => {
        const { api, requests } = client([
            { data: { meta: { next: `${BASE}/id/stations?page=2` }, items: [{ id: 1 }] } },
            { data: { items: [{ id: 2 }] } }
        ], { pageSize: 1 });

        expect(await api.fetchAll('/id/stations')).toEqual([{ id: 1 }, { id: 2 }]);
        expect(requests).toHaveLength(2);
    });

    it('stops at maxPages and warns that results may be incomplete', async () => {
        const { api, requests } = client(() => ({ data: { items: [{ id: 'x' }] } }), { pageSize: 1, maxPages: 2 });

        const records = await api.fetchAll('/id/stations');

        expect(records).toHaveLength(2);
        expect(requests).toHaveLength(2);
        expect(logger.warn).toHaveBeenCalledWith('Stopped paging /id/stations after 2 pages (2 records); results may be incomplete');
    });

    it('wraps a single-record items object and tolerates pages without items', async () => {
        const single = client([{ data: { items: { id: 'only' } } }]);
        expect(await single.api.fetchAll('/id/stations/E1')).toEqual([{ id: 'only' }]);

        const empty = client([{ data: 'unexpected' }]);
        expect(await empty.api.fetchAll('/id/stations')).toEqual([]);
    });

    it('serves repeat requests from the cache until bypassed', async () => {
        const { api, requests } = client(() => ({ data: { items: [{ id: 1 }] } }));

        await api.fetchAll('/id/stations', {}, { cacheTtlMs: 60000 });
        await api.fetchAll('/id/stations', {}, { cacheTtlMs: 60000 });
        expect(requests).toHaveLength(1);

        await api.fetchAll('/id/stations', {}, { cacheTtlMs: 60000, bypassCache: true });
        expect(requests).toHaveLength(2);

        api.clearCache();
        await api.fetchAll('/id/stations', {}, { cacheTtlMs: 60000 });
        expect(requests).toHaveLength(3);
    });

    it('shares an entry between requests given the same cache key', async () => {
        const { api, requests } = client(() => ({ data: { items: [{ id: 1 }] } }));

        await api.fetchAll('/id/stations/E1/readings', { since: '2024-03-10T00:00:00.000Z' }, { cacheTtlMs: 60000, cacheKey: 'E1:last-24h' });
        const records = await api.fetchAll('/id/stations/E1/readings', { since: '2024-03-10T00:00:05.000Z' }, { cacheTtlMs: 60000, cacheKey: 'E1:last-24h' });

        expect(records).toEqual([{ id: 1 }]);
        expect(requests).toHaveLength(1);
    });
});
