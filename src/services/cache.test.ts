import { describe, expect, it } from 'vitest';
import { ResponseCache } from './cache';

describe('ResponseCache', () => {
    it('builds keys from sorted, defined params', () => {
        expect(ResponseCache.key('http://api.test/r', { b: 2, a: 'x', c: undefined })).toBe('http://api.test/r?a=x&b=2');
        expect(ResponseCache.key('http://api.test/r')).toBe('http://api.test/r');
    });

    it('expires entries after their TTL', () => {
        let now = 1000;
        const cache = new ResponseCache(() => now);

        cache.set('k', [1], 500);
        expect(cache.get('k')).toEqual([1]);

        now = 1500;
        expect(cache.get('k')).toBeNull();
        expect(cache.size).toBe(0);
    });

    it('does not store with a zero TTL', () => {
        const cache = new ResponseCache();
        cache.set('k', [1], 0);
        expect(cache.get('k')).toBeNull();
    });
});
