import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { Redis } from 'ioredis';
import { MetadataCacheService, createCacheClient, metadataKey } from './metadataCache.service.js';

vi.mock('ioredis', () => ({
    Redis: vi.fn(),
}));

describe('MetadataCacheService', () => {
    let consoleLogSpy: MockInstance<typeof console.log>;

    beforeEach(() => {
        consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => { });
    });

    afterEach(() => {
        consoleLogSpy.mockRestore();
        vi.clearAllMocks();
    });

    it('creates a lazily connecting client only when a url is configured', () => {
        expect(createCacheClient(undefined)).toBeNull();

        createCacheClient('redis://localhost:6379');

        expect(Redis).toHaveBeenCalledWith('redis://localhost:6379', { lazyConnect: true });
    });

    it('deletes the cached metadata of one asset', async () => {
        const redis = { del: vi.fn().mockResolvedValue(1) };
        const service = new MetadataCacheService(redis);

        await service.invalidate(7);

        expect(redis.del).toHaveBeenCalledWith('asset_metadata:7');
        expect(consoleLogSpy).toHaveBeenCalledWith('[MetadataCacheService] Invalidated asset metadata cache for 7');
    });

    it('deletes a range in chunks of 500 keys', async () => {
        const redis = { del: vi.fn().mockResolvedValue(500) };
        const service = new MetadataCacheService(redis);

        await service.invalidateRange(1, 1001);

        expect(redis.del).toHaveBeenCalledTimes(3);
        expect(redis.del.mock.calls[0]).toHaveLength(500);
        expect(redis.del.mock.calls[0][0]).toBe(metadataKey(1));
        expect(redis.del.mock.calls[1][0]).toBe(metadataKey(501));
        expect(redis.del.mock.calls[2]).toEqual([metadataKey(1001)]);
        expect(consoleLogSpy).toHaveBeenCalledWith('[MetadataCacheService] Invalidated asset metadata cache for 1-1001');
    });

    it('does a soft invalidate when redis is not configured', async () => {
        const service = new MetadataCacheService(null);

        await service.invalidateRange(1, 3);

        expect(consoleLogSpy).toHaveBeenCalledWith(
            '[MetadataCacheService] REDIS_URL not configured. Soft cache invalidate simulating for 1-3'
        );
    });
});
