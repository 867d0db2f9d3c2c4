import { Redis } from 'ioredis';

export type CacheClient = Pick<Redis, 'del'>;

const KEYS_PER_DEL = 500;

export const metadataKey = (assetId: number) => `asset_metadata:${assetId}`;

/**
 * Only create a redis connection if configured, else every invalidation is a logged no-op.
 */
export function createCacheClient(redisUrl: string | undefined): CacheClient | null {
    return redisUrl ? new Redis(redisUrl, { lazyConnect: true }) : null;
}

/**
 * Drops cached asset presentation so it is rebuilt on the next read.
 */
export class MetadataCacheService {
    constructor(private readonly redis: CacheClient | null) {}

    async invalidate(assetId: number): Promise<void> {
        await this.invalidateRange(assetId, assetId);
    }

    async invalidateRange(fromAssetId: number, toAssetId: number): Promise<void> {
        const label = fromAssetId === toAssetId ? `${fromAssetId}` : `${fromAssetId}-${toAssetId}`;
        if (!this.redis) {
            console.log(`[MetadataCacheService] REDIS_URL not configured. Soft cache invalidate simulating for ${label}`);
            return;
        }

        for (let chunkStart = fromAssetId; chunkStart <= toAssetId; chunkStart += KEYS_PER_DEL) {
            const chunkEnd = Math.min(chunkStart + KEYS_PER_DEL - 1, toAssetId);
            const keys: string[] = [];
            for (let assetId = chunkStart; assetId <= chunkEnd; assetId++) {
                keys.push(metadataKey(assetId));
            }
            await this.redis.del(...keys);
        }
        console.log(`[MetadataCacheService] Invalidated asset metadata cache for ${label}`);
    }
}
