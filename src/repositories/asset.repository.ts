import type { AssetRecord, PersistedAsset } from '../types/lifecycle.js';
import type { Checkpointable } from '../services/ledger.js';
import { LifecycleError } from '../errors/lifecycleError.js';

/**
 * Asset identity, ownership and the per-asset lifecycle fields.
 * Transfers and ownership rules live with whoever implements this.
 */
export interface AssetRegistry {
    create(owner: string, tierId: number): number;
    exists(assetId: number): boolean;
    ownerOf(assetId: number): string;
    getRecord(assetId: number): AssetRecord;
    setRecord(assetId: number, record: AssetRecord): void;
    totalSupply(): number;
}

/** A registry that can take back assets persisted by an earlier process. */
export interface RestorableAssetRegistry extends AssetRegistry {
    restore(asset: PersistedAsset): void;
}

interface StoredAsset {
    owner: string;
    record: AssetRecord;
}

export class InMemoryAssetRegistry implements RestorableAssetRegistry, Checkpointable {
    private assets = new Map<number, StoredAsset>();
    private lastId = 0;

    public create(owner: string, tierId: number): number {
        this.lastId += 1;
        this.assets.set(this.lastId, {
            owner,
            record: { tierId, creationTimestamp: 0, cachedDuration: 0 },
        });
        return this.lastId;
    }

    /**
     * Puts back an asset under its original id. Ids keep counting from the
     * highest restored id.
     */
    public restore(asset: PersistedAsset): void {
        const { id, owner, tierId, creationTimestamp, cachedDuration } = asset;
        this.assets.set(id, { owner, record: { tierId, creationTimestamp, cachedDuration } });
        this.lastId = Math.max(this.lastId, id);
    }

    public exists(assetId: number): boolean {
        return this.assets.has(assetId);
    }

    public ownerOf(assetId: number): string {
        return this.require(assetId).owner;
    }

    public getRecord(assetId: number): AssetRecord {
        return { ...this.require(assetId).record };
    }

    public setRecord(assetId: number, record: AssetRecord): void {
        const stored = this.require(assetId);
        if (record.tierId !== stored.record.tierId) {
            throw new LifecycleError('InvalidMagnitude', `Asset ${assetId} cannot move to tier ${record.tierId}`, 'ImmutableTier');
        }
        this.assets.set(assetId, { owner: stored.owner, record: { ...record } });
    }

    public totalSupply(): number {
        return this.lastId;
    }

    public checkpoint(): () => void {
        const saved = new Map(this.assets);
        const lastId = this.lastId;
        return () => {
            this.assets = saved;
            this.lastId = lastId;
        };
    }

    private require(assetId: number): StoredAsset {
        const stored = this.assets.get(assetId);
        if (!stored) {
            throw new LifecycleError('NotFound', `Asset ${assetId} does not exist`);
        }
        return stored;
    }
}
