import { LifecycleError } from '../errors/lifecycleError.js';
import type { TierRepository } from '../repositories/tier.repository.js';
import type { AssetRegistry } from '../repositories/asset.repository.js';
import { requireAuthorized, type AccessControl } from './accessControl.js';
import type { Clock } from './clock.js';
import type { Ledger } from './ledger.js';
import { assertTierId } from './lifecycle.service.js';

export interface AssetIssuanceDeps {
    tiers: TierRepository;
    assets: AssetRegistry;
    ledger: Ledger;
    accessControl: AccessControl;
    clock: Clock;
    maxBatchSize: number;
}

export class AssetIssuanceService {
    constructor(private readonly deps: AssetIssuanceDeps) {}

    /**
     * Mints one asset per recipient into the tier, snapshotting the tier's
     * duration. The whole batch is minted or none of it is.
     * @returns the new asset ids, contiguous and ascending
     */
    public mintBatch(caller: string, tierId: number, recipients: readonly string[]): number[] {
        requireAuthorized(this.deps.accessControl, caller, 'mint');
        assertTierId(tierId);
        if (recipients.length === 0 || recipients.length > this.deps.maxBatchSize) {
            throw new LifecycleError('InvalidMagnitude', `A batch holds 1 to ${this.deps.maxBatchSize} recipients`, 'BatchSize');
        }

        return this.deps.ledger.run((emit) => {
            const tier = this.deps.tiers.get(tierId);
            if (tier.duration === 0) {
                throw new LifecycleError('IllegalStateTransition', `Tier ${tierId} has no duration yet`);
            }

            const now = this.deps.clock.now();
            const ids = recipients.map((owner) => {
                if (owner.trim().length === 0) {
                    throw new LifecycleError('InvalidMagnitude', 'Recipient is required', 'MissingRecipient');
                }
                const assetId = this.deps.assets.create(owner, tierId);
                this.deps.assets.setRecord(assetId, { tierId, creationTimestamp: now, cachedDuration: tier.duration });
                emit({ type: 'AssetMinted', assetId, tierId, owner, cachedDuration: tier.duration, at: now });
                return assetId;
            });

            const first = ids[0];
            const last = ids[ids.length - 1];
            if (first === last) {
                emit({ type: 'MetadataUpdate', assetId: first, at: now });
            } else {
                emit({ type: 'BatchMetadataUpdate', fromAssetId: first, toAssetId: last, at: now });
            }
            return ids;
        });
    }
}
