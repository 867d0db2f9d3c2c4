import {
    AssetStatus,
    TierStatus,
    type AssetRecord,
    type AssetSnapshot,
    type AssetWindow,
    type FeeVariant,
    type LifecycleTimings,
    type Tier,
} from '../types/lifecycle.js';
import { LifecycleError } from '../errors/lifecycleError.js';
import type { TierRepository } from '../repositories/tier.repository.js';
import type { AssetRegistry } from '../repositories/asset.repository.js';
import { requireAuthorized, type AccessControl } from './accessControl.js';
import type { Clock } from './clock.js';
import type { Ledger } from './ledger.js';
import type { FeeScheduleService } from './feeSchedule.service.js';

export interface AssetTemporalStateDeps {
    tiers: TierRepository;
    assets: AssetRegistry;
    fees: FeeScheduleService;
    ledger: Ledger;
    accessControl: AccessControl;
    clock: Clock;
    timings: LifecycleTimings;
    maxBatchSize: number;
}

export interface RenewOptions {
    discounted?: boolean;
}

export interface RenewalReceipt {
    assetId: number;
    feePaid: bigint;
    window: AssetWindow;
}

const INACTIVE_TIER_STATUSES: ReadonlySet<TierStatus> = new Set([
    TierStatus.NOT_LIVE,
    TierStatus.READY_TO_START,
    TierStatus.READY_TO_LIVE,
    TierStatus.FINISHED,
]);

/**
 * The boundary a Paused or Ending tier is counting down to, or null.
 */
export function tierBoundary(tier: Tier): number | null {
    if (tier.status === TierStatus.PAUSED) {
        return tier.pause;
    }
    if (tier.status === TierStatus.ENDING) {
        return tier.end;
    }
    return null;
}

/**
 * True when the tier is outside its active window and every checked
 * asset window collapses to 0.
 */
export function isZeroCondition(tier: Tier, now: number): boolean {
    if (INACTIVE_TIER_STATUSES.has(tier.status)) {
        return true;
    }
    if (tier.status === TierStatus.LIVE) {
        return now < tier.start;
    }
    const boundary = tierBoundary(tier);
    return boundary !== null && now > boundary;
}

export function uncheckedWindow(assetId: number, tier: Tier, record: AssetRecord, now: number): AssetWindow {
    const windowStart = Math.max(record.creationTimestamp, tier.start);
    const windowEnd = windowStart + record.cachedDuration;
    return {
        assetId,
        tierId: record.tierId,
        windowStart,
        windowEnd,
        status: now > windowEnd ? AssetStatus.INACTIVE : AssetStatus.ACTIVE,
    };
}

export function checkedWindow(assetId: number, tier: Tier, record: AssetRecord, now: number): AssetWindow {
    if (isZeroCondition(tier, now)) {
        return { assetId, tierId: record.tierId, windowStart: 0, windowEnd: 0, status: AssetStatus.ACTIVE };
    }
    const raw = uncheckedWindow(assetId, tier, record, now);
    const expired = raw.windowStart !== 0 && raw.windowEnd !== 0 && now > raw.windowEnd;
    return { ...raw, status: expired ? AssetStatus.INACTIVE : AssetStatus.ACTIVE };
}

/**
 * Fee to renew in a tier at `now`, given the tier's base fee.
 *
 * Live tiers charge the whole fee. Paused and Ending tiers charge for the
 * part of a full period still left before the boundary, floored; nothing
 * once the boundary is reached. Every other status charges nothing.
 */
export function renewalFee(tier: Tier, baseFee: bigint, now: number): bigint {
    if (tier.status === TierStatus.LIVE) {
        return baseFee;
    }
    const boundary = tierBoundary(tier);
    if (boundary === null || tier.duration === 0) {
        return 0n;
    }
    const remainder = boundary - now;
    if (remainder <= 0) {
        return 0n;
    }
    if (remainder >= tier.duration) {
        return baseFee;
    }
    return (BigInt(remainder) * baseFee) / BigInt(tier.duration);
}

/**
 * Per-asset window and renewal fee, always recomputed from the tier,
 * the asset record and the clock. Renewal is the only write.
 */
export class AssetTemporalStateService {
    constructor(private readonly deps: AssetTemporalStateDeps) {}

    public getWindow(assetId: number): AssetWindow {
        const { tier, record } = this.load(assetId);
        return checkedWindow(assetId, tier, record, this.deps.clock.now());
    }

    public getUncheckedWindow(assetId: number): AssetWindow {
        const { tier, record } = this.load(assetId);
        return uncheckedWindow(assetId, tier, record, this.deps.clock.now());
    }

    public feeOwed(assetId: number, variant: FeeVariant = 'flat'): bigint {
        const { tier } = this.load(assetId);
        return renewalFee(tier, this.deps.fees.getFee(tier.id, variant), this.deps.clock.now());
    }

    public snapshot(assetId: number): AssetSnapshot {
        const { tier, record } = this.load(assetId);
        const now = this.deps.clock.now();
        return {
            checked: checkedWindow(assetId, tier, record, now),
            unchecked: uncheckedWindow(assetId, tier, record, now),
            feeOwed: renewalFee(tier, this.deps.fees.getFee(tier.id, 'flat'), now),
            discountedFeeOwed: renewalFee(tier, this.deps.fees.getFee(tier.id, 'discount'), now),
        };
    }

    /**
     * Restarts the asset's window at now with the tier's current duration.
     */
    public renew(caller: string, assetId: number, payment: bigint, options: RenewOptions = {}): RenewalReceipt {
        requireAuthorized(this.deps.accessControl, caller, 'renew');
        if (payment < 0n) {
            throw new LifecycleError('InvalidMagnitude', 'Payment cannot be negative', 'NegativePayment');
        }
        const variant: FeeVariant = options.discounted ? 'discount' : 'flat';

        return this.deps.ledger.run((emit) => {
            const { tier, record } = this.load(assetId);
            const now = this.deps.clock.now();
            const fee = this.quote(tier, record, variant, now, assetId);

            if (payment < fee) {
                throw new LifecycleError('InsufficientPayment', `Renewal of asset ${assetId} costs ${fee}, got ${payment}`);
            }

            const previous = uncheckedWindow(assetId, tier, record, now);
            const renewed: AssetRecord = { tierId: record.tierId, creationTimestamp: now, cachedDuration: tier.duration };
            this.deps.assets.setRecord(assetId, renewed);
            const window = uncheckedWindow(assetId, tier, renewed, now);

            emit({
                type: 'AssetRenewed',
                assetId,
                tierId: tier.id,
                previousWindowStart: previous.windowStart,
                previousWindowEnd: previous.windowEnd,
                windowStart: window.windowStart,
                windowEnd: window.windowEnd,
                cachedDuration: renewed.cachedDuration,
                feePaid: fee,
                at: now,
            });
            emit({ type: 'MetadataUpdate', assetId, at: now });

            return { assetId, feePaid: fee, window };
        });
    }

    /**
     * Renews every asset in order against one payment; any failure leaves every asset untouched.
     */
    public renewBatch(caller: string, assetIds: readonly number[], payment: bigint): RenewalReceipt[] {
        if (assetIds.length === 0 || assetIds.length > this.deps.maxBatchSize) {
            throw new LifecycleError('InvalidMagnitude', `A batch holds 1 to ${this.deps.maxBatchSize} assets`, 'BatchSize');
        }

        return this.deps.ledger.run(() => {
            let remaining = payment;
            return assetIds.map((assetId) => {
                const receipt = this.renew(caller, assetId, remaining);
                remaining -= receipt.feePaid;
                return receipt;
            });
        });
    }

    private quote(tier: Tier, record: AssetRecord, variant: FeeVariant, now: number, assetId: number): bigint {
        if (tier.status !== TierStatus.LIVE && tierBoundary(tier) === null) {
            throw new LifecycleError('IllegalStateTransition', `Cannot renew in tier ${tier.id} while ${tier.status}`);
        }
        if (variant === 'discount' && !this.deps.fees.hasFee(tier.id, 'discount')) {
            throw new LifecycleError('InvalidMagnitude', `Tier ${tier.id} has no discounted fee`, 'UndefinedFee');
        }

        const { earlyRenewalWindow, lateRenewalWindow } = this.deps.timings;
        const { windowEnd } = uncheckedWindow(assetId, tier, record, now);
        const opensAt = windowEnd - earlyRenewalWindow;
        const boundary = tierBoundary(tier);

        if (boundary !== null) {
            if (boundary === now) {
                throw new LifecycleError('UnableToUpdate', `Tier ${tier.id} reaches its boundary now; renewal is closed`);
            }
            const closesAt = boundary - lateRenewalWindow;
            if (now < opensAt || now > closesAt) {
                throw new LifecycleError('IllegalTiming', `Asset ${assetId} can be renewed between ${opensAt} and ${closesAt}`);
            }
        } else if (now < opensAt) {
            throw new LifecycleError('IllegalTiming', `Asset ${assetId} can be renewed from ${opensAt}`);
        }

        return renewalFee(tier, this.deps.fees.getFee(tier.id, variant), now);
    }

    private load(assetId: number): { tier: Tier; record: AssetRecord } {
        if (!Number.isInteger(assetId) || !this.deps.assets.exists(assetId)) {
            throw new LifecycleError('NotFound', `Asset ${assetId} does not exist`);
        }
        const record = this.deps.assets.getRecord(assetId);
        return { tier: this.deps.tiers.get(record.tierId), record };
    }
}
