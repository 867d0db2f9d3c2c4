export enum TierStatus {
    NOT_LIVE = 'NotLive',
    READY_TO_START = 'ReadyToStart',
    READY_TO_LIVE = 'ReadyToLive',
    LIVE = 'Live',
    PAUSED = 'Paused',
    ENDING = 'Ending',
    FINISHED = 'Finished',
}

export enum AssetStatus {
    ACTIVE = 'Active',
    INACTIVE = 'Inactive',
}

export type FeeVariant = 'flat' | 'discount';

export type TierOperation =
    | 'setDuration'
    | 'setStart'
    | 'activate'
    | 'pause'
    | 'setEnd'
    | 'unpause'
    | 'finish'
    | 'setFee';

export type LifecycleAction = TierOperation | 'setDiscount' | 'mint' | 'renew';

export interface Tier {
    id: number;
    status: TierStatus;
    duration: number; // seconds
    start: number; // unix seconds, 0 = unset
    pause: number;
    end: number;
}

/** The three per-asset fields the lifecycle core reads and writes. */
export interface AssetRecord {
    tierId: number;
    creationTimestamp: number;
    cachedDuration: number;
}

export interface AssetWindow {
    assetId: number;
    tierId: number;
    windowStart: number;
    windowEnd: number;
    status: AssetStatus;
}

export interface AssetSnapshot {
    checked: AssetWindow;
    unchecked: AssetWindow;
    feeOwed: bigint;
    discountedFeeOwed: bigint;
}

export interface TierFee {
    tierId: number;
    variant: FeeVariant;
    fee: bigint;
}

/** An asset together with its owner, as the database mirror stores it. */
export interface PersistedAsset extends AssetRecord {
    id: number;
    owner: string;
}

/**
 * State read back from the database mirror at boot. `lastSequence` is the
 * highest journaled event sequence; new events continue after it.
 */
export interface LifecycleSnapshot {
    tiers: Tier[];
    fees: TierFee[];
    assets: PersistedAsset[];
    lastSequence: number;
}

/** Named intervals, all in seconds. */
export interface LifecycleTimings {
    reinitWindow: number;
    earlyRenewalWindow: number;
    lateRenewalWindow: number;
    minDuration: number;
}

export type LifecycleEvent =
    | {
        type: 'TierPhaseChanged';
        operation: TierOperation;
        tierId: number;
        from: TierStatus;
        to: TierStatus;
        duration: number;
        start: number;
        pause: number;
        end: number;
        at: number;
    }
    | {
        type: 'FeeChanged';
        tierId: number;
        variant: FeeVariant;
        previousFee: bigint;
        fee: bigint;
        at: number;
    }
    | {
        type: 'AssetMinted';
        assetId: number;
        tierId: number;
        owner: string;
        cachedDuration: number;
        at: number;
    }
    | {
        type: 'AssetRenewed';
        assetId: number;
        tierId: number;
        previousWindowStart: number;
        previousWindowEnd: number;
        windowStart: number;
        windowEnd: number;
        cachedDuration: number;
        feePaid: bigint;
        at: number;
    }
    | { type: 'MetadataUpdate'; assetId: number; at: number }
    | { type: 'BatchMetadataUpdate'; fromAssetId: number; toAssetId: number; at: number };

/** An event as stored in the log, with its position. */
export type RecordedEvent = LifecycleEvent & { sequence: number };
