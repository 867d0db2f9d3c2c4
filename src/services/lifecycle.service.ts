import type { LifecycleTimings, Tier, TierOperation } from '../types/lifecycle.js';
import { LifecycleError } from '../errors/lifecycleError.js';
import { MAX_DURATION, MAX_TIER_ID } from '../config/limits.js';
import type { TierRepository } from '../repositories/tier.repository.js';
import type { AssetRegistry } from '../repositories/asset.repository.js';
import { requireAuthorized, type AccessControl } from './accessControl.js';
import type { Clock } from './clock.js';
import type { Emit, Ledger } from './ledger.js';
import { failedTimingCheck, resolveTransition, type TransitionRule } from './transitionTable.js';

export interface LifecycleServiceDeps {
    tiers: TierRepository;
    assets: AssetRegistry;
    ledger: Ledger;
    accessControl: AccessControl;
    clock: Clock;
    timings: LifecycleTimings;
}

export function assertTierId(tierId: number): void {
    if (!Number.isInteger(tierId) || tierId < 1 || tierId > MAX_TIER_ID) {
        throw new LifecycleError('InvalidMagnitude', `Tier id must be an integer between 1 and ${MAX_TIER_ID}`, 'InvalidTierId');
    }
}

/**
 * Owns the status and boundary timestamps of every tier.
 * Each operation looks itself up in the transition table, so a status
 * guard cannot drift from one operation to the next.
 */
export class LifecycleService {
    constructor(private readonly deps: LifecycleServiceDeps) {}

    public getTier(tierId: number): Tier {
        assertTierId(tierId);
        return this.deps.tiers.get(tierId);
    }

    public listTiers(): Tier[] {
        return this.deps.tiers.list();
    }

    public setDuration(caller: string, tierId: number, duration: number): Tier {
        const { minDuration } = this.deps.timings;
        if (!Number.isInteger(duration) || duration < minDuration || duration > MAX_DURATION) {
            throw new LifecycleError(
                'InvalidMagnitude',
                `Duration must be a whole number of seconds between ${minDuration} and ${MAX_DURATION}`,
                'InvalidDuration'
            );
        }
        return this.transition(caller, tierId, 'setDuration', undefined, (tier) => ({ ...tier, duration }));
    }

    public setStart(caller: string, tierId: number, timestamp: number): Tier {
        return this.transition(caller, tierId, 'setStart', timestamp, (tier) => ({ ...tier, start: timestamp }));
    }

    public activate(caller: string, tierId: number): Tier {
        return this.transition(caller, tierId, 'activate', undefined, (tier) => tier);
    }

    public pause(caller: string, tierId: number, timestamp: number): Tier {
        return this.transition(caller, tierId, 'pause', timestamp, (tier) => ({ ...tier, pause: timestamp, end: 0 }));
    }

    public setEnd(caller: string, tierId: number, timestamp: number): Tier {
        return this.transition(caller, tierId, 'setEnd', timestamp, (tier) => ({ ...tier, end: timestamp, pause: 0 }));
    }

    public unpause(caller: string, tierId: number): Tier {
        return this.transition(caller, tierId, 'unpause', undefined, (tier) => ({ ...tier, pause: 0 }));
    }

    public finish(caller: string, tierId: number): Tier {
        // duration survives a finish
        return this.transition(caller, tierId, 'finish', undefined, (tier) => ({ ...tier, start: 0, pause: 0, end: 0 }));
    }

    /**
     * Throws unless the tier's parameters (fees) may be edited right now.
     */
    public assertEditable(tierId: number): Tier {
        const tier = this.getTier(tierId);
        this.checkTransition(tier, 'setFee');
        return tier;
    }

    private transition(
        caller: string,
        tierId: number,
        operation: TierOperation,
        timestamp: number | undefined,
        apply: (tier: Tier) => Tier
    ): Tier {
        requireAuthorized(this.deps.accessControl, caller, operation);
        assertTierId(tierId);

        return this.deps.ledger.run((emit) => {
            const tier = this.deps.tiers.get(tierId);
            const rule = this.checkTransition(tier, operation, timestamp);
            const next: Tier = { ...apply(tier), status: rule.to };

            this.deps.tiers.save(next);
            this.announce(emit, operation, tier, next);
            return next;
        });
    }

    private checkTransition(tier: Tier, operation: TierOperation, timestamp?: number): TransitionRule {
        const rule = resolveTransition(operation, tier.status);
        if (!rule) {
            throw new LifecycleError('IllegalStateTransition', `Cannot ${operation} tier ${tier.id} while ${tier.status}`);
        }

        const failure = failedTimingCheck(rule.checks, tier, this.deps.clock.now(), this.deps.timings, timestamp);
        if (failure) {
            throw new LifecycleError('IllegalTiming', `Cannot ${operation}: ${failure}`);
        }
        return rule;
    }

    private announce(emit: Emit, operation: TierOperation, before: Tier, after: Tier): void {
        const at = this.deps.clock.now();
        emit({
            type: 'TierPhaseChanged',
            operation,
            tierId: after.id,
            from: before.status,
            to: after.status,
            duration: after.duration,
            start: after.start,
            pause: after.pause,
            end: after.end,
            at,
        });

        const supply = this.deps.assets.totalSupply();
        if (supply > 0) {
            emit({ type: 'BatchMetadataUpdate', fromAssetId: 1, toAssetId: supply, at });
        }
    }
}
