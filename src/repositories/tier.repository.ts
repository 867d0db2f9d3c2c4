import { TierStatus, type Tier } from '../types/lifecycle.js';
import type { Checkpointable } from '../services/ledger.js';

const blankTier = (id: number): Tier => ({
    id,
    status: TierStatus.NOT_LIVE,
    duration: 0,
    start: 0,
    pause: 0,
    end: 0,
});

/**
 * In-memory table of tier life cycles, keyed by tier id.
 * A tier that was never written reads as NotLive with every field at 0.
 */
export class TierRepository implements Checkpointable {
    private tiers = new Map<number, Tier>();

    public get(tierId: number): Tier {
        const tier = this.tiers.get(tierId);
        return tier ? { ...tier } : blankTier(tierId);
    }

    public save(tier: Tier): void {
        this.tiers.set(tier.id, { ...tier });
    }

    public list(): Tier[] {
        return [...this.tiers.values()].map((tier) => ({ ...tier })).sort((a, b) => a.id - b.id);
    }

    public checkpoint(): () => void {
        const saved = new Map(this.tiers);
        return () => {
            this.tiers = saved;
        };
    }
}
