import type { FeeVariant } from '../types/lifecycle.js';
import type { Checkpointable } from '../services/ledger.js';

const feeKey = (tierId: number, variant: FeeVariant) => `${variant}:${tierId}`;

/**
 * In-memory fee magnitudes, keyed by tier and variant. Unset fees read as 0.
 */
export class FeeRepository implements Checkpointable {
    private fees = new Map<string, bigint>();

    public get(tierId: number, variant: FeeVariant): bigint {
        return this.fees.get(feeKey(tierId, variant)) ?? 0n;
    }

    public has(tierId: number, variant: FeeVariant): boolean {
        return this.fees.has(feeKey(tierId, variant));
    }

    public set(tierId: number, variant: FeeVariant, fee: bigint): void {
        this.fees.set(feeKey(tierId, variant), fee);
    }

    public checkpoint(): () => void {
        const saved = new Map(this.fees);
        return () => {
            this.fees = saved;
        };
    }
}
