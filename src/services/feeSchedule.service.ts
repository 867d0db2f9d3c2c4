import type { FeeVariant } from '../types/lifecycle.js';
import { LifecycleError } from '../errors/lifecycleError.js';
import { MAX_BPS, MAX_FEE } from '../config/limits.js';
import type { FeeRepository } from '../repositories/fee.repository.js';
import { requireAuthorized, type AccessControl } from './accessControl.js';
import type { Clock } from './clock.js';
import type { Ledger } from './ledger.js';
import { assertTierId, type LifecycleService } from './lifecycle.service.js';

export interface FeeScheduleDeps {
    fees: FeeRepository;
    lifecycle: LifecycleService;
    ledger: Ledger;
    accessControl: AccessControl;
    clock: Clock;
}

/**
 * `base − base * bps / 10000`, floored.
 * @throws LifecycleError InvalidMagnitude (UndefinedFee) for a zero base,
 *   (ExceedsMaxBPS) for more than 10000 bps.
 */
export function applyDiscount(base: bigint, bps: bigint): bigint {
    if (base === 0n) {
        throw new LifecycleError('InvalidMagnitude', 'Cannot discount an undefined fee', 'UndefinedFee');
    }
    if (bps < 0n || bps > MAX_BPS) {
        throw new LifecycleError('InvalidMagnitude', `Discount must be between 0 and ${MAX_BPS} bps`, 'ExceedsMaxBPS');
    }
    return base - (base * bps) / MAX_BPS;
}

export class FeeScheduleService {
    constructor(private readonly deps: FeeScheduleDeps) {}

    public getFee(tierId: number, variant: FeeVariant = 'flat'): bigint {
        assertTierId(tierId);
        return this.deps.fees.get(tierId, variant);
    }

    public hasFee(tierId: number, variant: FeeVariant): boolean {
        return this.deps.fees.has(tierId, variant);
    }

    public setFee(caller: string, tierId: number, fee: bigint): bigint {
        requireAuthorized(this.deps.accessControl, caller, 'setFee');
        if (fee < 0n || fee > MAX_FEE) {
            throw new LifecycleError('InvalidMagnitude', 'Fee must fit in 128 bits', 'FeeOutOfRange');
        }
        return this.write(tierId, 'flat', () => fee);
    }

    /**
     * Stores the discounted variant of the tier's current flat fee.
     * Later flat fee changes do not touch the stored discount.
     */
    public setDiscount(caller: string, tierId: number, bps: number): bigint {
        requireAuthorized(this.deps.accessControl, caller, 'setDiscount');
        if (!Number.isInteger(bps)) {
            throw new LifecycleError('InvalidMagnitude', 'Discount must be a whole number of bps', 'ExceedsMaxBPS');
        }
        return this.write(tierId, 'discount', () => applyDiscount(this.deps.fees.get(tierId, 'flat'), BigInt(bps)));
    }

    private write(tierId: number, variant: FeeVariant, compute: () => bigint): bigint {
        return this.deps.ledger.run((emit) => {
            this.deps.lifecycle.assertEditable(tierId);
            const fee = compute();
            const previousFee = this.deps.fees.get(tierId, variant);
            this.deps.fees.set(tierId, variant, fee);
            emit({ type: 'FeeChanged', tierId, variant, previousFee, fee, at: this.deps.clock.now() });
            return fee;
        });
    }
}
