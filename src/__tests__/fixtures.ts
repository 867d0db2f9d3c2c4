import { createLifecycleContext, type LifecycleContext } from '../context.js';
import { ApiKeyAccessControl } from '../services/accessControl.js';
import type { Clock } from '../services/clock.js';
import { LifecycleError } from '../errors/lifecycleError.js';
import { DAY, HOUR } from '../config/limits.js';
import { TierStatus, type LifecycleTimings, type Tier } from '../types/lifecycle.js';

export const OPERATOR = 'test-operator-key';
export const HOLDER = 'test-holder-key';
export const OWNER = '0x0000000000000000000000000000000000000001';

/** Arbitrary starting "now" for every test clock. */
export const T0 = 1_700_000_000;
export const PERIOD = 30 * DAY;

export class ManualClock implements Clock {
    constructor(public current = T0) {}

    public now(): number {
        return this.current;
    }

    public set(timestamp: number): void {
        this.current = timestamp;
    }

    public advance(seconds: number): void {
        this.current += seconds;
    }
}

export interface TestContextOptions {
    timings?: LifecycleTimings;
    maxBatchSize?: number;
}

export function createTestContext(options: TestContextOptions = {}): { clock: ManualClock; context: LifecycleContext } {
    const clock = new ManualClock();
    const context = createLifecycleContext({
        ...options,
        clock,
        accessControl: new ApiKeyAccessControl([OPERATOR], [HOLDER]),
    });
    return { clock, context };
}

export function catchLifecycleError(work: () => unknown): LifecycleError {
    try {
        work();
    } catch (err) {
        if (err instanceof LifecycleError) {
            return err;
        }
        throw err;
    }
    throw new Error('Expected a LifecycleError');
}

/**
 * Walks a tier forward through the legal operations until it reaches `target`.
 *
 * The tier starts one hour after the clock's current time and the clock is
 * left at the start once Live. Paused and Ending boundaries are set ten hours
 * after the reinit window opens; Finished is reached through Paused.
 */
export function driveTier(
    context: LifecycleContext,
    clock: ManualClock,
    tierId: number,
    target: TierStatus,
    duration = PERIOD
): Tier {
    let tier = context.lifecycle.getTier(tierId);
    if (target === TierStatus.NOT_LIVE) {
        return tier;
    }

    tier = context.lifecycle.setDuration(OPERATOR, tierId, duration);
    if (target === TierStatus.READY_TO_START) {
        return tier;
    }

    tier = context.lifecycle.setStart(OPERATOR, tierId, clock.now() + HOUR);
    if (target === TierStatus.READY_TO_LIVE) {
        return tier;
    }

    tier = context.lifecycle.activate(OPERATOR, tierId);
    clock.set(tier.start);
    if (target === TierStatus.LIVE) {
        return tier;
    }

    clock.set(Math.max(clock.now(), tier.start + tier.duration - context.timings.reinitWindow));
    if (target === TierStatus.ENDING) {
        return context.lifecycle.setEnd(OPERATOR, tierId, clock.now() + 10 * HOUR);
    }

    tier = context.lifecycle.pause(OPERATOR, tierId, clock.now() + 10 * HOUR);
    if (target === TierStatus.PAUSED) {
        return tier;
    }

    clock.set(tier.pause + 1);
    return context.lifecycle.finish(OPERATOR, tierId);
}
