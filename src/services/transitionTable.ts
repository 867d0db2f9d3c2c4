import { TierStatus, type LifecycleTimings, type Tier, type TierOperation } from '../types/lifecycle.js';
import { MAX_TIMESTAMP } from '../config/limits.js';

/**
 * Timing guards a transition can require.
 *
 * - `reinitWindowOpen`: now ≥ (start + duration) − reinitWindow
 * - `pauseElapsed` / `endElapsed`: now is strictly past the boundary
 * - `beforeStart`: now < start
 * - `futureTimestamp`: the supplied timestamp is > now and ≤ MAX_TIMESTAMP
 */
export type TimingCheck = 'reinitWindowOpen' | 'pauseElapsed' | 'endElapsed' | 'beforeStart' | 'futureTimestamp';

export interface TransitionRule {
    to: TierStatus;
    checks: readonly TimingCheck[];
}

const stay = (status: TierStatus, ...checks: TimingCheck[]): TransitionRule => ({ to: status, checks });

/**
 * The only place that decides which operation is legal in which status.
 * A (status, operation) pair missing here is an illegal transition.
 */
export const TRANSITIONS: Readonly<Record<TierOperation, Partial<Record<TierStatus, TransitionRule>>>> = {
    setDuration: {
        [TierStatus.NOT_LIVE]: { to: TierStatus.READY_TO_START, checks: [] },
        [TierStatus.READY_TO_START]: stay(TierStatus.READY_TO_START),
        [TierStatus.READY_TO_LIVE]: stay(TierStatus.READY_TO_LIVE),
        [TierStatus.LIVE]: stay(TierStatus.LIVE, 'reinitWindowOpen'),
        [TierStatus.PAUSED]: stay(TierStatus.PAUSED, 'pauseElapsed'),
    },
    setStart: {
        [TierStatus.READY_TO_START]: { to: TierStatus.READY_TO_LIVE, checks: ['futureTimestamp'] },
        [TierStatus.READY_TO_LIVE]: stay(TierStatus.READY_TO_LIVE, 'futureTimestamp'),
    },
    activate: {
        [TierStatus.READY_TO_LIVE]: { to: TierStatus.LIVE, checks: ['beforeStart'] },
    },
    pause: {
        [TierStatus.LIVE]: { to: TierStatus.PAUSED, checks: ['reinitWindowOpen', 'futureTimestamp'] },
    },
    setEnd: {
        [TierStatus.LIVE]: { to: TierStatus.ENDING, checks: ['reinitWindowOpen', 'futureTimestamp'] },
    },
    unpause: {
        [TierStatus.PAUSED]: { to: TierStatus.LIVE, checks: [] },
    },
    finish: {
        [TierStatus.PAUSED]: { to: TierStatus.FINISHED, checks: ['pauseElapsed'] },
        [TierStatus.ENDING]: { to: TierStatus.FINISHED, checks: ['endElapsed'] },
    },
    setFee: {
        [TierStatus.NOT_LIVE]: stay(TierStatus.NOT_LIVE),
        [TierStatus.READY_TO_START]: stay(TierStatus.READY_TO_START),
        [TierStatus.READY_TO_LIVE]: stay(TierStatus.READY_TO_LIVE),
        [TierStatus.LIVE]: stay(TierStatus.LIVE, 'reinitWindowOpen'),
        [TierStatus.PAUSED]: stay(TierStatus.PAUSED, 'pauseElapsed'),
        [TierStatus.ENDING]: stay(TierStatus.ENDING, 'endElapsed'),
    },
};

export function resolveTransition(operation: TierOperation, status: TierStatus): TransitionRule | undefined {
    return TRANSITIONS[operation][status];
}

/**
 * Returns a description of the first failed check, or null when every check passes.
 */
export function failedTimingCheck(
    checks: readonly TimingCheck[],
    tier: Tier,
    now: number,
    timings: LifecycleTimings,
    timestamp?: number
): string | null {
    for (const check of checks) {
        switch (check) {
            case 'reinitWindowOpen': {
                const opensAt = tier.start + tier.duration - timings.reinitWindow;
                if (now < opensAt) {
                    return `tier ${tier.id} is locked until ${opensAt}`;
                }
                break;
            }
            case 'pauseElapsed':
                if (now <= tier.pause) {
                    return `tier ${tier.id} pause at ${tier.pause} has not passed`;
                }
                break;
            case 'endElapsed':
                if (now <= tier.end) {
                    return `tier ${tier.id} end at ${tier.end} has not passed`;
                }
                break;
            case 'beforeStart':
                if (now >= tier.start) {
                    return `tier ${tier.id} start at ${tier.start} has already passed`;
                }
                break;
            case 'futureTimestamp':
                if (timestamp === undefined || !Number.isInteger(timestamp)) {
                    return 'a whole-second timestamp is required';
                }
                if (timestamp <= now) {
                    return `timestamp ${timestamp} is not after ${now}`;
                }
                if (timestamp > MAX_TIMESTAMP) {
                    return `timestamp ${timestamp} exceeds ${MAX_TIMESTAMP}`;
                }
                break;
        }
    }
    return null;
}
