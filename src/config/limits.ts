import type { LifecycleTimings } from '../types/lifecycle.js'

/** Largest timestamp a tier boundary may hold (40-bit seconds). */
export const MAX_TIMESTAMP = 2 ** 40 - 1

/** Largest tier duration, and so the largest cached asset duration. */
export const MAX_DURATION = 2 ** 32 - 1

/** Fees fit in 128 bits so `fee * duration` stays well inside 256 bits. */
export const MAX_FEE = 2n ** 128n - 1n

export const MAX_TIER_ID = 0xffff

export const MAX_BPS = 10_000n

export const HOUR = 60 * 60
export const DAY = 24 * HOUR

export const DEFAULT_TIMINGS: LifecycleTimings = {
  reinitWindow: 48 * HOUR,
  earlyRenewalWindow: 2 * HOUR,
  lateRenewalWindow: 60,
  minDuration: DAY,
}

export const DEFAULT_MAX_BATCH_SIZE = 20
