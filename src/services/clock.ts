/** Source of "now", in unix seconds. Assumed non-decreasing between calls. */
export interface Clock {
    now(): number;
}

export const systemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000),
};
