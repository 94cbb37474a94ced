export const CLOCK = Symbol('CLOCK');

/** Millisecond wall clock, injectable so expiry logic can be tested. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
