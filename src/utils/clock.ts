/**
 * Injectable clock so TTL and flush timestamps can be driven from tests.
 */

export interface Clock {
  /** Returns current time in milliseconds since epoch */
  now(): number;
}

/** Default clock using Date.now() */
export const REAL_CLOCK: Clock = { now: () => Date.now() };
