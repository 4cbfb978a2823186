/**
 * unix-ts — Clock
 *
 * Time source for Timestamp.now(). Injected so callers and tests can pin
 * the reading.
 */

import { Temporal } from 'temporal-polyfill';

export interface Clock {
  /** Nanoseconds elapsed since the Unix epoch. */
  epochNanoseconds(): bigint;
}

/** Wall clock, read through the same Temporal implementation as toInstant(). */
export const systemClock: Clock = {
  epochNanoseconds: () => Temporal.Now.instant().epochNanoseconds,
};

/** A clock that always reports the same reading. */
export function fixedClock(epochNanoseconds: bigint): Clock {
  return { epochNanoseconds: () => epochNanoseconds };
}
