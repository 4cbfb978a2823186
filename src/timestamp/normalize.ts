/**
 * unix-ts — Normalization
 *
 * The one place where carries and borrows across the second boundary are
 * resolved. Every constructor and operator of Timestamp and Span routes
 * its (seconds, nanos) pair through normalize().
 *
 * Overflow policy: checked. A result outside the target's seconds range
 * throws TimestampRangeError rather than wrapping or saturating.
 */

import { TimestampRangeError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { I64_MAX, I64_MIN, U64_MAX, floorDiv } from './integers.js';

const log = createLogger('normalize');

export const NANOS_PER_SECOND = 1_000_000_000;

/** nanos inputs are unsigned 32-bit */
export const MAX_RAW_NANOS = 0xffff_ffff;

/** A (seconds, nanos) pair; nanos is always a non-negative offset. */
export interface SecondsNanos {
  readonly seconds: bigint;
  readonly nanos: number;
}

export interface SecondsBounds {
  readonly min: bigint;
  readonly max: bigint;
  readonly label: string;
}

/** Signed 64-bit seconds, for timestamps. */
export const TIMESTAMP_BOUNDS: SecondsBounds = { min: I64_MIN, max: I64_MAX, label: 'timestamp' };

/** Unsigned 64-bit seconds, for spans. */
export const SPAN_BOUNDS: SecondsBounds = { min: 0n, max: U64_MAX, label: 'span' };

/**
 * Carry whole seconds out of `nanos` until it lies in [0, 1e9), then check
 * the seconds range.
 */
export function normalize(
  seconds: bigint,
  nanos: number,
  bounds: SecondsBounds = TIMESTAMP_BOUNDS,
): SecondsNanos {
  if (!Number.isInteger(nanos) || nanos < 0 || nanos > MAX_RAW_NANOS) {
    throw new TimestampRangeError(
      `nanos must be an integer in [0, ${MAX_RAW_NANOS}], got ${nanos}`,
    );
  }

  let s = seconds;
  let n = nanos;
  if (n >= NANOS_PER_SECOND) {
    const carry = Math.floor(n / NANOS_PER_SECOND);
    s += BigInt(carry);
    n -= carry * NANOS_PER_SECOND;
  }

  if (s < bounds.min || s > bounds.max) {
    log.debug(`${bounds.label} seconds out of range`, { seconds: s, nanos: n });
    throw new TimestampRangeError(
      `${bounds.label} seconds ${s} outside [${bounds.min}, ${bounds.max}]`,
    );
  }

  return { seconds: s, nanos: n };
}

/** a + b; both nanos are < 1e9, so at most one second is carried. */
export function sum(
  a: SecondsNanos,
  b: SecondsNanos,
  bounds: SecondsBounds = TIMESTAMP_BOUNDS,
): SecondsNanos {
  return normalize(a.seconds + b.seconds, a.nanos + b.nanos, bounds);
}

/** a - b, borrowing one second when b's nanos exceed a's. */
export function difference(
  a: SecondsNanos,
  b: SecondsNanos,
  bounds: SecondsBounds = TIMESTAMP_BOUNDS,
): SecondsNanos {
  if (b.nanos > a.nanos) {
    return normalize(a.seconds - b.seconds - 1n, a.nanos + NANOS_PER_SECOND - b.nanos, bounds);
  }
  return normalize(a.seconds - b.seconds, a.nanos - b.nanos, bounds);
}

/**
 * Split a count of sub-second units (`unitsPerSecond` of them per second)
 * into floor seconds and a non-negative nanos remainder.
 */
export function fromUnits(
  value: bigint,
  unitsPerSecond: bigint,
  bounds: SecondsBounds = TIMESTAMP_BOUNDS,
): SecondsNanos {
  const seconds = floorDiv(value, unitsPerSecond);
  const remainder = value - seconds * unitsPerSecond;
  const nanosPerUnit = BigInt(NANOS_PER_SECOND) / unitsPerSecond;
  return normalize(seconds, Number(remainder * nanosPerUnit), bounds);
}
