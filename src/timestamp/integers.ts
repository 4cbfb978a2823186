/**
 * unix-ts — Integer Coercion
 *
 * Every whole-second input is widened to bigint through toBigInt(), so the
 * value type needs one arithmetic entry point instead of one per width.
 */

import { TimestampRangeError } from '../shared/errors.js';

/** Whole seconds (or whole sub-second units) as accepted by the public API. */
export type SecondsLike = bigint | number;

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;
export const U64_MAX = 2n ** 64n - 1n;

/**
 * Widen a SecondsLike to bigint.
 * A number must be a safe integer; fractions and NaN are rejected.
 */
export function toBigInt(value: SecondsLike, what = 'seconds'): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isSafeInteger(value)) {
    throw new TimestampRangeError(`${what} must be a safe integer, got ${value}`);
  }
  return BigInt(value);
}

/** Division rounding toward negative infinity. `divisor` must be positive. */
export function floorDiv(dividend: bigint, divisor: bigint): bigint {
  const quotient = dividend / divisor;
  // bigint division truncates toward zero
  return dividend % divisor < 0n ? quotient - 1n : quotient;
}
