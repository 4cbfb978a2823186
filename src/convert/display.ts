/**
 * unix-ts — Display
 *
 * Text rendering of timestamps. Without a precision only whole seconds are
 * shown; with one, `seconds + nanos / 1e9` is rendered as a float, so very
 * high precisions show floating-point noise rather than exact decimals.
 */

import { TimestampRangeError } from '../shared/errors.js';
import { MAX_DISPLAY_PRECISION } from '../shared/types.js';
import type { SecondsNanos } from '../timestamp/normalize.js';

/**
 * Format a timestamp as decimal seconds.
 *
 * - `formatTimestamp(Timestamp.from(1335020400))` → `"1335020400"`
 * - `formatTimestamp(Timestamp.from(1335020400), 2)` → `"1335020400.00"`
 */
export function formatTimestamp(ts: SecondsNanos, precision?: number): string {
  if (precision === undefined) {
    return ts.seconds.toString();
  }
  if (!Number.isInteger(precision) || precision < 0 || precision > MAX_DISPLAY_PRECISION) {
    throw new TimestampRangeError(
      `display precision must be an integer in [0, ${MAX_DISPLAY_PRECISION}], got ${precision}`,
    );
  }
  const float = Number(ts.seconds) + ts.nanos / 1_000_000_000;
  return float.toFixed(precision);
}
