/**
 * unix-ts — Date-time Conversion
 *
 * Bridges Timestamp to Temporal (via temporal-polyfill) and to Date.
 * Only `seconds` and `nanos` are read; zone rules come from the runtime's
 * Intl time-zone data.
 */

import { Temporal } from 'temporal-polyfill';
import { getConfig } from '../shared/config.js';
import { TimestampRangeError } from '../shared/errors.js';
import { Timestamp } from '../timestamp/timestamp.js';

// Re-export the Temporal namespace so callers get the same class identities
export { Temporal };

const NANOS_PER_SECOND = 1_000_000_000n;

/** Exact instant, nanosecond precision. */
export function toInstant(ts: Timestamp): Temporal.Instant {
  const epochNanoseconds = ts.seconds * NANOS_PER_SECOND + BigInt(ts.nanos);
  try {
    return Temporal.Instant.fromEpochNanoseconds(epochNanoseconds);
  } catch (err) {
    throw new TimestampRangeError(`timestamp ${ts.toKey()} is outside the Temporal.Instant range`, err);
  }
}

export function fromInstant(instant: Temporal.Instant): Timestamp {
  return Timestamp.fromNanos(instant.epochNanoseconds);
}

/**
 * Wall-clock date-time in a time zone: an IANA name ("America/New_York")
 * or a fixed offset ("+05:30"). Defaults to `datetime.timeZone` from config.
 */
export function toZonedDateTime(ts: Timestamp, timeZone?: string): Temporal.ZonedDateTime {
  const zone = timeZone ?? getConfig().datetime.timeZone;
  const instant = toInstant(ts);
  try {
    return instant.toZonedDateTimeISO(zone);
  } catch (err) {
    throw new TimestampRangeError(`unknown time zone ${JSON.stringify(zone)}`, err);
  }
}

/** Zone-less calendar fields, as seen on a wall clock in `timeZone`. */
export function toPlainDateTime(ts: Timestamp, timeZone?: string): Temporal.PlainDateTime {
  return toZonedDateTime(ts, timeZone).toPlainDateTime();
}

/** Millisecond precision; sub-millisecond nanos are truncated. */
export function toDate(ts: Timestamp): Date {
  const millis = ts.atPrecision(3);
  const date = new Date(Number(millis));
  if (Number.isNaN(date.getTime())) {
    throw new TimestampRangeError(`timestamp ${ts.toKey()} is outside the Date range`);
  }
  return date;
}

export function fromDate(date: Date): Timestamp {
  const millis = date.getTime();
  if (Number.isNaN(millis)) {
    throw new TimestampRangeError('invalid Date');
  }
  return Timestamp.fromMillis(millis);
}
