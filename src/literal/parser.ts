/**
 * unix-ts — Literal Parser
 *
 * Turns a signed decimal numeral ("1335020400", "-0.5", ".25") into a
 * Timestamp. The fraction is read at nanosecond precision: short fractions
 * are zero-extended and digits past the ninth are dropped.
 *
 * Because nanos is a non-negative offset, a negative numeral with a non-zero
 * fraction moves the whole part one second further from zero and keeps the
 * fraction digits as the offset: "-0.5" is (-1n, 500_000_000) and
 * "-10000.25" is (-10001n, 250_000_000).
 */

import { TimestampParseError, TimestampRangeError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { Timestamp } from '../timestamp/timestamp.js';

const log = createLogger('parser');

const DIGITS = /^[0-9]+$/;
const FRACTION_DIGITS = 9;
const ZERO_FRACTION = '0'.repeat(FRACTION_DIGITS);

export type ParseResult =
  | { ok: true; value: Timestamp }
  | { ok: false; error: TimestampParseError | TimestampRangeError };

function reject(input: string, reason: string): never {
  log.debug(`Rejected literal ${JSON.stringify(input)}: ${reason}`);
  throw new TimestampParseError(input, reason);
}

function parseMagnitude(input: string, digits: string, part: string): bigint {
  if (!DIGITS.test(digits)) {
    reject(input, `expected digits in the ${part} part, found ${JSON.stringify(digits)}`);
  }
  return BigInt(digits);
}

/**
 * Parse a decimal numeral into a Timestamp.
 *
 * Accepts an optional leading `-`, a whole part, and an optional `.`
 * followed by digits; a leading `.` implies a zero whole part.
 * Throws TimestampParseError on malformed input, and TimestampRangeError
 * when the whole part does not fit in 64 signed bits.
 */
export function parseTimestamp(input: string): Timestamp {
  let src = input.trim();
  if (src.length === 0) {
    reject(input, 'empty input');
  }

  const negative = src.startsWith('-');
  if (negative) {
    src = src.slice(1).trimStart();
  }

  if (!src.includes('.')) {
    const whole = parseMagnitude(input, src, 'whole');
    return Timestamp.create(negative ? -whole : whole, 0);
  }

  if (src.startsWith('.')) {
    src = `0${src}`;
  }

  const parts = src.split('.');
  if (parts.length > 2) {
    reject(input, 'more than one decimal point');
  }
  const [wholeDigits = '', fractionDigits = ''] = parts;

  let whole = parseMagnitude(input, wholeDigits, 'whole');
  if (fractionDigits.length > 0 && !DIGITS.test(fractionDigits)) {
    reject(input, `expected digits in the fractional part, found ${JSON.stringify(fractionDigits)}`);
  }
  const fraction = fractionDigits.padEnd(FRACTION_DIGITS, '0').slice(0, FRACTION_DIGITS);

  if (negative && fraction !== ZERO_FRACTION) {
    whole += 1n;
  }

  return Timestamp.create(negative ? -whole : whole, Number(fraction));
}

/** Like parseTimestamp, but reports malformed or out-of-range input as a result value. */
export function tryParseTimestamp(input: string): ParseResult {
  try {
    return { ok: true, value: parseTimestamp(input) };
  } catch (err) {
    if (err instanceof TimestampParseError || err instanceof TimestampRangeError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Template-literal form of parseTimestamp: ts`1335020400.25`.
 * Interpolated values are stringified into the numeral before parsing.
 */
export function ts(strings: TemplateStringsArray, ...values: unknown[]): Timestamp {
  const text = strings.reduce(
    (acc, chunk, i) => acc + chunk + (i < values.length ? String(values[i]) : ''),
    '',
  );
  return parseTimestamp(text);
}
