/**
 * unix-ts — Literal parser tests
 */

import { describe, it, expect, vi } from 'vitest';
import { parseTimestamp, tryParseTimestamp, ts } from '../../src/literal/parser.js';
import { Timestamp } from '../../src/timestamp/timestamp.js';
import { I64_MIN } from '../../src/timestamp/integers.js';
import { TimestampParseError, TimestampRangeError } from '../../src/shared/errors.js';

vi.mock('../../src/shared/logger.js', () => ({
  createLogger: () => ({
    warn: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

function parts(t: Timestamp): [bigint, number] {
  return [t.seconds, t.nanos];
}

describe('parseTimestamp', () => {
  it('parses integers', () => {
    expect(parseTimestamp('1335020400').equals(Timestamp.create(1335020400, 0))).toBe(true);
  });

  it('parses decimals at nanosecond precision', () => {
    expect(parseTimestamp('1335020400.50').equals(Timestamp.create(1335020400, 500_000_000))).toBe(true);
  });

  it('parses negative integers', () => {
    const t = parseTimestamp('-1000');
    expect(t.seconds).toBe(-1000n);
    expect(t.nanos).toBe(0);
  });

  it('moves negative decimals one second further from zero', () => {
    const t = parseTimestamp('-10000.25');
    expect(t.seconds).toBe(-10001n);
    expect(t.subsec(2)).toBe(25);
  });

  it('implies a zero before a leading decimal point', () => {
    const negative = parseTimestamp('-.5');
    expect(negative.seconds).toBe(-1n);
    expect(negative.subsec(1)).toBe(5);

    const positive = parseTimestamp('.5');
    expect(positive.seconds).toBe(0n);
    expect(positive.subsec(1)).toBe(5);
  });

  it('does not adjust negative numerals with a zero fraction', () => {
    expect(parts(parseTimestamp('-5.0'))).toEqual([-5n, 0]);
    expect(parts(parseTimestamp('-5.0000000001'))).toEqual([-5n, 0]);
  });

  it('truncates fractions past nine digits', () => {
    expect(parts(parseTimestamp('1.1234567899'))).toEqual([1n, 123_456_789]);
  });

  it('trims whitespace around the numeral and after the sign', () => {
    expect(parts(parseTimestamp('  42  '))).toEqual([42n, 0]);
    expect(parts(parseTimestamp('- 7.5'))).toEqual([-8n, 500_000_000]);
  });

  it('accepts an empty fraction', () => {
    expect(parts(parseTimestamp('5.'))).toEqual([5n, 0]);
  });

  it('keeps the fraction non-negative for every negative literal', () => {
    for (const literal of ['-0.1', '-1.999999999', '-86400.5', '-.000000001']) {
      const t = parseTimestamp(literal);
      expect(t.subsec(9)).toBeGreaterThanOrEqual(0);
      expect(t.seconds).toBeLessThan(0n);
    }
  });

  it.each(['', '   ', '-', '1.2.3', 'abc', '12a', '1.2x', '+5', '1e9', '--5', '1_000'])(
    'rejects %j',
    literal => {
      expect(() => parseTimestamp(literal)).toThrow(TimestampParseError);
    },
  );

  it('reports the input and subsystem on parse errors', () => {
    try {
      parseTimestamp('1.2.3');
      expect.unreachable('parseTimestamp should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(TimestampParseError);
      if (err instanceof TimestampParseError) {
        expect(err.input).toBe('1.2.3');
        expect(err.subsystem).toBe('parser');
        expect(err.message).toBe('Cannot parse timestamp literal "1.2.3": more than one decimal point');
      }
    }
  });

  it('parses the signed 64-bit extremes', () => {
    expect(parseTimestamp('-9223372036854775808').seconds).toBe(I64_MIN);
    expect(parts(parseTimestamp('-9223372036854775807.5'))).toEqual([I64_MIN, 500_000_000]);
  });

  it('rejects whole parts beyond the signed 64-bit range', () => {
    expect(() => parseTimestamp('9223372036854775808')).toThrow(TimestampRangeError);
  });
});

describe('tryParseTimestamp', () => {
  it('returns the value on success', () => {
    const result = tryParseTimestamp('1.5');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(parts(result.value)).toEqual([1n, 500_000_000]);
    }
  });

  it('returns the error on malformed input', () => {
    const result = tryParseTimestamp('x');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TimestampParseError);
    }
  });

  it('returns range errors as results', () => {
    const result = tryParseTimestamp('99999999999999999999');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(TimestampRangeError);
    }
  });
});

describe('ts template', () => {
  it('parses literal text', () => {
    expect(parts(ts`1335020400.25`)).toEqual([1335020400n, 250_000_000]);
  });

  it('joins interpolations into the numeral', () => {
    expect(parts(ts`${-86400}`)).toEqual([-86400n, 0]);
    expect(parts(ts`-${10}.5`)).toEqual([-11n, 500_000_000]);
  });
});
