/**
 * unix-ts — Timestamp
 *
 * Signed whole seconds since the Unix epoch plus a sub-second offset in
 * nanoseconds. The offset is always in [0, 1e9) and is *added* to the
 * seconds, whatever their sign: -0.25s is (seconds: -1n, nanos: 750_000_000).
 * Ordering on (seconds, nanos) is therefore lexicographic.
 *
 * Instances are frozen; every operation returns a new Timestamp.
 */

import { ClockError, TimestampRangeError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { formatTimestamp } from '../convert/display.js';
import { systemClock, type Clock } from './clock.js';
import { toBigInt, type SecondsLike } from './integers.js';
import {
  NANOS_PER_SECOND,
  difference,
  fromUnits,
  normalize,
  sum,
  type SecondsNanos,
} from './normalize.js';
import { Span } from './span.js';

const log = createLogger('timestamp');

/** Anything that can be added to or subtracted from a Timestamp. */
export type TimestampOperand = Timestamp | Span | SecondsLike;

export type Ordering = -1 | 0 | 1;

function checkPrecision(e: number): void {
  if (!Number.isInteger(e) || e < 0 || e > 9) {
    throw new TimestampRangeError(`precision exponent must be an integer in [0, 9], got ${e}`);
  }
}

function toParts(operand: TimestampOperand): SecondsNanos {
  if (operand instanceof Timestamp || operand instanceof Span) {
    return operand;
  }
  return { seconds: toBigInt(operand), nanos: 0 };
}

export class Timestamp implements SecondsNanos {
  /** 1970-01-01T00:00:00Z */
  static readonly EPOCH = new Timestamp(0n, 0);

  private constructor(
    /** Whole seconds, floored: -1n for -0.25s. */
    readonly seconds: bigint,
    /** Sub-second offset added to `seconds`, in [0, 1e9). */
    readonly nanos: number,
  ) {
    Object.freeze(this);
  }

  private static fromParts(parts: SecondsNanos): Timestamp {
    return new Timestamp(parts.seconds, parts.nanos);
  }

  // ===========================================================================
  // Construction
  // ===========================================================================

  /**
   * Create a timestamp from whole seconds and a non-negative nanos offset.
   * Nanos of a second or more carry into `seconds`.
   *
   * For negative instants the offset is still positive: -0.25s is
   * `Timestamp.create(-1, 750_000_000)`.
   */
  static create(seconds: SecondsLike, nanos = 0): Timestamp {
    return Timestamp.fromParts(normalize(toBigInt(seconds), nanos));
  }

  /** Whole seconds since the epoch. */
  static from(seconds: SecondsLike): Timestamp {
    return Timestamp.create(seconds, 0);
  }

  /** Floor-divides, so -1750ms is (seconds: -2n, nanos: 250_000_000). */
  static fromMillis(millis: SecondsLike): Timestamp {
    return Timestamp.fromParts(fromUnits(toBigInt(millis, 'milliseconds'), 1_000n));
  }

  static fromMicros(micros: SecondsLike): Timestamp {
    return Timestamp.fromParts(fromUnits(toBigInt(micros, 'microseconds'), 1_000_000n));
  }

  static fromNanos(nanos: SecondsLike): Timestamp {
    return Timestamp.fromParts(
      fromUnits(toBigInt(nanos, 'nanoseconds'), BigInt(NANOS_PER_SECOND)),
    );
  }

  /** The instant `span` after the epoch. Spans beyond the i64 range throw. */
  static fromSpan(span: Span): Timestamp {
    return Timestamp.fromParts(normalize(span.seconds, span.nanos));
  }

  /**
   * Read the clock. A clock reporting a time before the epoch throws
   * ClockError: the elapsed-time reading is expected to be non-negative.
   */
  static now(clock: Clock = systemClock): Timestamp {
    const elapsed = clock.epochNanoseconds();
    if (elapsed < 0n) {
      log.error(`Clock reported ${elapsed}ns, before the Unix epoch`);
      throw new ClockError(`clock reported a time before the Unix epoch (${elapsed}ns)`);
    }
    return Timestamp.fromNanos(elapsed);
  }

  static isTimestamp(value: unknown): value is Timestamp {
    return value instanceof Timestamp;
  }

  // ===========================================================================
  // Comparison
  // ===========================================================================

  /** Sort comparator: `list.sort(Timestamp.compare)`. */
  static compare(a: Timestamp, b: Timestamp): Ordering {
    return a.compare(b);
  }

  static min(first: Timestamp, ...rest: Timestamp[]): Timestamp {
    return rest.reduce((acc, t) => (t.isBefore(acc) ? t : acc), first);
  }

  static max(first: Timestamp, ...rest: Timestamp[]): Timestamp {
    return rest.reduce((acc, t) => (t.isAfter(acc) ? t : acc), first);
  }

  compare(other: Timestamp): Ordering {
    if (this.seconds !== other.seconds) {
      return this.seconds < other.seconds ? -1 : 1;
    }
    if (this.nanos !== other.nanos) {
      return this.nanos < other.nanos ? -1 : 1;
    }
    return 0;
  }

  equals(other: Timestamp): boolean {
    return this.seconds === other.seconds && this.nanos === other.nanos;
  }

  isBefore(other: Timestamp): boolean {
    return this.compare(other) < 0;
  }

  isAfter(other: Timestamp): boolean {
    return this.compare(other) > 0;
  }

  /** Stable key for Map/Set membership: "<seconds>:<nanos>". */
  toKey(): string {
    return `${this.seconds}:${this.nanos}`;
  }

  // ===========================================================================
  // Readers
  // ===========================================================================

  /**
   * The timestamp as an integer count of 10^-e second units,
   * e.g. milliseconds at e = 3. Sub-unit nanos are truncated.
   * `e` must be an integer from 0 to 9.
   */
  atPrecision(e: number): bigint {
    checkPrecision(e);
    const divisor = 10 ** (9 - e);
    const subsecond = (this.nanos - (this.nanos % divisor)) / divisor;
    return this.seconds * 10n ** BigInt(e) + BigInt(subsecond);
  }

  /** Sub-second part only, in 10^-e second units. Never negative. */
  subsec(e: number): number {
    checkPrecision(e);
    const divisor = 10 ** (9 - e);
    return (this.nanos - (this.nanos % divisor)) / divisor;
  }

  // ===========================================================================
  // Arithmetic
  // ===========================================================================

  /** Whole seconds, another timestamp, or a span. */
  add(other: TimestampOperand): Timestamp {
    return Timestamp.fromParts(sum(this, toParts(other)));
  }

  /** Whole seconds, another timestamp, or a span. */
  sub(other: TimestampOperand): Timestamp {
    return Timestamp.fromParts(difference(this, toParts(other)));
  }

  /**
   * Seconds-only remainder: `seconds % divisor` (truncating, sign of the
   * dividend) with nanos left as they are.
   */
  rem(divisor: SecondsLike): Timestamp {
    const d = toBigInt(divisor, 'divisor');
    if (d === 0n) {
      throw new TimestampRangeError('remainder by zero');
    }
    return Timestamp.fromParts(normalize(this.seconds % d, this.nanos));
  }

  /** Time elapsed since the epoch. Throws for instants before it. */
  toSpan(): Span {
    if (this.seconds < 0n) {
      throw new TimestampRangeError(`timestamp ${this.toKey()} is before the epoch and has no span`);
    }
    return Span.create(this.seconds, this.nanos);
  }

  // ===========================================================================
  // Display
  // ===========================================================================

  /** See formatTimestamp. */
  toString(precision?: number): string {
    return formatTimestamp(this, precision);
  }
}
