/**
 * unix-ts — Span
 *
 * A non-negative duration of whole seconds plus sub-second nanos. Spans
 * carry no sign; subtracting one from a Timestamp is what moves it back.
 */

import { toBigInt, type SecondsLike } from './integers.js';
import {
  NANOS_PER_SECOND,
  SPAN_BOUNDS,
  fromUnits,
  normalize,
  type SecondsNanos,
} from './normalize.js';

export class Span implements SecondsNanos {
  static readonly ZERO = new Span(0n, 0);

  private constructor(
    readonly seconds: bigint,
    readonly nanos: number,
  ) {
    Object.freeze(this);
  }

  private static fromParts(parts: SecondsNanos): Span {
    return new Span(parts.seconds, parts.nanos);
  }

  /** Nanos ≥ 1e9 carry into seconds. Negative seconds throw. */
  static create(seconds: SecondsLike, nanos = 0): Span {
    return Span.fromParts(normalize(toBigInt(seconds), nanos, SPAN_BOUNDS));
  }

  static fromMillis(millis: SecondsLike): Span {
    return Span.fromParts(fromUnits(toBigInt(millis, 'milliseconds'), 1_000n, SPAN_BOUNDS));
  }

  static fromMicros(micros: SecondsLike): Span {
    return Span.fromParts(fromUnits(toBigInt(micros, 'microseconds'), 1_000_000n, SPAN_BOUNDS));
  }

  static fromNanos(nanos: SecondsLike): Span {
    return Span.fromParts(
      fromUnits(toBigInt(nanos, 'nanoseconds'), BigInt(NANOS_PER_SECOND), SPAN_BOUNDS),
    );
  }

  static isSpan(value: unknown): value is Span {
    return value instanceof Span;
  }

  totalNanos(): bigint {
    return this.seconds * BigInt(NANOS_PER_SECOND) + BigInt(this.nanos);
  }

  equals(other: Span): boolean {
    return this.seconds === other.seconds && this.nanos === other.nanos;
  }

  /** e.g. "86400.000000000s" */
  toString(): string {
    return `${this.seconds}.${String(this.nanos).padStart(9, '0')}s`;
  }
}
