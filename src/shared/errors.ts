/**
 * unix-ts — Error Types
 *
 * Typed errors for each subsystem. All extend TimestampError.
 */

export class TimestampError extends Error {
  constructor(
    message: string,
    public readonly subsystem: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'TimestampError';
  }
}

export class TimestampParseError extends TimestampError {
  constructor(
    public readonly input: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`Cannot parse timestamp literal ${JSON.stringify(input)}: ${reason}`, 'parser', cause);
    this.name = 'TimestampParseError';
  }
}

export class TimestampRangeError extends TimestampError {
  constructor(message: string, cause?: unknown) {
    super(message, 'range', cause);
    this.name = 'TimestampRangeError';
  }
}

export class ClockError extends TimestampError {
  constructor(message: string, cause?: unknown) {
    super(message, 'clock', cause);
    this.name = 'ClockError';
  }
}
