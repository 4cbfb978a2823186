/**
 * unix-ts — Public API
 */

export { Timestamp } from './timestamp/timestamp.js';
export type { Ordering, TimestampOperand } from './timestamp/timestamp.js';
export { Span } from './timestamp/span.js';
export { systemClock, fixedClock } from './timestamp/clock.js';
export type { Clock } from './timestamp/clock.js';
export type { SecondsLike } from './timestamp/integers.js';
export { NANOS_PER_SECOND } from './timestamp/normalize.js';
export type { SecondsNanos } from './timestamp/normalize.js';

export { parseTimestamp, tryParseTimestamp, ts } from './literal/parser.js';
export type { ParseResult } from './literal/parser.js';

export { formatTimestamp } from './convert/display.js';
export {
  Temporal,
  toInstant,
  fromInstant,
  toZonedDateTime,
  toPlainDateTime,
  toDate,
  fromDate,
} from './convert/datetime.js';

export {
  TimestampError,
  TimestampParseError,
  TimestampRangeError,
  ClockError,
} from './shared/errors.js';
export { loadConfig, getConfig, resetConfigCache } from './shared/config.js';
export type { UnixTsConfig, LogLevel } from './shared/types.js';
