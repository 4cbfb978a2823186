/**
 * unix-ts — Public API tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  ClockError,
  Span,
  Timestamp,
  TimestampError,
  TimestampParseError,
  TimestampRangeError,
  formatTimestamp,
  getConfig,
  parseTimestamp,
  resetConfigCache,
  toZonedDateTime,
  tryParseTimestamp,
  ts,
} from '../src/index.js';

describe('public API', () => {
  it('composes parsing, arithmetic and formatting', () => {
    const start = ts`1335020400.5`;
    const later = start.add(Span.fromMillis(86_400_250));

    expect(later.toKey()).toBe('1335106800:750000000');
    expect(formatTimestamp(later, 2)).toBe('1335106800.75');
    expect(toZonedDateTime(later, 'UTC').toPlainDateTime().toString()).toBe('2012-04-22T15:00:00.75');
  });

  it('exports a single error hierarchy', () => {
    const parseError = new TimestampParseError('x', 'bad');
    const rangeError = new TimestampRangeError('too big');
    const clockError = new ClockError('early');

    for (const err of [parseError, rangeError, clockError]) {
      expect(err).toBeInstanceOf(TimestampError);
      expect(err).toBeInstanceOf(Error);
    }
    expect([parseError.subsystem, rangeError.subsystem, clockError.subsystem])
      .toEqual(['parser', 'range', 'clock']);
    expect(parseError.name).toBe('TimestampParseError');
  });

  it('keeps the cause of wrapped errors', () => {
    const cause = new RangeError('inner');
    expect(new TimestampRangeError('outer', cause).cause).toBe(cause);
  });

  it('parses what it formats for whole seconds', () => {
    const t = Timestamp.from(-86400);
    expect(parseTimestamp(t.toString()).equals(t)).toBe(true);
  });
});

describe('ambient logging and config', () => {
  let tmpHome: string;
  const originalHome = process.env['UNIX_TS_HOME'];

  beforeEach(() => {
    tmpHome = fs.mkdtempSync(path.join(os.tmpdir(), 'unix-ts-index-'));
    process.env['UNIX_TS_HOME'] = tmpHome;
    resetConfigCache();
  });

  afterEach(() => {
    if (originalHome === undefined) {
      delete process.env['UNIX_TS_HOME'];
    } else {
      process.env['UNIX_TS_HOME'] = originalHome;
    }
    resetConfigCache();
    fs.rmSync(tmpHome, { recursive: true, force: true });
  });

  it('writes no log file for out-of-range input under the default config', () => {
    const result = tryParseTimestamp('99999999999999999999');

    expect(result.ok).toBe(false);
    expect(fs.existsSync(path.join(tmpHome, 'logs'))).toBe(false);
  });

  it('logs config fallbacks and range errors when DEBUG is enabled', () => {
    fs.writeFileSync(
      path.join(tmpHome, 'config.yaml'),
      'datetime:\n  timeZone: Mars/Olympus_Mons\nlogging:\n  level: DEBUG\n',
      'utf-8',
    );

    expect(getConfig().datetime.timeZone).toBe('UTC');
    expect(tryParseTimestamp('99999999999999999999').ok).toBe(false);

    const configLog = fs.readFileSync(path.join(tmpHome, 'logs', 'config.log'), 'utf-8');
    expect(configLog).toContain('[WARN] Invalid datetime.timeZone Mars/Olympus_Mons, using default');
    const normalizeLog = fs.readFileSync(path.join(tmpHome, 'logs', 'normalize.log'), 'utf-8');
    expect(normalizeLog).toContain('[DEBUG] timestamp seconds out of range');
  });

  it('hands out a config that callers cannot modify', () => {
    const config = getConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(() => {
      config.logging.level = 'DEBUG';
    }).toThrow(TypeError);
    expect(getConfig().logging.level).toBe('WARN');
  });
});
