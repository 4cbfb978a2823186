/**
 * unix-ts — Structured Logging
 *
 * Writes timestamped log entries to <home>/logs/<name>.log.
 * Entries below the configured level are dropped.
 * Never throws — logging failures are silently swallowed.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { logFilePath } from './paths.js';
import { getConfig } from './config.js';
import { LOG_LEVELS, type LogLevel } from './types.js';

const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5 MB

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

function isEnabled(level: LogLevel): boolean {
  const { logging } = getConfig();
  if (!logging.enabled) return false;
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(logging.level);
}

function formatArg(a: unknown): string {
  if (a instanceof Error) {
    return `${a.name}: ${a.message}${a.stack ? `\n${a.stack}` : ''}`;
  }
  if (typeof a === 'bigint') {
    return `${a}n`;
  }
  if (typeof a === 'object' && a !== null) {
    try {
      return JSON.stringify(a, (_key, value: unknown) =>
        typeof value === 'bigint' ? value.toString() : value,
      );
    } catch {
      return String(a);
    }
  }
  return String(a);
}

/**
 * Create a logger for a specific module.
 * The file path is resolved per entry, so UNIX_TS_HOME changes take effect.
 */
export function createLogger(name: string): Logger {
  function rotateIfNeeded(logPath: string): void {
    try {
      const stats = fs.statSync(logPath);
      if (stats.size >= MAX_LOG_SIZE) {
        // Single rotation: current → .1 (overwrite previous .1)
        fs.renameSync(logPath, `${logPath}.1`);
      }
    } catch {
      // File doesn't exist or can't stat — nothing to rotate
    }
  }

  function log(level: LogLevel, ...args: unknown[]): void {
    try {
      if (!isEnabled(level)) return;

      const logPath = logFilePath(name);
      const dir = path.dirname(logPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      rotateIfNeeded(logPath);

      const timestamp = new Date().toISOString();
      const message = args.map(formatArg).join(' ');
      fs.appendFileSync(logPath, `[${timestamp}] [${level}] ${message}\n`);
    } catch {
      // Logging must never throw. Swallow silently.
    }
  }

  return {
    debug: (...args: unknown[]) => log('DEBUG', ...args),
    info: (...args: unknown[]) => log('INFO', ...args),
    warn: (...args: unknown[]) => log('WARN', ...args),
    error: (...args: unknown[]) => log('ERROR', ...args),
  };
}
