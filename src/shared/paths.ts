/**
 * unix-ts — Path Constants
 *
 * Locations of the optional runtime files (config and logs).
 * The root defaults to ~/.unix-ts and can be moved with UNIX_TS_HOME.
 */

import * as path from 'node:path';
import * as os from 'node:os';

/** Resolve the root directory. Read on every call so tests can redirect it. */
export function unixTsHome(): string {
  const override = process.env['UNIX_TS_HOME'];
  if (override !== undefined && override.trim().length > 0) {
    return path.resolve(override);
  }
  return path.join(os.homedir(), '.unix-ts');
}

/** Path to the YAML config file. */
export function configPath(): string {
  return path.join(unixTsHome(), 'config.yaml');
}

/** Directory holding per-module log files. */
export function logDir(): string {
  return path.join(unixTsHome(), 'logs');
}

/** Log file for a named logger. Strips anything that could escape the log dir. */
export function logFilePath(name: string): string {
  const safe = name.replace(/[^a-zA-Z0-9_-]/g, '');
  return path.join(logDir(), `${safe || 'unix-ts'}.log`);
}
