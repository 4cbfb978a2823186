/**
 * unix-ts — Configuration Loading
 *
 * Loads UnixTsConfig from <home>/config.yaml.
 * Returns defaults when the file is missing or corrupt.
 */

import * as fs from 'node:fs';
import * as yaml from 'js-yaml';
import { Temporal } from 'temporal-polyfill';
import { configPath } from './paths.js';
import { createLogger, type Logger } from './logger.js';
import {
  DEFAULT_CONFIG,
  LOG_LEVELS,
  type LogLevel,
  type UnixTsConfig,
} from './types.js';

let cached: UnixTsConfig | null = null;
let loading = false;

// Created on first use: logger.ts imports this module.
let configLogger: Logger | null = null;

function log(): Logger {
  configLogger ??= createLogger('config');
  return configLogger;
}

/**
 * Load configuration from disk.
 * Deep-merges file config over defaults. Missing or corrupt file → all defaults.
 */
export function loadConfig(): UnixTsConfig {
  const file = configPath();
  try {
    if (!fs.existsSync(file)) {
      return structuredClone(DEFAULT_CONFIG);
    }

    const raw = fs.readFileSync(file, 'utf-8');
    const parsed: unknown = yaml.load(raw, { schema: yaml.JSON_SCHEMA });
    if (parsed === undefined || parsed === null) {
      return structuredClone(DEFAULT_CONFIG);
    }
    if (!isRecord(parsed)) {
      log().warn(`Config at ${file} is not a mapping, using defaults`);
      return structuredClone(DEFAULT_CONFIG);
    }

    const merged = deepMerge(toRecord(DEFAULT_CONFIG), parsed);
    return validateConfig(merged);
  } catch (err) {
    log().warn(`Failed to load config at ${file}, using defaults`, err);
    return structuredClone(DEFAULT_CONFIG);
  }
}

/**
 * Cached config, frozen. Re-entrant calls made while the file is being read
 * (the loader logs through a logger that reads the config) get the defaults.
 */
export function getConfig(): UnixTsConfig {
  if (cached) return cached;
  if (loading) return DEFAULT_CONFIG;
  loading = true;
  try {
    cached = freezeConfig(loadConfig());
  } finally {
    loading = false;
  }
  return cached;
}

/** Drop the cached config so the next getConfig() reads the file again. */
export function resetConfigCache(): void {
  cached = null;
}

/** True for an IANA zone name or a fixed offset the calendar adapter accepts. */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    Temporal.Instant.fromEpochNanoseconds(0n).toZonedDateTimeISO(timeZone);
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate and normalize config values.
 * Invalid values fall back to defaults from DEFAULT_CONFIG.
 */
function validateConfig(merged: Record<string, unknown>): UnixTsConfig {
  const defaults = DEFAULT_CONFIG;
  const datetime = section(merged, 'datetime');
  const logging = section(merged, 'logging');

  // Validate datetime
  let timeZone = defaults.datetime.timeZone;
  const rawZone = datetime['timeZone'];
  if (typeof rawZone === 'string' && isValidTimeZone(rawZone)) {
    timeZone = rawZone;
  } else {
    log().warn(`Invalid datetime.timeZone ${String(rawZone)}, using default`);
  }

  // Validate logging
  const rawEnabled = logging['enabled'];
  const enabled = typeof rawEnabled === 'boolean' ? rawEnabled : defaults.logging.enabled;
  const rawLevel = logging['level'];
  const level = isLogLevel(rawLevel) ? rawLevel : defaults.logging.level;

  return {
    datetime: { timeZone },
    logging: { enabled, level },
  };
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(l => l === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(config: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = config[key];
  return isRecord(value) ? value : {};
}

function freezeConfig(config: UnixTsConfig): UnixTsConfig {
  Object.freeze(config.datetime);
  Object.freeze(config.logging);
  return Object.freeze(config);
}

function toRecord(config: UnixTsConfig): Record<string, unknown> {
  return {
    datetime: { ...config.datetime },
    logging: { ...config.logging },
  };
}

/**
 * Deep merge source into target. Source values override target values.
 * Only merges plain objects — arrays and primitives are replaced wholesale.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = target[key];

    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else if (sourceVal !== undefined) {
      result[key] = sourceVal;
    }
  }

  return result;
}
