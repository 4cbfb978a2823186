/**
 * unix-ts — Shared Type Definitions
 */

// =============================================================================
// Logging
// =============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

// =============================================================================
// Configuration
// =============================================================================

export interface UnixTsConfig {
  datetime: {
    timeZone: string;           // IANA name or ±HH:MM offset
  };
  logging: {
    enabled: boolean;
    level: LogLevel;
  };
}

/** Default configuration values. Frozen; loadConfig() hands out copies. */
export const DEFAULT_CONFIG: UnixTsConfig = Object.freeze({
  datetime: Object.freeze({
    timeZone: 'UTC',
  }),
  logging: Object.freeze({
    enabled: true,
    level: 'WARN',
  }),
});

/** Largest precision accepted by the display module (Number#toFixed limit). */
export const MAX_DISPLAY_PRECISION = 100;
