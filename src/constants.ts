// Path: src/constants.ts
// Centralized defaults for gates and the wait loop

/**
 * Wait loop defaults (in seconds)
 */
export const WAIT_DEFAULTS = {
  /** Delay between poll attempts */
  SLEEP_SECONDS: 1,

  /** Multiplier applied to the delay when backoff is configured */
  BACKOFF_FACTOR: 2,
} as const;

/**
 * Environment variables read by loadGateConfig()
 */
export const ENV_VARS = {
  LOG_LEVEL: 'POLLGATE_LOG_LEVEL',
  SLEEP_SECONDS: 'POLLGATE_SLEEP_SECONDS',
  TIMEOUT_SECONDS: 'POLLGATE_TIMEOUT_SECONDS',
} as const;

/**
 * Process exit codes used by the CLI
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  TIMEOUT: 2,
} as const;

/** Logger name */
export const LOGGER_NAME = 'pollgate';

/** Package version, kept in step with package.json */
export const VERSION = '1.0.0';
