// Path: src/gate-config.ts
// Environment-derived defaults and their validation

import { ENV_VARS, WAIT_DEFAULTS } from './constants.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/**
 * Resolved configuration
 */
export interface GateConfig {
  logLevel: LogLevel;
  sleepSeconds: number;
  /** Undefined means wait without a deadline */
  timeoutSeconds?: number;
}

/**
 * Raw values read from the environment before validation
 */
export interface RawGateConfig {
  logLevel?: string;
  sleepSeconds?: string;
  timeoutSeconds?: string;
}

/**
 * Validation result for gate configuration
 */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Read raw configuration values from the environment
 */
export function readRawConfig(env: NodeJS.ProcessEnv = process.env): RawGateConfig {
  return {
    logLevel: env[ENV_VARS.LOG_LEVEL],
    sleepSeconds: env[ENV_VARS.SLEEP_SECONDS],
    timeoutSeconds: env[ENV_VARS.TIMEOUT_SECONDS],
  };
}

/**
 * Log level from the environment, ignoring every other setting.
 * Unknown levels fall back to the default.
 */
export function readLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env[ENV_VARS.LOG_LEVEL];
  return value !== undefined && isLogLevel(value) ? value : DEFAULT_LOG_LEVEL;
}

/**
 * Validate raw configuration values
 */
export function validateGateConfig(raw: RawGateConfig): ConfigValidationResult {
  const errors: string[] = [];

  if (raw.logLevel !== undefined && !isLogLevel(raw.logLevel)) {
    errors.push(`${ENV_VARS.LOG_LEVEL}: unknown level '${raw.logLevel}'`);
  }
  if (raw.sleepSeconds !== undefined) {
    const value = Number(raw.sleepSeconds);
    if (raw.sleepSeconds.trim() === '' || !Number.isFinite(value) || value < 0) {
      errors.push(`${ENV_VARS.SLEEP_SECONDS}: expected a non-negative number, got '${raw.sleepSeconds}'`);
    }
  }
  if (raw.timeoutSeconds !== undefined) {
    const value = Number(raw.timeoutSeconds);
    if (raw.timeoutSeconds.trim() === '' || !Number.isFinite(value)) {
      errors.push(`${ENV_VARS.TIMEOUT_SECONDS}: expected a number, got '${raw.timeoutSeconds}'`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Throw an error if config is invalid
 */
export function assertValidConfig(raw: RawGateConfig): void {
  const result = validateGateConfig(raw);
  if (!result.valid) {
    throw new Error(result.errors[0]);
  }
}

/**
 * Load and validate configuration from the environment
 */
export function loadGateConfig(env: NodeJS.ProcessEnv = process.env): GateConfig {
  const raw = readRawConfig(env);
  assertValidConfig(raw);

  return {
    logLevel: readLogLevel(env),
    sleepSeconds: raw.sleepSeconds !== undefined ? Number(raw.sleepSeconds) : WAIT_DEFAULTS.SLEEP_SECONDS,
    timeoutSeconds: raw.timeoutSeconds !== undefined ? Number(raw.timeoutSeconds) : undefined,
  };
}
