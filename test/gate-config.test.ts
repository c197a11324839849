// Path: test/gate-config.test.ts
// Tests for configuration loading and validation

import { describe, it, expect, vi, afterEach } from 'vitest';
import { loadGateConfig, validateGateConfig, assertValidConfig, readLogLevel } from '../src/gate-config.js';
import { createLogger, getDefaultLogger } from '../src/logger.js';
import { PredicateGate } from '../src/gates/predicate-gate.js';

describe('loadGateConfig', () => {
  it('should use defaults when nothing is set', () => {
    expect(loadGateConfig({})).toEqual({
      logLevel: 'warn',
      sleepSeconds: 1,
      timeoutSeconds: undefined,
    });
  });

  it('should read values from the environment', () => {
    const config = loadGateConfig({
      POLLGATE_LOG_LEVEL: 'debug',
      POLLGATE_SLEEP_SECONDS: '0.25',
      POLLGATE_TIMEOUT_SECONDS: '30',
    });

    expect(config).toEqual({ logLevel: 'debug', sleepSeconds: 0.25, timeoutSeconds: 30 });
  });

  it('should pass negative timeouts through', () => {
    expect(loadGateConfig({ POLLGATE_TIMEOUT_SECONDS: '-1' }).timeoutSeconds).toBe(-1);
  });

  it('should throw the first validation error', () => {
    expect(() => loadGateConfig({ POLLGATE_LOG_LEVEL: 'loud', POLLGATE_SLEEP_SECONDS: 'x' })).toThrow(
      "POLLGATE_LOG_LEVEL: unknown level 'loud'"
    );
  });
});

describe('readLogLevel', () => {
  it('should read only the log level', () => {
    expect(readLogLevel({ POLLGATE_LOG_LEVEL: 'info', POLLGATE_SLEEP_SECONDS: 'fast' })).toBe('info');
  });

  it('should fall back to warn', () => {
    expect(readLogLevel({})).toBe('warn');
    expect(readLogLevel({ POLLGATE_LOG_LEVEL: 'loud' })).toBe('warn');
  });
});

describe('validateGateConfig', () => {
  it('should accept an empty configuration', () => {
    expect(validateGateConfig({})).toEqual({ valid: true, errors: [] });
  });

  it('should collect every error', () => {
    const result = validateGateConfig({ logLevel: 'loud', sleepSeconds: '-2', timeoutSeconds: 'soon' });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "POLLGATE_LOG_LEVEL: unknown level 'loud'",
      "POLLGATE_SLEEP_SECONDS: expected a non-negative number, got '-2'",
      "POLLGATE_TIMEOUT_SECONDS: expected a number, got 'soon'",
    ]);
  });

  it('should reject blank numbers', () => {
    expect(validateGateConfig({ sleepSeconds: ' ' }).errors).toEqual([
      "POLLGATE_SLEEP_SECONDS: expected a non-negative number, got ' '",
    ]);
  });

  it('should not throw from assertValidConfig for valid values', () => {
    expect(() => assertValidConfig({ logLevel: 'silent', sleepSeconds: '0' })).not.toThrow();
  });
});

describe('logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should take its level from POLLGATE_LOG_LEVEL', () => {
    vi.stubEnv('POLLGATE_LOG_LEVEL', 'debug');

    expect(createLogger().level).toBe('debug');
  });

  it('should fall back to warn for an unknown level', () => {
    vi.stubEnv('POLLGATE_LOG_LEVEL', 'loud');

    expect(createLogger().level).toBe('warn');
  });

  it('should ignore malformed wait settings', () => {
    vi.stubEnv('POLLGATE_SLEEP_SECONDS', 'fast');
    vi.stubEnv('POLLGATE_TIMEOUT_SECONDS', 'soon');

    expect(createLogger().level).toBe('warn');
    expect(() => new PredicateGate('flag set', () => true)).not.toThrow();
  });

  it('should create a logger at the requested level', () => {
    expect(createLogger({ level: 'silent' }).level).toBe('silent');
  });

  it('should share one default logger', () => {
    expect(getDefaultLogger()).toBe(getDefaultLogger());
  });
});
