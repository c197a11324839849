// Path: src/logger.ts
// pino logger factory

import { pino, type Logger } from 'pino';
import { LOGGER_NAME } from './constants.js';
import { readLogLevel, type LogLevel } from './gate-config.js';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Create a configured logger instance. Only POLLGATE_LOG_LEVEL is read, so
 * malformed wait settings never stop a logger (or a gate) from being built.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? LOGGER_NAME,
    level: options.level ?? readLogLevel(),
  });
}

let defaultLogger: Logger | null = null;

/**
 * Shared logger used by gates that are not given one
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}
