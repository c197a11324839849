// Path: src/cli/constants.ts
// CLI constants and option parsers

import { InvalidArgumentError } from 'commander';

/**
 * ANSI escape codes for colors
 */
export const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
} as const;

/**
 * Parse a duration in seconds for commander options
 * @throws InvalidArgumentError if the value is not a number
 */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds)) {
    throw new InvalidArgumentError(`"${value}" is not a number of seconds`);
  }
  return seconds;
}

/**
 * Parse and validate a process id
 * @throws InvalidArgumentError if the pid is not a positive integer
 */
export function parsePid(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`"${value}" is not a plain integer`);
  }
  const pid = parseInt(trimmed, 10);
  if (pid < 1) {
    throw new InvalidArgumentError(`${pid} must be a positive pid`);
  }
  return pid;
}
