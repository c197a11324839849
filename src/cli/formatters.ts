// Path: src/cli/formatters.ts
// CLI formatting utilities for display output

import { ANSI } from './constants.js';

/**
 * Format duration in ms to human readable
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.floor((ms % 60000) / 1000)}s`;
}

/**
 * Format a timeout setting for display
 */
export function formatTimeout(timeoutSeconds: number | undefined): string {
  return timeoutSeconds === undefined ? 'no timeout' : `timeout ${timeoutSeconds}s`;
}

/**
 * Wrap text in an ANSI color unless plain output is requested
 */
export function colorize(text: string, color: keyof typeof ANSI, plain: boolean): string {
  return plain ? text : `${ANSI[color]}${text}${ANSI.reset}`;
}
