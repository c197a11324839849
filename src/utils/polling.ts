// Path: src/utils/polling.ts
// Generic polling utility for waiting on conditions

import type { Logger } from 'pino';
import { DeadlineExceededError } from '../errors.js';
import { WAIT_DEFAULTS } from '../constants.js';
import { isInstanceOfAny, type ErrorClass } from './error.js';

/**
 * Exponential backoff between poll attempts
 */
export interface BackoffOptions {
  /** Delay before the second attempt */
  initialSeconds: number;
  /** Upper bound for the delay (default: unbounded) */
  maxSeconds?: number;
  /** Multiplier applied after each attempt (default: 2) */
  factor?: number;
}

/**
 * Options for polling operations
 */
export interface WaitUntilOptions {
  /** Give up after this many seconds (default: wait forever) */
  timeoutSeconds?: number;
  /** Delay between attempts, fixed or with backoff (default: 1) */
  sleepSeconds?: number | BackoffOptions;
  /** What is being waited for, used in the timeout message */
  waitingFor?: string | object;
  /** Called before every attempt */
  onPoll?: () => void | Promise<void>;
  /** Errors thrown by the step that count as "not yet" */
  expectedErrors?: readonly ErrorClass[];
  /** Optional logger for debug messages */
  logger?: Logger;
}

/**
 * Step function driven by the wait loop
 */
export type PollStep = () => boolean | Promise<boolean>;

/**
 * Wait loop service: resolves once `step` returns true, rejects with
 * DeadlineExceededError once the timeout passes.
 */
export type Waiter = (step: PollStep, options?: WaitUntilOptions) => Promise<void>;

/**
 * Wait for a step to return true, polling at regular intervals.
 *
 * The step always runs at least once, so a zero, negative or NaN timeout
 * checks the condition exactly once.
 *
 * @throws DeadlineExceededError if the timeout passes before the step returns true
 *
 * @example
 * // Wait for server to become healthy, backing off up to 10s between checks
 * await waitUntil(() => isHealthy(), {
 *   timeoutSeconds: 60,
 *   sleepSeconds: { initialSeconds: 1, maxSeconds: 10 },
 *   waitingFor: 'server health',
 * });
 */
export async function waitUntil(step: PollStep, options: WaitUntilOptions = {}): Promise<void> {
  const {
    timeoutSeconds,
    sleepSeconds = WAIT_DEFAULTS.SLEEP_SECONDS,
    waitingFor = step.name || 'condition',
    onPoll,
    expectedErrors = [],
    logger,
  } = options;

  // NaN would never compare as expired
  const deadline =
    timeoutSeconds === undefined ? undefined : Date.now() + (Number.isNaN(timeoutSeconds) ? 0 : timeoutSeconds * 1000);
  const delays = delaySequence(sleepSeconds);

  for (;;) {
    if (onPoll) {
      await onPoll();
    }

    let done = false;
    try {
      done = await step();
    } catch (err) {
      if (!isInstanceOfAny(err, expectedErrors)) {
        throw err;
      }
      logger?.debug({ err, waitingFor: String(waitingFor) }, 'Expected error while polling');
    }

    if (done) {
      return;
    }

    if (deadline !== undefined && timeoutSeconds !== undefined && Date.now() >= deadline) {
      throw new DeadlineExceededError(timeoutSeconds, String(waitingFor));
    }

    const delayMs = delays.next();
    await sleep(deadline === undefined ? delayMs : Math.min(delayMs, deadline - Date.now()));
  }
}

/**
 * Produce successive delays in ms for a fixed or backoff sleep setting
 */
function delaySequence(sleepSeconds: number | BackoffOptions): { next(): number } {
  if (typeof sleepSeconds === 'number') {
    return { next: () => sleepSeconds * 1000 };
  }

  const { initialSeconds, maxSeconds = Infinity, factor = WAIT_DEFAULTS.BACKOFF_FACTOR } = sleepSeconds;
  let current = initialSeconds;
  return {
    next: () => {
      const delay = Math.min(current, maxSeconds);
      current = delay * factor;
      return delay * 1000;
    },
  };
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, Math.max(0, ms)));
}
