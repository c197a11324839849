// Path: src/completion-gate.ts
// Deferred completion discovered by polling, with completion/poll/timeout callbacks

import type { Logger } from 'pino';
import { ConfigurationError, DeadlineExceededError } from './errors.js';
import { getDefaultLogger } from './logger.js';
import { waitUntil, type Waiter, type WaitUntilOptions } from './utils/polling.js';

/**
 * Registered callback with its arguments already bound
 */
type BoundCallback = () => unknown;

/**
 * Maps a timeout to a caller-specific error. Returning undefined keeps the
 * original DeadlineExceededError.
 */
export type TimeoutTranslator = (error: DeadlineExceededError) => Error | undefined;

/**
 * Options for wait(), passed through to the wait loop
 */
export type WaitOptions = Omit<WaitUntilOptions, 'timeoutSeconds' | 'waitingFor'>;

export interface CompletionGateOptions {
  /** Wait loop service (default: waitUntil) */
  waiter?: Waiter;
  /** Timeout translation strategy (default: keep the original error) */
  translateTimeout?: TimeoutTranslator;
  /** Logger (default: shared package logger) */
  logger?: Logger;
}

const keepOriginalTimeout: TimeoutTranslator = () => undefined;

/**
 * A condition that becomes true at some point in the future and is found out
 * by polling.
 *
 * Subclasses supply the predicate (`isConditionMet`) and a description.
 * Callers attach callbacks and then `wait()`:
 *
 * ```typescript
 * const gate = new FileGate('/var/run/app.pid')
 *   .during(() => spinner.tick())
 *   .onComplete(notify, 'app started')
 *   .onTimeout(dumpLogs);
 * await gate.wait(30);
 * ```
 *
 * On-complete callbacks run once, on the first poll that sees the predicate
 * true. Their errors are isolated: every callback runs, then the first error
 * is rethrown. Errors from during and timeout callbacks abort their batch.
 */
export abstract class CompletionGate {
  private completed = false;
  private completionLatch: 'pending' | 'fired' = 'pending';
  private readonly completeCallbacks: BoundCallback[] = [];
  private readonly duringCallbacks: BoundCallback[] = [];
  private readonly timeoutCallbacks: BoundCallback[] = [];
  private defaultTimeoutSeconds: number | undefined = undefined;
  private readonly waiter: Waiter;
  private readonly translateTimeout: TimeoutTranslator;
  protected readonly logger: Logger;

  constructor(options: CompletionGateOptions = {}) {
    this.waiter = options.waiter ?? waitUntil;
    this.translateTimeout = options.translateTimeout ?? keepOriginalTimeout;
    this.logger = options.logger ?? getDefaultLogger();
  }

  /**
   * Check the external condition. Called on every poll until it returns true.
   */
  protected abstract isConditionMet(): boolean | Promise<boolean>;

  /**
   * Human-readable identifier used in logs and timeout messages
   */
  abstract describe(): string;

  toString(): string {
    return this.describe();
  }

  /**
   * Whether a poll has observed the condition. No side effects.
   */
  isFinished(): boolean {
    return this.completed;
  }

  /**
   * Run during-callbacks, re-check the condition and fire on-complete
   * callbacks the first time it holds.
   *
   * A rejection does not mean the gate is unfinished: an on-complete callback
   * may have failed after completion. Use isFinished() for the flag.
   */
  async poll(): Promise<boolean> {
    if (this.completed) {
      return true;
    }

    for (const callback of this.duringCallbacks) {
      await callback();
    }

    if (await this.isConditionMet()) {
      this.completed = true;
    }

    if (this.completed && this.completionLatch === 'pending') {
      this.completionLatch = 'fired';
      await this.fireCompleteCallbacks();
    }

    return this.completed;
  }

  private async fireCompleteCallbacks(): Promise<void> {
    let firstError: { error: unknown } | undefined;

    for (const callback of this.completeCallbacks) {
      try {
        await callback();
      } catch (err) {
        if (firstError === undefined) {
          firstError = { error: err };
        }
        this.logger.debug({ err, gate: this.describe() }, 'Error thrown from completion callback');
      }
    }

    if (firstError) {
      throw firstError.error;
    }
  }

  /**
   * Call `callback` with `args` once the gate finishes.
   *
   * Not named `then`: that would make every gate a thenable, and awaiting or
   * returning one from an async function would register the resolver here.
   */
  onComplete<A extends unknown[]>(callback: (...args: A) => unknown, ...args: A): this {
    this.assertConfigurable('completion callbacks');
    this.completeCallbacks.push(() => callback(...args));
    return this;
  }

  /**
   * Call `callback` with `args` on every poll while waiting
   */
  during<A extends unknown[]>(callback: (...args: A) => unknown, ...args: A): this {
    this.assertConfigurable('during callbacks');
    this.duringCallbacks.push(() => callback(...args));
    return this;
  }

  /**
   * Call `callback` with `args` when wait() times out
   */
  onTimeout<A extends unknown[]>(callback: (...args: A) => unknown, ...args: A): this {
    this.assertConfigurable('timeout callbacks');
    this.timeoutCallbacks.push(() => callback(...args));
    return this;
  }

  /**
   * Timeout used by wait() when none is passed. Zero and negative values go
   * to the wait loop as-is.
   */
  setDefaultTimeout(timeoutSeconds: number | undefined): this {
    this.assertConfigurable('a default timeout');
    this.defaultTimeoutSeconds = timeoutSeconds;
    return this;
  }

  private assertConfigurable(what: string): void {
    if (this.completed) {
      throw new ConfigurationError(`Cannot add ${what} after ${this.describe()} was finished`);
    }
  }

  /**
   * Wait for the gate to finish.
   *
   * Uses `timeoutSeconds` if given, else the default timeout, else waits
   * without a deadline. On timeout, runs the timeout callbacks and throws the
   * translated error or the original DeadlineExceededError.
   */
  async wait(timeoutSeconds?: number, options: WaitOptions = {}): Promise<void> {
    const effectiveTimeout = timeoutSeconds ?? this.defaultTimeoutSeconds;

    this.logger.debug({ gate: this.describe(), timeoutSeconds: effectiveTimeout }, 'Waiting for gate');
    try {
      await this.waiter(() => this.poll(), {
        ...options,
        timeoutSeconds: effectiveTimeout,
        waitingFor: this,
      });
      this.logger.debug({ gate: this.describe() }, 'Finished waiting for gate');
    } catch (err) {
      if (err instanceof DeadlineExceededError) {
        for (const callback of this.timeoutCallbacks) {
          await callback();
        }
        throw this.translateTimeout(err) ?? err;
      }
      this.logger.debug({ err, gate: this.describe() }, 'Error raised while waiting for gate');
      throw err;
    }
  }
}
