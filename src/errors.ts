// Path: src/errors.ts
// Error types raised by gates and the wait loop

/**
 * Base class for errors raised by this package
 */
export class GateError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised when a gate is configured after it has already finished.
 */
export class ConfigurationError extends GateError {
  constructor(message: string) {
    super(message, 'GATE_CONFIGURATION');
  }
}

/**
 * Raised by the wait loop when its deadline passes before the step succeeds.
 */
export class DeadlineExceededError extends GateError {
  readonly timeoutSeconds: number;
  readonly waitingFor: string;

  constructor(timeoutSeconds: number, waitingFor: string) {
    super(`Timeout of ${timeoutSeconds} seconds expired waiting for ${waitingFor}`, 'DEADLINE_EXCEEDED');
    this.timeoutSeconds = timeoutSeconds;
    this.waitingFor = waitingFor;
  }
}
