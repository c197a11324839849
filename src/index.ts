// Path: src/index.ts
// Package entry point

export {
  CompletionGate,
  type CompletionGateOptions,
  type TimeoutTranslator,
  type WaitOptions,
} from './completion-gate.js';

export {
  PredicateGate,
  FileGate,
  ProcessExitGate,
  type Predicate,
  type FileGateOptions,
  type ProcessExitGateOptions,
  type LivenessCheck,
} from './gates/index.js';

export { GateError, ConfigurationError, DeadlineExceededError } from './errors.js';

export {
  loadGateConfig,
  validateGateConfig,
  assertValidConfig,
  type GateConfig,
  type LogLevel,
} from './gate-config.js';

export { createLogger, getDefaultLogger, type LoggerOptions } from './logger.js';

export {
  waitUntil,
  sleep,
  getErrorMessage,
  type WaitUntilOptions,
  type BackoffOptions,
  type PollStep,
  type Waiter,
  type ErrorClass,
} from './utils/index.js';
