// Path: src/utils/index.ts
// Utility module exports

export {
  waitUntil,
  sleep,
  type WaitUntilOptions,
  type BackoffOptions,
  type PollStep,
  type Waiter,
} from './polling.js';

export { getErrorMessage, isInstanceOfAny, type ErrorClass } from './error.js';
