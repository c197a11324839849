// Path: src/utils/error.ts
// Error handling utilities

/**
 * Extracts a human-readable error message from an unknown error value.
 *
 * @param err - The error value (can be Error, string, or any other type)
 * @returns The error message string
 *
 * @example
 * try {
 *   await gate.wait(30);
 * } catch (err) {
 *   console.error(`Wait failed: ${getErrorMessage(err)}`);
 * }
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Constructor of an error class, usable on the right of `instanceof`.
 */
export type ErrorClass = new (...args: never[]) => Error;

/**
 * Check whether an error is an instance of any of the given classes
 */
export function isInstanceOfAny(err: unknown, classes: readonly ErrorClass[]): boolean {
  return classes.some(cls => err instanceof cls);
}
