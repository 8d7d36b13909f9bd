/**
 * Result type for error handling
 *
 * Structural checks and the diff decoder report failures as values, so a
 * caller can inspect the failing offset before deciding to throw.
 */

/**
 * Success result
 */
export interface Success<T> {
  success: true;
  value: T;
}

/**
 * Failure result
 */
export interface Failure<E = Error> {
  success: false;
  errors: E[];
}

/**
 * Result type representing success or failure
 */
export type Result<T, E = Error> = Success<T> | Failure<E>;

/**
 * Create a success result
 *
 * @param value The success value
 * @returns Success result
 */
export function ok<T>(value: T): Success<T> {
  return { success: true, value };
}

/**
 * Create a failure result from a single error
 *
 * @param error The error
 * @returns Failure result
 */
export function errSingle<E = Error>(error: E): Failure<E> {
  return { success: false, errors: [error] };
}

/**
 * Unwrap a result, throwing if it's an error
 *
 * The first error is rethrown as is when it is an `Error`, so callers can
 * still match on its class.
 *
 * @param result Result to unwrap
 * @returns The success value
 * @throws If result is an error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.value;
  }
  const [first] = result.errors;
  if (first instanceof Error) {
    throw first;
  }
  throw new Error(`Unwrap failed: ${result.errors.map((e) => String(e)).join(", ")}`);
}
