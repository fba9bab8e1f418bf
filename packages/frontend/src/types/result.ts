/**
 * Result type for functional error handling
 *
 * Fallible operations return their diagnostics instead of throwing, so
 * every failure in a run can be collected and reported together.
 */

import type { Diagnostic } from "./diagnostic.js";

export type Result<T, E = readonly Diagnostic[]> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E = readonly Diagnostic[]>(value: T): Result<T, E> => ({
  ok: true,
  value,
});

export const error = <T, E = readonly Diagnostic[]>(
  error: E
): Result<T, E> => ({
  ok: false,
  error,
});

export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> => (result.ok ? ok(fn(result.value)) : result);

export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> => (result.ok ? fn(result.value) : result);

/**
 * Combine results, keeping every diagnostic when any of them failed.
 */
export const collectResults = <T>(
  results: readonly Result<T>[]
): Result<readonly T[]> => {
  const values: T[] = [];
  const diagnostics: Diagnostic[] = [];

  for (const result of results) {
    if (result.ok) {
      values.push(result.value);
    } else {
      diagnostics.push(...result.error);
    }
  }

  return diagnostics.length > 0 ? error(diagnostics) : ok(values);
};
