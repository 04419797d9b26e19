/**
 * Result type
 *
 * Operations that can fail in an expected way return a Result instead of
 * throwing. Only programming errors are thrown.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
