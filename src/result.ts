/**
 * Result Type
 *
 * Recoverable failures are returned as values rather than thrown.
 * `unwrap` is the escape hatch for callers that already know the input is valid.
 */

export type Result<T, E = Error> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function Ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function Err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}

export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (!result.ok) throw result.error
  return result.value
}
