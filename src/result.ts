/**
 * Result type for parsers that report failure without throwing.
 */

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E }

export function Ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function Err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

/** Return the value of an Ok result, or throw the error of an Err result */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw result.error
  return result.value
}
