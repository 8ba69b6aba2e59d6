/** Outcome of an operation that can fail without throwing. */
export type Result<T, E> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: E };

/** Create a successful result. */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Create a failed result. */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
