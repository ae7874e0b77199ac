export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };

/** Tagged outcome of an operation: an absent error means success. */
export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
