export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function okResult<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function errResult<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
