// Explicit success/failure values for calls whose failures the caller is
// expected to inspect and continue past (game-service actions), instead of
// relying on exception propagation.

export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): Result<never, E> {
  return { ok: false, error };
}
