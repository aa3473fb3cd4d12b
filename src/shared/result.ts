/**
 * Outcome of a best-effort operation (an upstream call, a mail delivery).
 *
 * Callers must look at `ok` before they can reach the value, which keeps
 * every place that throws a failure away visible in the code.
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E = Error>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Normalise anything caught into an Error
 */
export function toError(cause: unknown): Error {
  if (cause instanceof Error) return cause;
  return new Error(String(cause));
}

/**
 * Value on success, `fallback` on failure. `onError` sees the discarded error.
 */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T, onError?: (error: E) => void): T {
  if (result.ok) return result.value;
  onError?.(result.error);
  return fallback;
}
