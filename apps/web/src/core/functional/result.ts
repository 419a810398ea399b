export type ErrorMsg = string;

export type Result<T> = { ok: true; value: T } | { ok: false; error: ErrorMsg };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: ErrorMsg): Result<T> {
  return { ok: false, error };
}

export function fold<T, R>(result: Result<T>, onError: (error: ErrorMsg) => R, onValue: (value: T) => R): R {
  return result.ok ? onValue(result.value) : onError(result.error);
}

export function mapResult<T, U>(result: Result<T>, transform: (value: T) => U): Result<U> {
  return result.ok ? ok(transform(result.value)) : err(result.error);
}

export function getOrElse<T>(result: Result<T>, fallback: T): T {
  return result.ok ? result.value : fallback;
}
