/**
 * Explicit outcome type for async boundaries.
 *
 * Cache, sync, transport and handler calls report success or a classified
 * failure through `Result` instead of throwing. The one exception is
 * `CacheError`, which callers of the outbox must see.
 */

export type ErrorKind =
  | 'transport'
  | 'registration'
  | 'authentication'
  | 'validation'
  | 'handler'
  | 'timeout'
  | 'cache'
  | 'sync';

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; errorKind: ErrorKind; detail: string };

export type Failure = Extract<Result<never>, { ok: false }>;

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail(errorKind: ErrorKind, detail: string): Failure {
  return { ok: false, errorKind, detail };
}

/** Message text for anything thrown. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Normalise a thrown value into an `Error`, keeping existing instances. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
