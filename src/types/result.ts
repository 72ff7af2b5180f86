// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Error Handling
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Either a success (Ok) or an expected failure (Err).
 *
 * Used for failures a caller is expected to handle, such as a corrupt
 * persisted record or a lock that could not be acquired. Programming errors
 * and unrecoverable conditions are still thrown.
 *
 * @example
 * ```typescript
 * const decoded = decodeProfile(raw, new Date());
 * if (!decoded.ok) {
 *   logger.warn('Discarding unreadable profile', { reason: decoded.error.message });
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ─────────────────────────────────────────────────────────────────────────────────
// TRANSFORMATIONS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Map the error of an Err Result, leaving Ok untouched.
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  if (result.ok) {
    return result;
  }
  return err(fn(result.error));
}

/**
 * Chain a Result-returning step onto an Ok Result.
 */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  if (result.ok) {
    return fn(result.value);
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// EXCEPTION BRIDGING
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Run a throwing function and capture the exception as an Err.
 */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
  try {
    return ok(fn());
  } catch (error) {
    return err(error instanceof Error ? error : new Error(String(error)));
  }
}
