// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export type ProfileErrorCode =
  | 'VALIDATION_ERROR'
  | 'STORAGE_ERROR'
  | 'LOCK_TIMEOUT'
  | 'TAXONOMY_ERROR';

/**
 * Base class for errors surfaced by the profile service.
 */
export class ProfileError extends Error {
  readonly code: ProfileErrorCode;

  constructor(code: ProfileErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProfileError';
    this.code = code;
  }
}

/**
 * Input rejected before any mutation took place.
 */
export class ValidationError extends ProfileError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * A store command failed. The previously persisted profile stays authoritative.
 */
export class StorageError extends ProfileError {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('STORAGE_ERROR', `Storage ${operation} failed: ${reason}`, { cause });
    this.name = 'StorageError';
    this.operation = operation;
  }
}

export class LockTimeoutError extends ProfileError {
  readonly userId: string;

  constructor(userId: string, message: string, options?: { cause?: unknown }) {
    super('LOCK_TIMEOUT', message, options);
    this.name = 'LockTimeoutError';
    this.userId = userId;
  }
}

/**
 * The taxonomy file is missing or does not describe a valid taxonomy.
 */
export class TaxonomyError extends ProfileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TAXONOMY_ERROR', message, options);
    this.name = 'TaxonomyError';
  }
}
