// ═══════════════════════════════════════════════════════════════════════════════
// PROFILE LOCK — Per-User Serialization of Read-Modify-Write Cycles
// ═══════════════════════════════════════════════════════════════════════════════
//
// Two implementations:
//   - LocalProfileLock: per-user promise chain, for a single process
//   - StoreProfileLock: lock key in the KeyValueStore, for several processes
//     sharing one Redis. Acquisition retries with capped exponential backoff
//     until maxRetries or waitTimeoutMs; only the holder's token releases it.
//     The TTL is extended every ttlMs / 3 while the holder's cycle runs.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { v4 as uuidv4 } from 'uuid';

import type { LockConfig } from '../../config/schema.js';
import { getLogger } from '../../logging/index.js';
import type { KeyValueStore } from '../../storage/types.js';
import { err, ok, type Result } from '../../types/result.js';
import type { ProfileKeys } from './keys.js';

const logger = getLogger({ component: 'profile-lock' });

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LockErrorCode =
  | 'LOCK_TIMEOUT'    // Gave up waiting for the lock
  | 'LOCK_NOT_HELD'   // Release found another token (ours expired)
  | 'STORE_ERROR';    // Store command failed

export interface LockError {
  readonly code: LockErrorCode;
  readonly message: string;
  readonly cause?: Error;
}

export interface ProfileLock {
  /**
   * Run `fn` while holding the user's lock. Errors thrown by `fn` propagate
   * after the lock is released; failing to acquire the lock is an Err.
   */
  withLock<T>(userId: string, fn: () => Promise<T>): Promise<Result<T, LockError>>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOCAL LOCK
// ─────────────────────────────────────────────────────────────────────────────────

export class LocalProfileLock implements ProfileLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(userId: string, fn: () => Promise<T>): Promise<Result<T, LockError>> {
    const previous = this.tails.get(userId) ?? Promise.resolve();
    const run = previous.then(fn);
    // The tail only orders the next caller; run's outcome reaches this caller below.
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(userId, tail);

    try {
      return ok(await run);
    } finally {
      if (this.tails.get(userId) === tail) {
        this.tails.delete(userId);
      }
    }
  }

  /** Users with a queued or running cycle */
  pendingUsers(): number {
    return this.tails.size;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORE LOCK
// ─────────────────────────────────────────────────────────────────────────────────

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class StoreProfileLock implements ProfileLock {
  private readonly ownerId = `lock-owner-${uuidv4()}`;

  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: ProfileKeys,
    private readonly config: LockConfig,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  /**
   * Acquire the user's lock. Resolves to the token needed for release.
   */
  async acquire(userId: string): Promise<Result<string, LockError>> {
    const key = this.keys.lock(userId);
    const token = `${this.ownerId}:${uuidv4()}`;
    const startTime = Date.now();

    let attempts = 0;
    let lastError: LockError | undefined;

    while (attempts < this.config.maxRetries) {
      const elapsed = Date.now() - startTime;
      if (elapsed >= this.config.waitTimeoutMs) {
        logger.warn('Lock acquisition timed out', { key, attempts, elapsedMs: elapsed });
        return err({
          code: 'LOCK_TIMEOUT',
          message: `Lock acquisition timed out after ${elapsed}ms`,
        });
      }

      try {
        if (await this.store.setIfAbsent(key, token, this.config.ttlMs)) {
          logger.debug('Lock acquired', { key, attempts: attempts + 1, durationMs: Date.now() - startTime });
          return ok(token);
        }
        lastError = undefined;
      } catch (error) {
        lastError = {
          code: 'STORE_ERROR',
          message: 'Store error during lock acquisition',
          cause: toError(error),
        };
        logger.warn('Store error during lock acquisition', { key, attempt: attempts + 1 });
      }

      const backoff = Math.min(
        this.config.retryIntervalMs * Math.pow(1.5, attempts),
        this.config.maxBackoffMs
      );
      await this.sleep(backoff);
      attempts++;
    }

    logger.warn('Lock acquisition failed after max retries', { key, attempts });

    return err(lastError ?? {
      code: 'LOCK_TIMEOUT',
      message: `Lock not acquired after ${attempts} attempts`,
    });
  }

  /**
   * Reset the lock's TTL to ttlMs, provided `token` still holds it.
   */
  async extend(userId: string, token: string): Promise<Result<void, LockError>> {
    const key = this.keys.lock(userId);

    try {
      if (await this.store.extendIfEquals(key, token, this.config.ttlMs)) {
        logger.debug('Lock extended', { key, ttlMs: this.config.ttlMs });
        return ok(undefined);
      }
      return err({ code: 'LOCK_NOT_HELD', message: 'Cannot extend lock not held by this owner' });
    } catch (error) {
      return err({ code: 'STORE_ERROR', message: 'Failed to extend lock', cause: toError(error) });
    }
  }

  async release(userId: string, token: string): Promise<Result<void, LockError>> {
    const key = this.keys.lock(userId);

    try {
      if (await this.store.deleteIfEquals(key, token)) {
        return ok(undefined);
      }
      return err({ code: 'LOCK_NOT_HELD', message: 'Lock expired or is held by another owner' });
    } catch (error) {
      return err({ code: 'STORE_ERROR', message: 'Failed to release lock', cause: toError(error) });
    }
  }

  async withLock<T>(userId: string, fn: () => Promise<T>): Promise<Result<T, LockError>> {
    const acquired = await this.acquire(userId);
    if (!acquired.ok) {
      return acquired;
    }

    const renewal = setInterval(() => {
      void this.extend(userId, acquired.value).then((extended) => {
        if (!extended.ok) {
          logger.warn('Lock renewal failed', { userId, code: extended.error.code, reason: extended.error.message });
        }
      });
    }, Math.max(1, Math.floor(this.config.ttlMs / 3)));
    renewal.unref();

    try {
      return ok(await fn());
    } finally {
      clearInterval(renewal);
      const released = await this.release(userId, acquired.value);
      if (!released.ok) {
        logger.warn('Lock release failed', { userId, code: released.error.code, reason: released.error.message });
      }
    }
  }
}
