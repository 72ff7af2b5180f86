// ═══════════════════════════════════════════════════════════════════════════════
// LOCK TESTS — Per-User Serialization
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach } from 'vitest';
import { LockConfigSchema } from '../config/schema.js';
import { LocalProfileLock, StoreProfileLock, createProfileKeys } from '../core/profile/index.js';
import { MemoryStore } from '../storage/index.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOCAL LOCK
// ─────────────────────────────────────────────────────────────────────────────────

describe('LocalProfileLock', () => {
  let lock: LocalProfileLock;

  beforeEach(() => {
    lock = new LocalProfileLock();
  });

  it('should run cycles for the same user one at a time', async () => {
    const gate = deferred();
    const order: string[] = [];

    const first = lock.withLock('user-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = lock.withLock('user-1', async () => {
      order.push('second');
      return 2;
    });

    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    expect(await first).toEqual({ ok: true, value: 1 });
    expect(await second).toEqual({ ok: true, value: 2 });
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.pendingUsers()).toBe(0);
  });

  it('should not block other users', async () => {
    const gate = deferred();
    const order: string[] = [];

    const blocked = lock.withLock('user-1', async () => {
      await gate.promise;
      order.push('user-1');
    });
    await lock.withLock('user-2', async () => {
      order.push('user-2');
    });

    expect(order).toEqual(['user-2']);
    gate.resolve();
    await blocked;
    expect(order).toEqual(['user-2', 'user-1']);
  });

  it('should propagate errors and keep serving the user', async () => {
    await expect(
      lock.withLock('user-1', async () => {
        throw new Error('cycle failed');
      })
    ).rejects.toThrow('cycle failed');

    expect(await lock.withLock('user-1', async () => 'next')).toEqual({ ok: true, value: 'next' });
    expect(lock.pendingUsers()).toBe(0);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// STORE LOCK
// ─────────────────────────────────────────────────────────────────────────────────

describe('StoreProfileLock', () => {
  const keys = createProfileKeys('test:');
  const lockKey = 'test:profile:user:user-1:lock';
  let store: MemoryStore;
  let sleeps: number[];

  beforeEach(() => {
    store = new MemoryStore();
    sleeps = [];
  });

  function createLock(overrides: Record<string, number> = {}, target: MemoryStore = store): StoreProfileLock {
    return new StoreProfileLock(target, keys, LockConfigSchema.parse({ maxRetries: 3, ...overrides }), async (ms) => {
      sleeps.push(ms);
    });
  }

  it('should hold the lock key while the callback runs', async () => {
    const lock = createLock();
    let heldDuringRun: string | null = null;

    const result = await lock.withLock('user-1', async () => {
      heldDuringRun = await store.get(lockKey);
      return 'done';
    });

    expect(result).toEqual({ ok: true, value: 'done' });
    expect(heldDuringRun).toMatch(/^lock-owner-/);
    expect(await store.get(lockKey)).toBeNull();
  });

  it('should back off and give up while another owner holds the lock', async () => {
    await store.setIfAbsent(lockKey, 'other-owner', 60_000);
    const lock = createLock();
    let ran = false;

    const result = await lock.withLock('user-1', async () => {
      ran = true;
    });

    expect(ran).toBe(false);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('LOCK_TIMEOUT');
      expect(result.error.message).toBe('Lock not acquired after 3 attempts');
    }
    expect(sleeps).toEqual([50, 75, 112.5]);
    expect(await store.get(lockKey)).toBe('other-owner');
  });

  it('should cap the backoff interval', async () => {
    await store.setIfAbsent(lockKey, 'other-owner', 60_000);
    const lock = createLock({ maxRetries: 4, retryIntervalMs: 400, maxBackoffMs: 700 });

    await lock.acquire('user-1');

    expect(sleeps).toEqual([400, 600, 700, 700]);
  });

  it('should report store failures during acquisition', async () => {
    class FailingStore extends MemoryStore {
      override async setIfAbsent(): Promise<boolean> {
        throw new Error('connection reset');
      }
    }
    const lock = createLock({}, new FailingStore());

    const result = await lock.acquire('user-1');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('STORE_ERROR');
      expect(result.error.cause?.message).toBe('connection reset');
    }
  });

  it('should only release with the owning token', async () => {
    const lock = createLock();
    const acquired = await lock.acquire('user-1');
    expect(acquired.ok).toBe(true);

    const wrong = await lock.release('user-1', 'someone-else');
    expect(wrong.ok).toBe(false);
    if (!wrong.ok) {
      expect(wrong.error.code).toBe('LOCK_NOT_HELD');
    }

    if (acquired.ok) {
      expect(await lock.release('user-1', acquired.value)).toEqual({ ok: true, value: undefined });
    }
    expect(await store.get(lockKey)).toBeNull();
  });

  it('should only extend with the owning token', async () => {
    const lock = createLock();
    const acquired = await lock.acquire('user-1');
    expect(acquired.ok).toBe(true);

    const wrong = await lock.extend('user-1', 'someone-else');
    expect(wrong.ok).toBe(false);
    if (!wrong.ok) {
      expect(wrong.error.code).toBe('LOCK_NOT_HELD');
    }

    if (acquired.ok) {
      expect(await lock.extend('user-1', acquired.value)).toEqual({ ok: true, value: undefined });
    }
  });

  it('should keep the lock past its TTL while the callback runs', async () => {
    const lock = createLock({ ttlMs: 60 });
    let heldAfterTtl: string | null = null;

    const result = await lock.withLock('user-1', async () => {
      const token = await store.get(lockKey);
      await new Promise((resolve) => setTimeout(resolve, 150));
      heldAfterTtl = await store.get(lockKey);
      return token;
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toMatch(/^lock-owner-/);
      expect(heldAfterTtl).toBe(result.value);
    }
    expect(await store.get(lockKey)).toBeNull();
  });

  it('should release the lock when the callback throws', async () => {
    const lock = createLock();

    await expect(
      lock.withLock('user-1', async () => {
        throw new Error('cycle failed');
      })
    ).rejects.toThrow('cycle failed');

    expect(await store.get(lockKey)).toBeNull();
  });
});
