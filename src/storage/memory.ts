// ═══════════════════════════════════════════════════════════════════════════════
// MEMORY STORE — In-Process KeyValueStore Implementation
// ═══════════════════════════════════════════════════════════════════════════════

import type { KeyValueStore, StoreTransaction } from './types.js';

type QueuedCommand =
  | { op: 'set'; key: string; value: string }
  | { op: 'delete'; key: string }
  | { op: 'rpush'; key: string; values: string[] }
  | { op: 'ltrim'; key: string; start: number; stop: number };

/**
 * Resolve Redis-style inclusive indices (negative counts from the end).
 */
function resolveRange(len: number, start: number, stop: number): [number, number] {
  const startIdx = start < 0 ? Math.max(0, len + start) : start;
  const stopIdx = stop < 0 ? len + stop : Math.min(stop, len - 1);
  return [startIdx, stopIdx];
}

export class MemoryStore implements KeyValueStore {
  private data: Map<string, { value: string; expiresAt?: number }> = new Map();
  private lists: Map<string, string[]> = new Map();

  /** Make the next exec() reject, leaving data untouched (for testing) */
  failNextExec = false;

  // ═══════════════════════════════════════════════════════════════════════════════
  // STRING OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async get(key: string): Promise<string | null> {
    return this.readLive(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds ? Date.now() + ttlSeconds * 1000 : undefined;
    this.lists.delete(key);
    this.data.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<boolean> {
    return this.deleteSync(key);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LIST OPERATIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  async rpush(key: string, ...values: string[]): Promise<number> {
    return this.rpushSync(key, values);
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key);
    if (!list) return [];

    const [startIdx, stopIdx] = resolveRange(list.length, start, stop);
    if (startIdx > stopIdx || startIdx >= list.length) return [];

    return list.slice(startIdx, stopIdx + 1);
  }

  async llen(key: string): Promise<number> {
    return this.lists.get(key)?.length ?? 0;
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    this.ltrimSync(key, start, stop);
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // LOCK PRIMITIVES
  // ═══════════════════════════════════════════════════════════════════════════════

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.readLive(key) !== null) return false;
    this.data.set(key, { value, expiresAt: Date.now() + ttlMs });
    return true;
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    if (this.readLive(key) !== value) return false;
    this.data.delete(key);
    return true;
  }

  async extendIfEquals(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.readLive(key) !== value) return false;
    this.data.set(key, { value, expiresAt: Date.now() + ttlMs });
    return true;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TRANSACTIONS
  // ═══════════════════════════════════════════════════════════════════════════════

  multi(): StoreTransaction {
    const queue: QueuedCommand[] = [];

    const tx: StoreTransaction = {
      set: (key, value) => {
        queue.push({ op: 'set', key, value });
        return tx;
      },
      delete: (key) => {
        queue.push({ op: 'delete', key });
        return tx;
      },
      rpush: (key, ...values) => {
        queue.push({ op: 'rpush', key, values });
        return tx;
      },
      ltrim: (key, start, stop) => {
        queue.push({ op: 'ltrim', key, start, stop });
        return tx;
      },
      exec: async () => {
        if (this.failNextExec) {
          this.failNextExec = false;
          throw new Error('Simulated transaction failure');
        }
        this.assertListKeys(queue);
        // Applied synchronously, so no other caller observes a partial write.
        for (const command of queue) {
          this.apply(command);
        }
      },
    };

    return tx;
  }

  async disconnect(): Promise<void> {
    // Nothing to release.
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════════════

  size(): number {
    return this.data.size + this.lists.size;
  }

  // ═══════════════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════════════

  private readLive(key: string): string | null {
    const entry = this.data.get(key);
    if (!entry) return null;

    if (entry.expiresAt !== undefined && Date.now() > entry.expiresAt) {
      this.data.delete(key);
      return null;
    }

    return entry.value;
  }

  private deleteSync(key: string): boolean {
    const existed = this.data.has(key) || this.lists.has(key);
    this.data.delete(key);
    this.lists.delete(key);
    return existed;
  }

  private rpushSync(key: string, values: string[]): number {
    let list = this.lists.get(key);
    if (!list) {
      list = [];
      this.lists.set(key, list);
    }
    list.push(...values);
    return list.length;
  }

  private ltrimSync(key: string, start: number, stop: number): void {
    const list = this.lists.get(key);
    if (!list) return;

    const [startIdx, stopIdx] = resolveRange(list.length, start, stop);
    this.lists.set(key, startIdx > stopIdx ? [] : list.slice(startIdx, stopIdx + 1));
  }

  /**
   * Reject list commands on string keys before anything is applied, following
   * key types through the queue as Redis would.
   */
  private assertListKeys(queue: QueuedCommand[]): void {
    const types = new Map<string, 'string' | 'list' | 'none'>();
    const typeOf = (key: string) =>
      types.get(key) ?? (this.readLive(key) !== null ? 'string' : this.lists.has(key) ? 'list' : 'none');

    for (const command of queue) {
      switch (command.op) {
        case 'set':
          types.set(command.key, 'string');
          break;
        case 'delete':
          types.set(command.key, 'none');
          break;
        case 'rpush':
        case 'ltrim':
          if (typeOf(command.key) === 'string') {
            throw new Error(`WRONGTYPE ${command.key} holds a string, not a list`);
          }
          if (command.op === 'rpush') types.set(command.key, 'list');
          break;
      }
    }
  }

  private apply(command: QueuedCommand): void {
    switch (command.op) {
      case 'set':
        this.lists.delete(command.key);
        this.data.set(command.key, { value: command.value });
        break;
      case 'delete':
        this.deleteSync(command.key);
        break;
      case 'rpush':
        this.rpushSync(command.key, command.values);
        break;
      case 'ltrim':
        this.ltrimSync(command.key, command.start, command.stop);
        break;
    }
  }
}
