// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE TYPES — Key-Value Store Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Commands queued by multi() and applied together by exec().
 *
 * exec() either applies every queued command or none of them. It rejects
 * without writing anything when a list command targets a key that holds a
 * string. Queuing methods return the transaction so calls can be chained.
 */
export interface StoreTransaction {
  set(key: string, value: string): StoreTransaction;
  delete(key: string): StoreTransaction;
  rpush(key: string, ...values: string[]): StoreTransaction;
  ltrim(key: string, start: number, stop: number): StoreTransaction;
  exec(): Promise<void>;
}

export interface KeyValueStore {
  // String operations
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;

  // List operations
  rpush(key: string, ...values: string[]): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  llen(key: string): Promise<number>;
  ltrim(key: string, start: number, stop: number): Promise<void>;

  // Lock primitives
  /** Set only when the key is absent; true when this call wrote it */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Delete only when the current value equals `value`; true when deleted */
  deleteIfEquals(key: string, value: string): Promise<boolean>;
  /** Reset the TTL only when the current value equals `value`; true when extended */
  extendIfEquals(key: string, value: string, ttlMs: number): Promise<boolean>;

  // Transactions
  multi(): StoreTransaction;

  disconnect(): Promise<void>;
}
