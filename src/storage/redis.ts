// ═══════════════════════════════════════════════════════════════════════════════
// REDIS STORE — ioredis-Backed KeyValueStore
// ═══════════════════════════════════════════════════════════════════════════════

import { Redis } from 'ioredis';

import { getLogger } from '../logging/index.js';
import type { KeyValueStore, StoreTransaction } from './types.js';

const logger = getLogger({ component: 'redis-store' });

// ─────────────────────────────────────────────────────────────────────────────────
// LUA SCRIPTS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Delete a key only if it still holds the caller's value.
 *
 * KEYS[1] = key
 * ARGV[1] = expected value
 */
export const DELETE_IF_EQUALS_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`.trim();

/**
 * Reset a key's TTL only if it still holds the caller's value.
 *
 * KEYS[1] = key
 * ARGV[1] = expected value
 * ARGV[2] = TTL in milliseconds
 */
export const EXTEND_IF_EQUALS_SCRIPT = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('PEXPIRE', KEYS[1], ARGV[2])
end
return 0
`.trim();

// ─────────────────────────────────────────────────────────────────────────────────
// TRANSACTION GUARD
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * EXEC does not roll back when one command fails, so list commands on a key of
 * another type would leave the rest of the transaction applied. Check the
 * types first; the per-user profile lock keeps them from changing before EXEC.
 */
export async function assertListKeys(
  keys: Iterable<string>,
  typeOf: (key: string) => Promise<string>
): Promise<void> {
  for (const key of keys) {
    const type = await typeOf(key);
    if (type !== 'list' && type !== 'none') {
      throw new Error(`WRONGTYPE ${key} holds a ${type}, not a list`);
    }
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CLIENT
// ─────────────────────────────────────────────────────────────────────────────────

export interface RedisStoreOptions {
  url: string;
  maxRetriesPerRequest?: number;
  lazyConnect?: boolean;
}

export function createRedisClient(options: RedisStoreOptions): Redis {
  const client = new Redis(options.url, {
    maxRetriesPerRequest: options.maxRetriesPerRequest ?? 3,
    lazyConnect: options.lazyConnect ?? false,
    retryStrategy(times: number) {
      // 100ms, 200ms, 300ms ... capped at 5s
      return Math.min(times * 100, 5000);
    },
  });

  client.on('error', (error: Error) => {
    logger.error('Redis connection error', error);
  });
  client.on('connect', () => {
    logger.info('Redis connected');
  });
  client.on('reconnecting', () => {
    logger.warn('Redis reconnecting');
  });

  return client;
}

// ─────────────────────────────────────────────────────────────────────────────────
// STORE
// ─────────────────────────────────────────────────────────────────────────────────

export class RedisStore implements KeyValueStore {
  constructor(private readonly client: Redis) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds) {
      await this.client.set(key, value, 'EX', ttlSeconds);
    } else {
      await this.client.set(key, value);
    }
  }

  async delete(key: string): Promise<boolean> {
    return (await this.client.del(key)) > 0;
  }

  async rpush(key: string, ...values: string[]): Promise<number> {
    return this.client.rpush(key, ...values);
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    return this.client.lrange(key, start, stop);
  }

  async llen(key: string): Promise<number> {
    return this.client.llen(key);
  }

  async ltrim(key: string, start: number, stop: number): Promise<void> {
    await this.client.ltrim(key, start, stop);
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    const result = await this.client.set(key, value, 'PX', ttlMs, 'NX');
    return result === 'OK';
  }

  async deleteIfEquals(key: string, value: string): Promise<boolean> {
    const result = await this.client.eval(DELETE_IF_EQUALS_SCRIPT, 1, key, value);
    return result === 1;
  }

  async extendIfEquals(key: string, value: string, ttlMs: number): Promise<boolean> {
    const result = await this.client.eval(EXTEND_IF_EQUALS_SCRIPT, 1, key, value, ttlMs);
    return result === 1;
  }

  multi(): StoreTransaction {
    const pipeline = this.client.multi();
    const listKeys = new Set<string>();

    const tx: StoreTransaction = {
      set: (key, value) => {
        pipeline.set(key, value);
        return tx;
      },
      delete: (key) => {
        pipeline.del(key);
        return tx;
      },
      rpush: (key, ...values) => {
        listKeys.add(key);
        pipeline.rpush(key, ...values);
        return tx;
      },
      ltrim: (key, start, stop) => {
        listKeys.add(key);
        pipeline.ltrim(key, start, stop);
        return tx;
      },
      exec: async () => {
        await assertListKeys(listKeys, (key) => this.client.type(key));
        const replies = await pipeline.exec();
        if (replies === null) {
          throw new Error('Redis transaction aborted');
        }
        for (const [error] of replies) {
          if (error) {
            throw error;
          }
        }
      },
    };

    return tx;
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}
