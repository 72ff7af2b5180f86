// ═══════════════════════════════════════════════════════════════════════════════
// STORAGE MODULE — Store Selection
// ═══════════════════════════════════════════════════════════════════════════════

import type { StorageConfig } from '../config/schema.js';
import { getLogger } from '../logging/index.js';
import { MemoryStore } from './memory.js';
import { RedisStore, createRedisClient } from './redis.js';
import type { KeyValueStore } from './types.js';

const logger = getLogger({ component: 'storage' });

/**
 * Create the store named by `config.driver`.
 */
export function createStore(config: StorageConfig): KeyValueStore {
  if (config.driver === 'redis') {
    logger.info('Using Redis store');
    return new RedisStore(createRedisClient({ url: config.redisUrl }));
  }

  logger.info('Using in-memory store');
  return new MemoryStore();
}

export { MemoryStore } from './memory.js';
export {
  RedisStore,
  createRedisClient,
  assertListKeys,
  DELETE_IF_EQUALS_SCRIPT,
  EXTEND_IF_EQUALS_SCRIPT,
} from './redis.js';
export type { RedisStoreOptions } from './redis.js';
export type { KeyValueStore, StoreTransaction } from './types.js';
