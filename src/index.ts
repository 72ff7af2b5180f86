// ═══════════════════════════════════════════════════════════════════════════════
// TAG PROFILE ENGINE — Bootstrap
// ═══════════════════════════════════════════════════════════════════════════════

import { loadConfig, type AppConfig } from './config/index.js';
import {
  LocalProfileLock,
  ProfileRepository,
  ProfileService,
  StoreProfileLock,
  TimelineRecorder,
  createProfileKeys,
  loadTaxonomy,
  type ProfileLock,
  type Taxonomy,
} from './core/profile/index.js';
import { configureLogger, getLogger } from './logging/index.js';
import { createStore, type KeyValueStore } from './storage/index.js';

export interface ProfileEngineOptions {
  /** Use this store instead of the one named by `config.storage.driver` */
  store?: KeyValueStore;
  taxonomy?: Taxonomy;
  lock?: ProfileLock;
  now?: () => Date;
}

export interface ProfileEngine {
  service: ProfileService;
  store: KeyValueStore;
  taxonomy: Taxonomy;
  close(): Promise<void>;
}

/**
 * Wire config, logging, taxonomy, store, timeline and lock into a service.
 *
 * The memory driver gets a process-local lock; Redis gets a lock key so that
 * several processes can share one store.
 */
export function createProfileEngine(
  config: AppConfig = loadConfig(),
  options: ProfileEngineOptions = {}
): ProfileEngine {
  configureLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    redactPII: config.logging.redactPII,
  });
  const logger = getLogger({ component: 'bootstrap' });

  const taxonomy = options.taxonomy ?? loadTaxonomy(config.taxonomyPath);
  const store = options.store ?? createStore(config.storage);
  const keys = createProfileKeys(config.storage.keyPrefix);
  const timeline = new TimelineRecorder(store, keys, config.timeline.maxEvents);
  const repository = new ProfileRepository(store, keys, taxonomy, timeline);

  const lock =
    options.lock ??
    (config.storage.driver === 'redis'
      ? new StoreProfileLock(store, keys, config.lock)
      : new LocalProfileLock());

  const service = new ProfileService({
    repository,
    timeline,
    lock,
    taxonomy,
    config,
    now: options.now,
  });

  logger.info('Profile engine ready', {
    environment: config.environment,
    driver: config.storage.driver,
    taxonomyVersion: taxonomy.version,
    dimensions: taxonomy.dimensionNames().length,
  });

  return {
    service,
    store,
    taxonomy,
    close: () => store.disconnect(),
  };
}

export { loadConfig, validateConfig, getDefaultConfig, ConfigError } from './config/index.js';
export type { AppConfig, EngineConfig } from './config/index.js';
export * from './core/profile/index.js';
export { configureLogger, getLogger, setLogSink } from './logging/index.js';
export type { ILogger, LogLevel } from './logging/index.js';
export { createStore, MemoryStore, RedisStore, createRedisClient } from './storage/index.js';
export type { KeyValueStore, StoreTransaction } from './storage/index.js';
export { ok, err } from './types/result.js';
export type { Result } from './types/result.js';
