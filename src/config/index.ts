// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Environment Loading for the Profile Engine
// ═══════════════════════════════════════════════════════════════════════════════
//
// loadConfig() reads the environment once and returns a validated AppConfig.
// Nothing is cached here: the caller builds the config at process start and
// passes it to whatever needs it.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { validateConfig, type AppConfig, type Environment } from './schema.js';

export type Env = Readonly<Record<string, string | undefined>>;

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT HELPERS
// ─────────────────────────────────────────────────────────────────────────────────
//
// Unset variables come back as undefined so the schema default applies.
// Unparseable numbers come back as NaN so the schema rejects them.

export function envBool(env: Env, key: string): boolean | undefined {
  const value = env[key]?.toLowerCase();
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1' || value === 'yes';
}

export function envNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

export function envString(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────────────────────────

export function getEnvironment(env: Env = process.env): Environment {
  switch (env.NODE_ENV) {
    case 'production':
      return 'production';
    case 'staging':
      return 'staging';
    case 'test':
      return 'test';
    default:
      return 'development';
  }
}

/**
 * Build the application config from environment variables.
 *
 * @throws ConfigError when any value is out of range
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const environment = getEnvironment(env);
  const machineReadable = environment === 'production' || environment === 'staging';
  const jsonLogs = envBool(env, 'LOG_JSON');

  return validateConfig({
    environment,
    engine: {
      reinforcementWeight: envNumber(env, 'PROFILE_REINFORCEMENT_WEIGHT'),
      evidenceLimit: envNumber(env, 'PROFILE_EVIDENCE_LIMIT'),
      defaultDecayRate: envNumber(env, 'PROFILE_DECAY_RATE'),
      confidentThreshold: envNumber(env, 'PROFILE_CONFIDENT_THRESHOLD'),
      strictExclusivity: envBool(env, 'PROFILE_STRICT_EXCLUSIVITY'),
    },
    timeline: {
      maxEvents: envNumber(env, 'PROFILE_TIMELINE_MAX_EVENTS'),
    },
    storage: {
      driver: envString(env, 'STORAGE_DRIVER'),
      redisUrl: envString(env, 'REDIS_URL'),
      keyPrefix: envString(env, 'STORAGE_KEY_PREFIX'),
    },
    lock: {
      ttlMs: envNumber(env, 'PROFILE_LOCK_TTL_MS'),
      waitTimeoutMs: envNumber(env, 'PROFILE_LOCK_WAIT_MS'),
    },
    logging: {
      level: envString(env, 'LOG_LEVEL')?.toLowerCase() ?? (envBool(env, 'DEBUG') ? 'debug' : undefined),
      pretty: jsonLogs === undefined ? !machineReadable : !jsonLogs,
      redactPII: envBool(env, 'REDACT_PII'),
    },
    taxonomyPath: envString(env, 'PROFILE_TAXONOMY_PATH'),
  });
}

export {
  AppConfigSchema,
  ConfigError,
  formatConfigErrors,
  getDefaultConfig,
  safeValidateConfig,
  validateConfig,
} from './schema.js';

export type {
  AppConfig,
  EngineConfig,
  Environment,
  LockConfig,
  LoggingConfig,
  StorageConfig,
  StorageDriver,
  TimelineConfig,
} from './schema.js';
