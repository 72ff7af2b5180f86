// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMA — Zod Validation for Engine, Storage, Lock and Logging
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'test', 'staging', 'production']);
export type Environment = z.infer<typeof EnvironmentSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// ENGINE
// ─────────────────────────────────────────────────────────────────────────────────

const unitInterval = z.number().min(0).max(1);

export const EngineConfigSchema = z
  .object({
    /** Pull toward the new observation on reinforcement */
    reinforcementWeight: z.number().gt(0).max(1).default(0.3),
    evidenceLimit: z.number().int().positive().default(10),
    defaultDecayRate: z.number().nonnegative().default(0.1),
    decayWindowDays: z.number().positive().default(30),
    /** Divisor term per reinforcement in the decay base */
    reinforcementDampening: z.number().nonnegative().default(0.1),
    minConfidence: unitInterval.default(0.1),
    maxConfidence: unitInterval.default(1.0),
    confidentThreshold: unitInterval.default(0.6),
    maturityTagTarget: z.number().int().positive().default(10),
    /** Prune exclusive sub-dimensions to their strongest instance every cycle */
    strictExclusivity: z.boolean().default(false),
  })
  .refine((engine) => engine.minConfidence <= engine.maxConfidence, {
    message: 'minConfidence must not exceed maxConfidence',
    path: ['minConfidence'],
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// TIMELINE / STORAGE / LOCK / LOGGING
// ─────────────────────────────────────────────────────────────────────────────────

export const TimelineConfigSchema = z.object({
  maxEvents: z.number().int().positive().default(1000),
});

export type TimelineConfig = z.infer<typeof TimelineConfigSchema>;

export const StorageDriverSchema = z.enum(['memory', 'redis']);
export type StorageDriver = z.infer<typeof StorageDriverSchema>;

export const StorageConfigSchema = z.object({
  driver: StorageDriverSchema.default('memory'),
  redisUrl: z.string().url().default('redis://localhost:6379'),
  keyPrefix: z.string().default('tagprofile:'),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export const LockConfigSchema = z.object({
  // Renewed every ttlMs / 3 while a cycle runs
  ttlMs: z.number().int().positive().default(30000),
  waitTimeoutMs: z.number().int().positive().default(10000),
  retryIntervalMs: z.number().int().positive().default(50),
  maxBackoffMs: z.number().int().positive().default(1000),
  maxRetries: z.number().int().positive().default(100),
});

export type LockConfig = z.infer<typeof LockConfigSchema>;

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  pretty: z.boolean().default(true),
  redactPII: z.boolean().default(true),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// APP CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const AppConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  engine: EngineConfigSchema.default({}),
  timeline: TimelineConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  lock: LockConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  /** Absolute path of a taxonomy JSON file; the bundled taxonomy when absent */
  taxonomyPath: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// ─────────────────────────────────────────────────────────────────────────────────
// ERRORS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Thrown when configuration fails validation.
 */
export class ConfigError extends Error {
  readonly name = 'ConfigError';
  readonly code = 'CONFIG_ERROR';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Format Zod issues as `path: message` strings.
 */
export function formatConfigErrors(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function safeValidateConfig(input: unknown): ReturnType<typeof AppConfigSchema.safeParse> {
  return AppConfigSchema.safeParse(input);
}

/**
 * Validate raw configuration, throwing ConfigError with every issue.
 */
export function validateConfig(input: unknown): AppConfig {
  const result = safeValidateConfig(input);
  if (!result.success) {
    throw new ConfigError(formatConfigErrors(result.error));
  }
  return result.data;
}

export function getDefaultConfig(environment: Environment = 'development'): AppConfig {
  const machineReadable = environment === 'production' || environment === 'staging';
  return validateConfig({ environment, logging: { pretty: !machineReadable } });
}
