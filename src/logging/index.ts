// ═══════════════════════════════════════════════════════════════════════════════
// LOGGING MODULE — Structured Logs with Component Context and PII Redaction
// ═══════════════════════════════════════════════════════════════════════════════

import type { LoggingConfig } from '../config/schema.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export type LogLevel = LoggingConfig['level'];

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

export interface LoggerConfig {
  level: LogLevel;
  /** Human-readable coloured lines instead of JSON */
  pretty: boolean;
  redactPII: boolean;
  serviceName: string;
}

export interface LoggerOptions {
  component?: string;
  context?: Record<string, unknown>;
}

export interface ILogger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, context?: Record<string, unknown>): void;

  child(options: LoggerOptions): ILogger;
  isLevelEnabled(level: LogLevel): boolean;
}

/**
 * Destination for formatted lines. Defaults to the console.
 */
export type LogSink = (level: LogLevel, line: string) => void;

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIGURATION
// ─────────────────────────────────────────────────────────────────────────────────

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: true,
  redactPII: true,
  serviceName: 'tag-profile',
};

const consoleSink: LogSink = (level, line) => {
  if (level === 'error' || level === 'fatal') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };
let sink: LogSink = consoleSink;

/**
 * Configure the global logger settings. Applies to loggers created earlier too.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

export function setLogSink(next: LogSink): void {
  sink = next;
}

// ─────────────────────────────────────────────────────────────────────────────────
// PII REDACTION
// ─────────────────────────────────────────────────────────────────────────────────

const PII_PATTERNS: ReadonlyArray<{ pattern: RegExp; replacement: string }> = [
  // Email
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL]' },
  // Credit card before phone so the longer match wins
  { pattern: /\b\d{4}[-\s]?\d{4}[-\s]?\d{4}[-\s]?\d{4}\b/g, replacement: '[CARD]' },
  // SSN
  { pattern: /\b\d{3}-\d{2}-\d{4}\b/g, replacement: '[SSN]' },
  // Phone
  { pattern: /(\+?1[-.\s]?)?\(?\b\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g, replacement: '[PHONE]' },
];

// Observation evidence is quoted user text.
const SENSITIVE_FIELDS = ['password', 'secret', 'token', 'authorization', 'evidence'];

export function redactPII(text: string): string {
  let result = text;
  for (const { pattern, replacement } of PII_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > 5) return '[MAX_DEPTH]';

  if (typeof value === 'string') {
    return redactPII(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }

  if (value !== null && typeof value === 'object') {
    return redactRecord(Object.fromEntries(Object.entries(value)), depth);
  }

  return value;
}

export function redactRecord(record: Record<string, unknown>, depth = 0): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(record)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_FIELDS.some((field) => lowerKey.includes(field))) {
      result[key] = '[REDACTED]';
    } else {
      result[key] = redactValue(inner, depth + 1);
    }
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// FORMATTERS
// ─────────────────────────────────────────────────────────────────────────────────

function formatError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      errorName: error.name,
      errorMessage: error.message,
      errorStack: error.stack?.split('\n').slice(0, 10).join('\n'),
      ...(error.cause !== undefined ? { errorCause: String(error.cause) } : {}),
    };
  }
  return { errorMessage: String(error) };
}

interface LogEntry {
  level: LogLevel;
  time: string;
  msg: string;
  service: string;
  component?: string;
  context: Record<string, unknown>;
}

function buildEntry(
  level: LogLevel,
  message: string,
  context: Record<string, unknown>,
  component?: string
): LogEntry {
  const redact = globalConfig.redactPII;

  return {
    level,
    time: new Date().toISOString(),
    msg: redact ? redactPII(message) : message,
    service: globalConfig.serviceName,
    ...(component !== undefined && { component }),
    context: redact ? redactRecord(context) : context,
  };
}

const COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

function prettyPrint(entry: LogEntry): string {
  const timeStr = entry.time.split('T')[1]?.replace('Z', '') ?? '';
  const componentStr = entry.component ? `[${entry.component}]` : '';
  const contextStr = Object.keys(entry.context).length > 0
    ? ` ${DIM}${JSON.stringify(entry.context)}${RESET}`
    : '';

  return `${DIM}${timeStr}${RESET} ${COLORS[entry.level]}${entry.level.toUpperCase().padEnd(5)}${RESET} ${componentStr} ${entry.msg}${contextStr}`;
}

function toJson(entry: LogEntry): string {
  return JSON.stringify({
    level: entry.level,
    levelNum: LOG_LEVELS[entry.level],
    time: entry.time,
    msg: entry.msg,
    service: entry.service,
    ...(entry.component !== undefined && { component: entry.component }),
    ...entry.context,
  });
}

// ─────────────────────────────────────────────────────────────────────────────────
// LOGGER IMPLEMENTATION
// ─────────────────────────────────────────────────────────────────────────────────

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[globalConfig.level];
}

function createLoggerImpl(options: LoggerOptions = {}): ILogger {
  const { component, context: baseContext = {} } = options;

  const write = (level: LogLevel, message: string, context: Record<string, unknown>): void => {
    if (!isEnabled(level)) return;
    const entry = buildEntry(level, message, { ...baseContext, ...context }, component);
    sink(level, globalConfig.pretty ? prettyPrint(entry) : toJson(entry));
  };

  const writeWithError = (
    level: LogLevel,
    message: string,
    error: unknown,
    context: Record<string, unknown> = {}
  ): void => {
    const errorContext = error === undefined ? {} : formatError(error);
    write(level, message, { ...context, ...errorContext });
  };

  return {
    trace: (message, context = {}) => write('trace', message, context),
    debug: (message, context = {}) => write('debug', message, context),
    info: (message, context = {}) => write('info', message, context),
    warn: (message, context = {}) => write('warn', message, context),
    error: (message, error, context) => writeWithError('error', message, error, context),
    fatal: (message, error, context) => writeWithError('fatal', message, error, context),

    child: (childOptions) =>
      createLoggerImpl({
        component: childOptions.component ?? component,
        context: { ...baseContext, ...childOptions.context },
      }),

    isLevelEnabled: isEnabled,
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// PUBLIC API
// ─────────────────────────────────────────────────────────────────────────────────

let rootLogger: ILogger | null = null;

/**
 * Get the root logger or a child logger for a component.
 */
export function getLogger(options?: LoggerOptions): ILogger {
  if (!rootLogger) {
    rootLogger = createLoggerImpl();
  }
  return options ? rootLogger.child(options) : rootLogger;
}

/**
 * Restore defaults and the console sink (for testing).
 */
export function resetLogger(): void {
  rootLogger = null;
  globalConfig = { ...DEFAULT_CONFIG };
  sink = consoleSink;
}
