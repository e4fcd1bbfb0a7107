/**
 * Logging Types and Schemas
 *
 * Log levels, output formats and logger configuration for the legal RAG
 * pipeline. Configuration is validated with zod like every other module.
 */

import { z } from 'zod';

// =============================================================================
// Log Levels
// =============================================================================

/**
 * Log level severity (lower number = higher priority)
 */
export const LogLevel = {
  /** Failures that abort an operation */
  ERROR: 0,
  /** Degraded behaviour: fallbacks, skipped data, missing citations */
  WARN: 1,
  /** Lifecycle and per-query summaries */
  INFO: 2,
  /** Pipeline step details */
  DEBUG: 3,
  /** Payload-level detail */
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const LogLevelName = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
} as const;

export type LogLevelName = (typeof LogLevelName)[keyof typeof LogLevelName];

const LOG_LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  ERROR: LogLevel.ERROR,
  WARN: LogLevel.WARN,
  INFO: LogLevel.INFO,
  DEBUG: LogLevel.DEBUG,
  TRACE: LogLevel.TRACE,
};

export const LogLevelSchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
]);

// =============================================================================
// Log Entry
// =============================================================================

export const SerializedErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  /** Error code for RAGError / LLMError subclasses */
  code: z.string().optional(),
  stack: z.string().optional(),
});

export type SerializedError = z.infer<typeof SerializedErrorSchema>;

export const LogEntrySchema = z.object({
  level: LogLevelSchema,
  message: z.string(),
  timestamp: z.date(),
  /** Bound context merged with per-call context, already redacted */
  context: z.record(z.unknown()).optional(),
  error: SerializedErrorSchema.optional(),
  /** Component path, e.g. `QueryService:Orchestrator` */
  source: z.string().optional(),
});

export type LogEntry = z.infer<typeof LogEntrySchema>;

// =============================================================================
// Logger Configuration
// =============================================================================

export const LogFormat = {
  /** Human-readable single line */
  TEXT: 'text',
  /** One JSON object per line for log shippers */
  JSON: 'json',
  /** Time, level letter and message only */
  COMPACT: 'compact',
  /** Text with ANSI colors */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'compact', 'pretty']);

/**
 * Context keys whose values are replaced with `[REDACTED]`.
 * Matching is case-insensitive on the key name.
 */
export const DEFAULT_REDACT_KEYS = [
  'apiKey',
  'api_key',
  'authorization',
  'password',
  'secret',
  'token',
] as const;

export const LoggerConfigSchema = z.object({
  /**
   * Minimum log level to output
   * @default LogLevel.INFO
   */
  level: LogLevelSchema.default(LogLevel.INFO),

  /**
   * Output format
   * @default 'text'
   */
  format: LogFormatSchema.default('text'),

  /**
   * Whether to include timestamps
   * @default true
   */
  timestamps: z.boolean().default(true),

  /**
   * Whether to include colors in pretty output
   * @default true
   */
  colors: z.boolean().default(true),

  /** Source identifier for all logs from this logger */
  source: z.string().optional(),

  /**
   * Whether to output to console
   * @default true
   */
  console: z.boolean().default(true),

  /** Keys redacted from context objects */
  redactKeys: z.array(z.string()).default([...DEFAULT_REDACT_KEYS]),

  /** Context attached to every entry (query id, provider name) */
  bindings: z.record(z.unknown()).default({}),

  /** Custom output handler (receives formatted log entries) */
  output: z
    .function()
    .args(z.string(), LogLevelSchema)
    .returns(z.void())
    .optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(
  overrides?: LoggerConfigInput
): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Log Formatting
// =============================================================================

export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};

// =============================================================================
// Utility Functions
// =============================================================================

function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LOG_LEVEL_BY_NAME, value);
}

/**
 * Parse a log level from a name such as `debug` or `WARN`.
 * Unrecognized names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  const normalized = level.trim().toUpperCase();
  return isLogLevelName(normalized) ? LOG_LEVEL_BY_NAME[normalized] : LogLevel.INFO;
}

export function getLogLevelName(level: LogLevel): LogLevelName {
  return LogLevelName[level];
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

export function formatError(error: unknown): SerializedError {
  if (error instanceof Error) {
    const code =
      'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      code,
      stack: error.stack,
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

/**
 * Replace values under secret-looking keys, recursing into plain objects.
 */
export function redactContext(
  context: Record<string, unknown>,
  redactKeys: readonly string[]
): Record<string, unknown> {
  const lowered = new Set(redactKeys.map((key) => key.toLowerCase()));
  const redact = (value: Record<string, unknown>): Record<string, unknown> => {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (lowered.has(key.toLowerCase())) {
        result[key] = '[REDACTED]';
      } else if (isPlainObject(entry)) {
        result[key] = redact(entry);
      } else {
        result[key] = entry;
      }
    }
    return result;
  };
  return redact(context);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Build logger configuration from `LOG_LEVEL` / `LOG_FORMAT`.
 */
export function loadLoggerConfig(
  env: NodeJS.ProcessEnv = process.env
): LoggerConfig {
  const format = LogFormatSchema.safeParse(env['LOG_FORMAT']?.toLowerCase());
  return createDefaultLoggerConfig({
    level: env['LOG_LEVEL'] ? parseLogLevel(env['LOG_LEVEL']) : LogLevel.INFO,
    format: format.success ? format.data : 'pretty',
  });
}
