/**
 * Logging Module
 */

export {
  LogLevel,
  LogLevelName,
  LogLevelSchema,
  SerializedErrorSchema,
  type SerializedError,
  LogEntrySchema,
  type LogEntry,
  LogFormat,
  LogFormatSchema,
  DEFAULT_REDACT_KEYS,
  LoggerConfigSchema,
  type LoggerConfig,
  type LoggerConfigInput,
  createDefaultLoggerConfig,
  LogColors,
  LogLevelColors,
  parseLogLevel,
  getLogLevelName,
  shouldLog,
  formatError,
  redactContext,
  loadLoggerConfig,
} from './types.js';

export {
  Logger,
  getGlobalLogger,
  setGlobalLogger,
  resetGlobalLogger,
  createLogger,
  logError,
  logWarn,
  logInfo,
  logDebug,
} from './logger.js';
