/**
 * Logger Implementation
 *
 * Structured logger used by every pipeline component. Child loggers extend
 * the source path; `withContext` binds fields such as the query id so that
 * all lines emitted while answering one query can be correlated.
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LoggerConfigInput,
  type LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
  redactContext,
  LogLevel as LogLevelEnum,
  LogFormat,
} from './types.js';

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;
  private level: LogLevel;

  constructor(config?: LoggerConfigInput) {
    this.config = createDefaultLoggerConfig(config);
    this.level = this.config.level;
  }

  /**
   * Create a child logger whose source is `parent:child`
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      level: this.level,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  /**
   * Create a logger that attaches `bindings` to every entry
   */
  withContext(bindings: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      level: this.level,
      bindings: { ...this.config.bindings, ...bindings },
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: unknown, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: unknown,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error || context !== undefined) {
      this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
      return;
    }
    this.log(LogLevelEnum.ERROR, message, toContext(errorOrContext));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.DEBUG, message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.TRACE, message, context);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!shouldLog(level, this.level)) {
      return;
    }

    const merged = { ...this.config.bindings, ...context };
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context:
        Object.keys(merged).length > 0
          ? redactContext(merged, this.config.redactKeys)
          : undefined,
      source: this.config.source,
      error: error === undefined ? undefined : formatError(error),
    };

    this.write(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return JSON.stringify({
          timestamp: entry.timestamp.toISOString(),
          level: LogLevelName[entry.level],
          message: entry.message,
          source: entry.source,
          context: entry.context,
          error: entry.error,
        });
      case LogFormat.COMPACT: {
        const time = entry.timestamp.toISOString().slice(11, 19);
        return `${time} ${LogLevelName[entry.level].charAt(0)} ${entry.message}`;
      }
      case LogFormat.PRETTY:
        return this.formatLine(entry, this.config.colors);
      case LogFormat.TEXT:
      default:
        return this.formatLine(entry, false);
    }
  }

  private formatLine(entry: LogEntry, colors: boolean): string {
    const paint = (color: string, text: string): string =>
      colors ? `${color}${text}${LogColors.reset}` : text;
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(paint(LogColors.gray, `[${entry.timestamp.toISOString()}]`));
    }

    parts.push(
      paint(LogLevelColors[entry.level], LogLevelName[entry.level].padEnd(5))
    );

    if (entry.source) {
      parts.push(paint(LogColors.cyan, `[${entry.source}]`));
    }

    parts.push(entry.message);

    if (entry.context) {
      parts.push(paint(LogColors.dim, JSON.stringify(entry.context)));
    }

    if (entry.error) {
      const code = entry.error.code ? ` (${entry.error.code})` : '';
      parts.push(
        paint(
          LogColors.red,
          `\n  Error: ${entry.error.name}${code}: ${entry.error.message}`
        )
      );
      if (entry.error.stack && this.level >= LogLevelEnum.DEBUG) {
        parts.push(
          paint(LogColors.gray, `\n  ${entry.error.stack.replace(/\n/g, '\n  ')}`)
        );
      }
    }

    return parts.join(' ');
  }

  private write(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (!this.config.console) {
      return;
    }

    if (level === LogLevelEnum.ERROR) {
      console.error(formatted);
    } else if (level === LogLevelEnum.WARN) {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config, level: this.level };
  }
}

function toContext(value: unknown): Record<string, unknown> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return { value };
}

// =============================================================================
// Global Logger Instance
// =============================================================================

let globalLogger: Logger | null = null;

export function getGlobalLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({
      level: LogLevelEnum.INFO,
      format: 'pretty',
    });
  }
  return globalLogger;
}

export function setGlobalLogger(logger: Logger): void {
  globalLogger = logger;
}

export function resetGlobalLogger(): void {
  globalLogger = null;
}

/**
 * Create a logger with a specific source
 */
export function createLogger(
  source: string,
  config?: LoggerConfigInput
): Logger {
  return new Logger({
    ...config,
    source,
  });
}

// =============================================================================
// Convenience Functions
// =============================================================================

export function logError(
  message: string,
  errorOrContext?: unknown,
  context?: Record<string, unknown>
): void {
  getGlobalLogger().error(message, errorOrContext, context);
}

export function logWarn(
  message: string,
  context?: Record<string, unknown>
): void {
  getGlobalLogger().warn(message, context);
}

export function logInfo(
  message: string,
  context?: Record<string, unknown>
): void {
  getGlobalLogger().info(message, context);
}

export function logDebug(
  message: string,
  context?: Record<string, unknown>
): void {
  getGlobalLogger().debug(message, context);
}
