/**
 * Logger interfaces and implementations
 *
 * Everything goes to stderr so stdout stays free for piping generated output.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogFormat = 'console' | 'json';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Resolve a level name (case-insensitive) such as "warn" into a LogLevel
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
      return LogLevel.INFO;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

abstract class LevelFilteredLogger implements Logger {
  protected readonly level: LogLevel;

  constructor(level?: LogLevel) {
    this.level = level ?? parseLogLevel(process.env.LOG_LEVEL);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write(LogLevel.DEBUG, message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write(LogLevel.INFO, message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write(LogLevel.WARN, message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error
        ? { error: error.message, stack: error.stack, ...context }
        : context;
      this.write(LogLevel.ERROR, message, errorContext);
    }
  }

  protected abstract write(level: LogLevel, message: string, context?: Record<string, unknown>): void;
}

/**
 * Human-readable single-line logger
 */
export class ConsoleLogger extends LevelFilteredLogger {
  protected write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const ctx = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    console.error(`[${timestamp}] ${LogLevel[level]}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger, one object per line
 */
export class JsonLogger extends LevelFilteredLogger {
  protected write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    const log = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level].toLowerCase(),
      message,
      ...context,
    };
    console.error(JSON.stringify(log));
  }
}

/**
 * Discards everything. Default for library callers that pass no logger.
 */
export class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

export function createLogger(format: LogFormat, level?: LogLevel): Logger {
  return format === 'json' ? new JsonLogger(level) : new ConsoleLogger(level);
}
