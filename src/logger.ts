/**
 * Logger interfaces and implementations
 *
 * Level-based logging to stderr, so stdout stays clean for JSON output.
 *
 * Security: credential headers are redacted before anything is written.
 */

import { ENV } from './constants.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

export type LogFormat = 'console' | 'json';

const DEFAULT_REDACTED_HEADERS = ['authorization'];

/**
 * Default logger - writes to stderr, respects LOG_LEVEL env var
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private redactedHeaders: string[];

  constructor(level?: LogLevel, redactedHeaders: string[] = DEFAULT_REDACTED_HEADERS) {
    this.level = level ?? levelFromEnv();
    this.redactedHeaders = redactedHeaders;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('DEBUG', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('INFO', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('WARN', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      const errorContext = error ? {
        error: error.message,
        stack: error.stack,
        ...context,
      } : context;
      this.write('ERROR', message, errorContext);
    }
  }

  private write(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const redacted = context ? redactHeaders(context, this.redactedHeaders) : undefined;
    const ctx = redacted ? ` ${JSON.stringify(redacted)}` : '';
    console.error(`[${timestamp}] ${level}: ${message}${ctx}`);
  }
}

/**
 * Structured JSON logger, one object per line
 */
export class JsonLogger implements Logger {
  private level: LogLevel;
  private redactedHeaders: string[];

  constructor(level?: LogLevel, redactedHeaders: string[] = DEFAULT_REDACTED_HEADERS) {
    this.level = level ?? levelFromEnv();
    this.redactedHeaders = redactedHeaders;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.DEBUG) {
      this.write('debug', message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.INFO) {
      this.write('info', message, context);
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.WARN) {
      this.write('warn', message, context);
    }
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    if (this.level <= LogLevel.ERROR) {
      this.write('error', message, {
        error: error?.message,
        stack: error?.stack,
        ...context,
      });
    }
  }

  private write(level: string, message: string, context?: Record<string, unknown>): void {
    const redacted = context ? redactHeaders(context, this.redactedHeaders) : undefined;
    const log = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...redacted,
    };
    console.error(JSON.stringify(log));
  }
}

export function createLogger(format: LogFormat, level?: LogLevel): Logger {
  return format === 'json' ? new JsonLogger(level) : new ConsoleLogger(level);
}

function levelFromEnv(): LogLevel {
  switch (process.env[ENV.LOG_LEVEL]?.toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    case 'SILENT':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Replace listed header values (case-insensitive) in `context.headers`
 */
function redactHeaders(context: Record<string, unknown>, names: string[]): Record<string, unknown> {
  const headers = context.headers;
  if (!headers || typeof headers !== 'object') return context;

  const redacted: Record<string, unknown> = { ...headers };
  for (const key of Object.keys(redacted)) {
    if (names.includes(key.toLowerCase())) {
      redacted[key] = '[REDACTED]';
    }
  }

  return { ...context, headers: redacted };
}
