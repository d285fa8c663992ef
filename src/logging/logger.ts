/**
 * Structured Logger
 *
 * JSON-structured logging with level filtering, context enrichment and
 * child loggers. Every engine component takes a `Logger` through its
 * options so tests can capture entries with a custom output sink.
 *
 * @module logging/logger
 */

import { randomUUID } from 'node:crypto';

// ─── Types ───────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  correlationId?: string;
  service?: string;
  /** Component or job emitting the entry (e.g. "lifecycle", "scan:stock"). */
  component?: string;
  actor?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  correlationId: string;
  component?: string;
  actor?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  fatal(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

// ─── Log Level Ordering ──────────────────────────────────────────────────────

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export const DEFAULT_SERVICE_NAME = 'pharmacy-alerts';

/**
 * Output sink for log entries. Defaults to stdout JSON.
 */
export type LogOutput = (entry: LogEntry) => void;

const defaultLogOutput: LogOutput = (entry: LogEntry) => {
  process.stdout.write(JSON.stringify(entry) + '\n');
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/** Parse a level name, falling back to `fallback` for unknown values. */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : fallback;
}

// ─── Logger Options ──────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Service name included in every log entry. Defaults to 'pharmacy-alerts'. */
  service?: string;
  /** Minimum log level to emit. Defaults to LOG_LEVEL or 'info'. */
  level?: LogLevel;
  /** Base context merged into every log entry. */
  context?: LogContext;
  /** Custom output sink. Defaults to JSON on stdout. */
  output?: LogOutput;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createLogger(options: LoggerOptions = {}): Logger {
  const service = options.service ?? DEFAULT_SERVICE_NAME;
  const minLevel = options.level ?? parseLogLevel(process.env['LOG_LEVEL']);
  const baseContext: LogContext = {
    ...options.context,
  };
  if (!baseContext.correlationId) {
    baseContext.correlationId = randomUUID();
  }
  if (!baseContext.service) {
    baseContext.service = service;
  }
  const output = options.output ?? defaultLogOutput;

  function buildEntry(
    level: LogLevel,
    message: string,
    error?: Error,
    metadata?: LogMetadata,
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service: baseContext.service ?? service,
      correlationId: baseContext.correlationId ?? '',
    };

    if (baseContext.component) entry.component = baseContext.component;
    if (baseContext.actor) entry.actor = baseContext.actor;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  function log(level: LogLevel, message: string, error?: Error, metadata?: LogMetadata): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
    output(buildEntry(level, message, error, metadata));
  }

  return {
    debug(message: string, metadata?: LogMetadata): void {
      log('debug', message, undefined, metadata);
    },
    info(message: string, metadata?: LogMetadata): void {
      log('info', message, undefined, metadata);
    },
    warn(message: string, metadata?: LogMetadata): void {
      log('warn', message, undefined, metadata);
    },
    error(message: string, error?: Error, metadata?: LogMetadata): void {
      log('error', message, error, metadata);
    },
    fatal(message: string, error?: Error, metadata?: LogMetadata): void {
      log('fatal', message, error, metadata);
    },
    child(context: LogContext): Logger {
      return createLogger({
        service,
        level: minLevel,
        context: { ...baseContext, ...context },
        output,
      });
    },
  };
}

/** Normalize an unknown thrown value into an Error for logging. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Logger that drops every entry. */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'fatal', output: () => undefined });
}
