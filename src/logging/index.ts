/**
 * Logging Module
 *
 * Structured JSON logging with child-logger context.
 */

export {
  type LogLevel,
  type LogMetadata,
  type LogContext,
  type ErrorInfo,
  type LogEntry,
  type Logger,
  type LogOutput,
  type LoggerOptions,
  DEFAULT_SERVICE_NAME,
  createLogger,
  createSilentLogger,
  parseLogLevel,
  toError,
} from './logger.js';
