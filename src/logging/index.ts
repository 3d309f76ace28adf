/**
 * Logging Module
 *
 * Structured JSON logging with context enrichment for the ledger service.
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
  LOG_LEVELS,
  isLogLevel,
  createLogger,
  createSilentLogger,
} from './logger.js';
