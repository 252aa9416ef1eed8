/**
 * Core services
 *
 * - Raffle: entries, closure, draw, charity resolution and donation escrow
 * - State machine: guarded lifecycle transitions
 * - Errors: catalog and RaffleError
 * - Logger: structured logging
 */

export * as logger from "./logger";
export {
  createLogger,
  getLogger,
  initLogger,
  getDefaultLoggerConfig,
  generateCorrelationId,
  withCorrelationId,
  withCorrelationIdAsync,
  getCorrelationId,
  createLoggingMiddleware,
  createRequestLogger,
  DEFAULT_REDACT_FIELDS,
} from "./logger";

export type {
  Logger,
  LogLevel,
  LogThreshold,
  LogContext,
  LoggerConfig,
  LoggingMiddlewareOptions,
} from "./logger";

export * from "./errors";
export * from "./state-machine";
export * from "./raffle";
