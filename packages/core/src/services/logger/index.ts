/**
 * Logger Service
 *
 * Structured logging with correlation ID tracking, sensitive field
 * redaction, and HTTP request/response logging.
 *
 * @example
 * ```typescript
 * import { getLogger, initLogger } from '@charity-raffle/core/services/logger';
 *
 * initLogger({ level: 'debug', serviceName: 'raffle-keeper' });
 *
 * const logger = getLogger().child({ raffleId: 'raffle-1' });
 * logger.info('Upkeep performed', { requestId: '1' });
 * ```
 */

// Logger core
export {
  createLogger,
  getLogger,
  initLogger,
  getDefaultLoggerConfig,
  generateCorrelationId,
  withCorrelationId,
  withCorrelationIdAsync,
  getCorrelationId,
  correlationStore,
} from "./logger";

// Middleware
export {
  createLoggingMiddleware,
  createRequestLogger,
} from "./middleware";
export type { LoggingMiddlewareOptions } from "./middleware";

// Types
export type {
  Logger,
  LogLevel,
  LogThreshold,
  LogContext,
  LoggerConfig,
  LogEntry,
  ErrorContext,
  HttpRequestContext,
  HttpResponseContext,
  PerformanceContext,
  CorrelationStore,
} from "./types";

export { DEFAULT_REDACT_FIELDS } from "./types";
