/**
 * HTTP Request Logging Middleware
 *
 * Hono middleware for logging requests and responses with correlation ID
 * tracking.
 */

import type { Context, MiddlewareHandler, Next } from "hono";
import {
  getLogger,
  generateCorrelationId,
  withCorrelationIdAsync,
  getCorrelationId,
} from "./logger";
import type {
  Logger,
  HttpRequestContext,
  HttpResponseContext,
  LogContext,
} from "./types";

export interface LoggingMiddlewareOptions {
  /** Custom logger instance */
  logger?: Logger;
  /** Paths to exclude from logging */
  excludePaths?: string[];
  /** Whether to skip logging for health checks */
  skipHealthChecks?: boolean;
  /** Custom function to extract user ID from context */
  getUserId?: (c: Context) => string | undefined;
  /** Custom function to get request ID from context */
  getRequestId?: (c: Context) => string | undefined;
}

const defaultOptions: LoggingMiddlewareOptions = {
  excludePaths: [],
  skipHealthChecks: true,
};

const ALLOWED_HEADERS = [
  "content-type",
  "content-length",
  "accept",
  "user-agent",
  "x-request-id",
  "x-correlation-id",
  "x-forwarded-for",
  "x-real-ip",
];

function extractRequestContext(c: Context): HttpRequestContext {
  const url = new URL(c.req.url);

  const query: Record<string, string> = {};
  url.searchParams.forEach((value, key) => {
    query[key] = value;
  });

  const headers: Record<string, string> = {};
  for (const header of ALLOWED_HEADERS) {
    const value = c.req.header(header);
    if (value) {
      headers[header] = value;
    }
  }

  const ip =
    c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ||
    c.req.header("x-real-ip") ||
    "unknown";

  return {
    method: c.req.method,
    path: url.pathname,
    url: url.href,
    query: Object.keys(query).length > 0 ? query : undefined,
    headers,
    ip,
    userAgent: c.req.header("user-agent"),
  };
}

/**
 * Create HTTP request logging middleware for Hono
 */
export function createLoggingMiddleware(
  options: LoggingMiddlewareOptions = {}
): MiddlewareHandler {
  const opts = { ...defaultOptions, ...options };
  const logger = opts.logger || getLogger();

  return async (c: Context, next: Next) => {
    const path = new URL(c.req.url).pathname;
    if (opts.excludePaths?.some((p) => path.startsWith(p))) {
      return next();
    }

    if (opts.skipHealthChecks && path.startsWith("/health")) {
      return next();
    }

    const correlationId =
      c.req.header("x-correlation-id") || generateCorrelationId();
    c.header("X-Correlation-ID", correlationId);

    return withCorrelationIdAsync(correlationId, async () => {
      const startTime = performance.now();
      const requestContext = extractRequestContext(c);

      const logContext: LogContext = {
        correlationId,
        requestId: opts.getRequestId?.(c) || c.req.header("x-request-id"),
      };

      logger.httpRequest(requestContext, logContext);

      try {
        await next();
      } finally {
        const responseTime =
          Math.round((performance.now() - startTime) * 100) / 100;

        const responseContext: HttpResponseContext = {
          statusCode: c.res.status,
          responseTime,
          contentLength: parseInt(
            c.res.headers.get("content-length") || "0",
            10
          ),
        };

        // the caller is only known once auth has run further down the chain
        logger.httpResponse(requestContext, responseContext, {
          ...logContext,
          userId: opts.getUserId?.(c),
        });
      }
    });
  };
}

/**
 * Create a child logger for a specific request
 */
export function createRequestLogger(
  ids: { requestId?: string; userId?: string },
  baseLogger?: Logger
): Logger {
  const logger = baseLogger || getLogger();

  return logger.child({
    correlationId: getCorrelationId(),
    requestId: ids.requestId,
    userId: ids.userId,
  });
}
