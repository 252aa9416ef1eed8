/**
 * Structured Logger
 *
 * - JSON output for log aggregation, pretty output in development
 * - Correlation ID tracking across requests
 * - Sensitive field redaction
 * - Performance timing
 * - Request/response logging
 */

import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";
import { hostname } from "os";
import type {
  Logger,
  LoggerConfig,
  LogContext,
  LogLevel,
  LogThreshold,
  HttpRequestContext,
  HttpResponseContext,
  ErrorContext,
  PerformanceContext,
  CorrelationStore,
  LogEntry,
} from "./types";
import { DEFAULT_REDACT_FIELDS } from "./types";

/**
 * AsyncLocalStorage for correlation ID tracking
 */
const correlationStorage = new AsyncLocalStorage<string>();

export const correlationStore: CorrelationStore = {
  get(): string | undefined {
    return correlationStorage.getStore();
  },
  run<T>(correlationId: string, fn: () => T): T {
    return correlationStorage.run(correlationId, fn);
  },
};

/**
 * Log level numeric values for comparison
 */
const LOG_LEVELS: Record<LogThreshold, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
  silent: 100,
};

function isLogThreshold(value: string): value is LogThreshold {
  return value in LOG_LEVELS;
}

function getHostname(): string {
  return process.env.HOSTNAME || hostname() || "unknown";
}

/**
 * Deep clone and redact sensitive fields. Bigints are rendered as decimal
 * strings so the entry stays JSON-serializable.
 */
function redactSensitiveFields(
  obj: unknown,
  redactFields: string[],
  seen = new WeakSet<object>()
): unknown {
  if (typeof obj === "bigint") {
    return obj.toString();
  }

  if (obj === null || typeof obj !== "object") {
    return obj;
  }

  if (seen.has(obj)) {
    return "[Circular]";
  }
  seen.add(obj);

  if (Array.isArray(obj)) {
    return obj.map((item) => redactSensitiveFields(item, redactFields, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    const shouldRedact = redactFields.some(
      (field) =>
        lowerKey === field.toLowerCase() ||
        lowerKey.includes(field.toLowerCase())
    );

    result[key] = shouldRedact
      ? "[REDACTED]"
      : redactSensitiveFields(value, redactFields, seen);
  }

  return result;
}

/**
 * Format error for logging
 */
function formatError(error: Error | ErrorContext): ErrorContext {
  if (error instanceof Error) {
    const code = "code" in error ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      code: typeof code === "string" || typeof code === "number" ? code : undefined,
      cause: error.cause,
    };
  }
  return error;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  config: LoggerConfig,
  context?: LogContext,
  additionalFields?: Record<string, unknown>
): LogEntry {
  const correlationId = correlationStorage.getStore() || context?.correlationId;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    service: config.serviceName,
    environment: config.environment,
    version: config.version,
    hostname: getHostname(),
    ...(correlationId ? { correlationId } : {}),
    ...(context?.requestId ? { requestId: context.requestId } : {}),
    ...(context?.userId ? { userId: context.userId } : {}),
    ...additionalFields,
  };

  if (context) {
    const { correlationId: _, requestId: __, userId: ___, ...rest } = context;
    Object.assign(entry, rest);
  }

  return entry;
}

const PRETTY_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

const ENVELOPE_KEYS = [
  "level",
  "message",
  "timestamp",
  "service",
  "environment",
  "version",
  "hostname",
];

function outputLog(entry: LogEntry, config: LoggerConfig): void {
  const redacted = redactSensitiveFields(
    entry,
    config.redactFields || DEFAULT_REDACT_FIELDS
  );
  const toStderr = entry.level === "error" || entry.level === "fatal";

  let output: string;
  if (config.prettyPrint && redacted !== null && typeof redacted === "object") {
    const reset = "\x1b[0m";
    const time = new Date(entry.timestamp).toLocaleTimeString();
    const level = entry.level.toUpperCase().padEnd(5);
    output = `${PRETTY_COLORS[entry.level]}[${time}] ${level}${reset} ${entry.message}`;

    const contextObj: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(redacted)) {
      if (!ENVELOPE_KEYS.includes(key)) {
        contextObj[key] = value;
      }
    }
    if (Object.keys(contextObj).length > 0) {
      output += ` ${JSON.stringify(contextObj, null, 2)}`;
    }
  } else {
    output = JSON.stringify(redacted);
  }

  if (toStderr) {
    console.error(output);
  } else {
    console.log(output);
  }
}

function shouldLog(level: LogLevel, configLevel: LogThreshold): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[configLevel];
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  const log = (
    level: LogLevel,
    message: string,
    context?: LogContext,
    additionalFields?: Record<string, unknown>
  ): void => {
    if (!shouldLog(level, config.level)) {
      return;
    }

    const mergedContext = {
      ...config.defaultContext,
      ...context,
    };

    outputLog(
      createLogEntry(level, message, config, mergedContext, additionalFields),
      config
    );
  };

  const logger: Logger = {
    trace(message, context) {
      log("trace", message, context);
    },

    debug(message, context) {
      log("debug", message, context);
    },

    info(message, context) {
      log("info", message, context);
    },

    warn(message, context) {
      log("warn", message, context);
    },

    error(message, context) {
      const { error, ...rest } = context || {};
      log("error", message, rest, error ? { error: formatError(error) } : {});
    },

    fatal(message, context) {
      const { error, ...rest } = context || {};
      log("fatal", message, rest, error ? { error: formatError(error) } : {});
    },

    child(additionalContext) {
      return createLogger({
        ...config,
        defaultContext: {
          ...config.defaultContext,
          ...additionalContext,
        },
      });
    },

    timing(context: PerformanceContext & LogContext) {
      const { operation, duration, startTime, endTime, success, ...rest } =
        context;
      log("info", `Performance: ${operation}`, rest, {
        performance: { operation, duration, startTime, endTime, success },
      });
    },

    httpRequest(request: HttpRequestContext, context?: LogContext) {
      log("info", `HTTP Request: ${request.method} ${request.path}`, context, {
        request,
      });
    },

    httpResponse(
      request: HttpRequestContext,
      response: HttpResponseContext,
      context?: LogContext
    ) {
      const level: LogLevel =
        response.statusCode >= 500
          ? "error"
          : response.statusCode >= 400
            ? "warn"
            : "info";

      log(
        level,
        `HTTP Response: ${request.method} ${request.path} ${response.statusCode} ${response.responseTime}ms`,
        context,
        { request, response }
      );
    },

    async flush() {
      // console output is unbuffered
    },
  };

  return logger;
}

/**
 * Default logger configuration
 */
export function getDefaultLoggerConfig(): LoggerConfig {
  const environment = process.env.NODE_ENV || "development";
  const isDevelopment = environment === "development";
  const envLevel = process.env.LOG_LEVEL;

  return {
    level:
      envLevel && isLogThreshold(envLevel)
        ? envLevel
        : isDevelopment
          ? "debug"
          : "info",
    serviceName: process.env.SERVICE_NAME || "charity-raffle",
    environment,
    version: process.env.APP_VERSION || process.env.npm_package_version || "0.0.0",
    prettyPrint: isDevelopment,
    redactFields: DEFAULT_REDACT_FIELDS,
  };
}

/**
 * Default logger instance (singleton)
 */
let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger(getDefaultLoggerConfig());
  }
  return defaultLogger;
}

/**
 * Initialize logger with custom config
 */
export function initLogger(config: Partial<LoggerConfig>): Logger {
  defaultLogger = createLogger({
    ...getDefaultLoggerConfig(),
    ...config,
  });
  return defaultLogger;
}

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Run a function with correlation ID tracking
 */
export function withCorrelationId<T>(
  correlationId: string,
  fn: () => T
): T {
  return correlationStorage.run(correlationId, fn);
}

export async function withCorrelationIdAsync<T>(
  correlationId: string,
  fn: () => Promise<T>
): Promise<T> {
  return correlationStorage.run(correlationId, fn);
}

export function getCorrelationId(): string | undefined {
  return correlationStorage.getStore();
}
