import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import {
  createRequestLogger,
  toRaffleError,
  type Logger,
} from "@charity-raffle/core";
import type { Env } from "../index";

/**
 * Map thrown errors to the catalog response shape.
 * RaffleErrors keep their catalog status; anything unknown becomes a 500.
 */
export function errorHandler(logger: Logger): ErrorHandler<Env> {
  return (error, c) => {
    const requestId = c.get("requestId") || crypto.randomUUID();
    const requestLogger = createRequestLogger(
      { requestId, userId: c.get("callerId") },
      logger
    );

    if (error instanceof HTTPException) {
      requestLogger.warn("HTTP exception", { status: error.status, path: c.req.path });
      return error.getResponse();
    }

    const raffleError = toRaffleError(error);

    if (raffleError.status >= 500) {
      requestLogger.error("Request failed", {
        error: raffleError,
        errorCode: raffleError.errorCode,
        details: raffleError.details,
        path: c.req.path,
        method: c.req.method,
      });
    } else {
      requestLogger.info("Request rejected", {
        errorCode: raffleError.errorCode,
        path: c.req.path,
        method: c.req.method,
      });
    }

    return c.json(raffleError.toResponse(requestId), raffleError.status);
  };
}
