import { Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import {
  createLoggingMiddleware,
  getLogger,
  type Logger,
  type RaffleEngine,
} from "@charity-raffle/core";

import { authMiddleware } from "./middleware/auth";
import { errorHandler } from "./middleware/error-handler";
import { healthRoutes } from "./routes/health";
import { raffleRoutes } from "./routes/raffle";
import { escrowRoutes } from "./routes/escrow";

// Types
export type Env = {
  Variables: {
    requestId: string;
    callerId?: string;
    engine: RaffleEngine;
  };
};

export interface AppOptions {
  engine: RaffleEngine;
  jwtSecret: string;
  logger?: Logger;
}

/**
 * Build the HTTP surface over a deployed raffle
 */
export function createApp(options: AppOptions): Hono<Env> {
  const logger = options.logger ?? getLogger();
  const app = new Hono<Env>();

  app.use("*", secureHeaders());

  // Request ID middleware - always generate server-side
  app.use("*", async (c, next) => {
    const requestId = crypto.randomUUID();
    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);
    await next();
  });

  app.use(
    "*",
    createLoggingMiddleware({
      logger,
      getRequestId: (c) => c.get("requestId"),
      getUserId: (c) => c.get("callerId"),
    })
  );

  app.use("*", async (c, next) => {
    c.set("engine", options.engine);
    await next();
  });

  app.use("*", authMiddleware(options.jwtSecret));

  app.route("/health", healthRoutes);
  app.route("/raffle/escrow", escrowRoutes);
  app.route("/raffle", raffleRoutes);

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        success: false,
        error: {
          code: "NOT_FOUND",
          message: "The requested resource was not found",
        },
        requestId: c.get("requestId"),
        timestamp: new Date().toISOString(),
      },
      404
    );
  });

  app.onError(errorHandler(logger));

  return app;
}
