import { Hono } from "hono";
import type { HealthCheckResponse } from "@charity-raffle/types";
import type { Env } from "../index";

const app = new Hono<Env>();

/**
 * Basic health check
 */
app.get("/", (c) => {
  const response: HealthCheckResponse = {
    status: "ok",
    service: "charity-raffle-api",
    version: process.env.APP_VERSION ?? "0.1.0",
    timestamp: new Date().toISOString(),
  };
  return c.json(response);
});

export { app as healthRoutes };
