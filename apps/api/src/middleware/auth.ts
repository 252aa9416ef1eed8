import { createMiddleware } from "hono/factory";
import { SystemErrors } from "@charity-raffle/core";
import type { Env } from "../index";
import { verifyAccessToken } from "../lib/jwt";

/**
 * Resolve the caller from `Authorization: Bearer <token>`.
 * Requests without the header pass through anonymously; a malformed or
 * invalid token is rejected.
 */
export function authMiddleware(secret: string) {
  return createMiddleware<Env>(async (c, next) => {
    const authHeader = c.req.header("Authorization");
    if (!authHeader) {
      await next();
      return;
    }

    const [type, token] = authHeader.split(" ");
    if (type !== "Bearer" || !token) {
      throw SystemErrors.unauthorized("Invalid authorization format. Expected: Bearer <token>");
    }

    const verification = await verifyAccessToken(token, secret);
    if (!verification.ok) {
      throw SystemErrors.unauthorized(verification.reason);
    }

    c.set("callerId", verification.accountId);
    await next();
  });
}

/**
 * Reject anonymous requests
 */
export const requireCaller = createMiddleware<Env>(async (c, next) => {
  if (!c.get("callerId")) {
    throw SystemErrors.unauthorized("Missing authorization header");
  }
  await next();
});
