/**
 * JWT utilities for the raffle API
 * Callers authenticate with HS256 bearer tokens whose `sub` is their account id.
 */

import * as jose from "jose";

export const JWT_ISSUER = "charity-raffle-api";
export const JWT_AUDIENCE = "charity-raffle";
export const ACCESS_TOKEN_EXPIRY = "1h";

function encodeSecret(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Issue an access token for an account
 */
export async function generateAccessToken(
  accountId: string,
  secret: string,
  expiresIn: string = ACCESS_TOKEN_EXPIRY
): Promise<string> {
  return new jose.SignJWT({ type: "access" })
    .setProtectedHeader({ alg: "HS256" })
    .setSubject(accountId)
    .setIssuedAt()
    .setIssuer(JWT_ISSUER)
    .setAudience(JWT_AUDIENCE)
    .setExpirationTime(expiresIn)
    .sign(encodeSecret(secret));
}

export type TokenVerification =
  | { ok: true; accountId: string; claims: jose.JWTPayload }
  | { ok: false; reason: string };

/**
 * Verify an access token and return the account it names
 */
export async function verifyAccessToken(
  token: string,
  secret: string
): Promise<TokenVerification> {
  try {
    const { payload } = await jose.jwtVerify(token, encodeSecret(secret), {
      algorithms: ["HS256"],
      issuer: JWT_ISSUER,
      audience: JWT_AUDIENCE,
    });

    if (!payload.sub || payload.type !== "access") {
      return { ok: false, reason: "Token is not an access token" };
    }

    return { ok: true, accountId: payload.sub, claims: payload };
  } catch (error) {
    if (error instanceof jose.errors.JWTExpired) {
      return { ok: false, reason: "Token has expired" };
    }
    return { ok: false, reason: "Invalid token" };
  }
}
