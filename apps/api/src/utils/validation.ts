import { z, type ZodError } from "zod";
import { SystemErrors } from "@charity-raffle/core";

/**
 * Wei-style amount sent as a decimal string, since JSON numbers cannot
 * carry the full range
 */
export const amountSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer string")
  .transform((value) => BigInt(value));

/**
 * Flatten zod issues into `{ "path.to.field": message }`
 */
export function issuesToFields(error: ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "body";
    fields[key] ??= issue.message;
  }
  return fields;
}

/**
 * zValidator hook that routes failures through the error catalog
 */
export function validationHook(result: { success: boolean; error?: ZodError }): void {
  if (!result.success && result.error) {
    throw SystemErrors.validationError(issuesToFields(result.error));
  }
}
