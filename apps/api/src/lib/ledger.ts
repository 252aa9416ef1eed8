/**
 * Bootstrap balances for the in-memory ledger
 */

import { InMemoryValueLedger, SystemErrors, type RaffleConfig } from "@charity-raffle/core";
import { z } from "zod";

const balanceEntrySchema = z.tuple([
  z.string().min(1, "account is required"),
  z.string().regex(/^\d+$/, "amount must be a non-negative integer"),
]);

/**
 * Parse `alice=1000,bob=250` into account balances
 */
export function parseLedgerBalances(raw: string | undefined): Record<string, bigint> {
  const balances: Record<string, bigint> = {};
  if (!raw) return balances;

  for (const pair of raw.split(",")) {
    const trimmed = pair.trim();
    if (!trimmed) continue;

    const result = balanceEntrySchema.safeParse(trimmed.split("=").map((part) => part.trim()));
    if (!result.success) {
      throw SystemErrors.validationError({
        LEDGER_BALANCES: `invalid entry "${trimmed}": ${result.error.issues[0]?.message ?? "expected account=amount"}`,
      });
    }
    const [account, amount] = result.data;
    balances[account] = (balances[account] ?? 0n) + BigInt(amount);
  }
  return balances;
}

/**
 * Ledger seeded from the environment. The funder always holds at least the
 * jackpot so the raffle can deploy.
 */
export function createSeededLedger(
  config: RaffleConfig,
  raw: string | undefined
): InMemoryValueLedger {
  const balances = parseLedgerBalances(raw);
  const funderBalance = balances[config.funder] ?? 0n;
  if (funderBalance < config.jackpot) {
    balances[config.funder] = config.jackpot;
  }
  return new InMemoryValueLedger(balances);
}
