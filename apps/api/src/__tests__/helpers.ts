/**
 * Shared API test fixtures
 */

import {
  InMemoryValueLedger,
  MockRandomnessCoordinator,
  createLogger,
  deployRaffle,
  parseRaffleConfig,
  type RaffleEngine,
} from "@charity-raffle/core";
import { createApp } from "../index";
import { generateAccessToken } from "../lib/jwt";

export const JWT_SECRET = "test-secret";
export const START = 1_700_000_000_000;

export interface TestApi {
  app: ReturnType<typeof createApp>;
  engine: RaffleEngine;
  ledger: InMemoryValueLedger;
  coordinator: MockRandomnessCoordinator;
  clock: { now: number };
}

/**
 * App over a freshly deployed raffle: funder holds 10 000 (1 000 of it
 * seeded as the jackpot), alice, bob and carol hold 1 000 each.
 */
export function createTestApi(): TestApi {
  const config = parseRaffleConfig({
    raffleId: "api-test-raffle",
    entranceFee: 100n,
    jackpot: 1_000n,
    durationSeconds: 30,
    keepersUpdateIntervalSeconds: 30,
    keyHash: "test-gas-lane",
    subscriptionId: "1",
    charities: {
      CHARITY1: "charity-a",
      CHARITY2: "charity-b",
      CHARITY3: "charity-c",
    },
    funder: "funder",
    raffleAccount: "raffle",
  });
  const logger = createLogger({
    level: "silent",
    serviceName: "raffle-api-test",
    environment: "test",
  });
  const ledger = new InMemoryValueLedger({
    funder: 10_000n,
    alice: 1_000n,
    bob: 1_000n,
    carol: 1_000n,
  });
  const coordinator = new MockRandomnessCoordinator();
  const clock = { now: START };
  const engine = deployRaffle(config, {
    ledger,
    coordinator,
    clock: () => clock.now,
    logger,
  });

  const app = createApp({ engine, jwtSecret: JWT_SECRET, logger });
  return { app, engine, ledger, coordinator, clock };
}

export async function bearer(accountId: string): Promise<Record<string, string>> {
  const token = await generateAccessToken(accountId, JWT_SECRET);
  return { Authorization: `Bearer ${token}` };
}

export async function postJson(
  api: TestApi,
  path: string,
  accountId: string | null,
  body?: unknown
): Promise<Response> {
  const headers: Record<string, string> = accountId ? await bearer(accountId) : {};
  if (body !== undefined) {
    headers["Content-Type"] = "application/json";
  }
  return api.app.request(path, {
    method: "POST",
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

export async function getJson(api: TestApi, path: string): Promise<Response> {
  return api.app.request(path);
}
