/**
 * Shared raffle test fixtures
 */

import { vi } from "vitest";
import { isRaffleError, type RaffleError } from "../../errors";
import type { Logger } from "../../logger";
import { parseRaffleConfig, type RaffleConfig, type RaffleConfigInput } from "../config";
import { deployRaffle, type RaffleEngine } from "../raffle-engine";
import { MockRandomnessCoordinator } from "../randomness";
import { InMemoryValueLedger } from "../value-ledger";

export const FEE = 100n;
export const JACKPOT = 1_000n;
export const START = 1_700_000_000_000;

export function raffleConfig(overrides: Partial<RaffleConfigInput> = {}): RaffleConfig {
  return parseRaffleConfig({
    raffleId: "test-raffle",
    entranceFee: FEE,
    jackpot: JACKPOT,
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
    ...overrides,
  });
}

export function createMockLogger(): Logger {
  const logger: Logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(() => logger),
    timing: vi.fn(),
    httpRequest: vi.fn(),
    httpResponse: vi.fn(),
    flush: vi.fn(() => Promise.resolve()),
  };
  return logger;
}

export interface TestRaffle {
  engine: RaffleEngine;
  ledger: InMemoryValueLedger;
  coordinator: MockRandomnessCoordinator;
  config: RaffleConfig;
  clock: { now: number };
  logger: Logger;
}

/**
 * Deployed engine with a funded funder and three entrants holding 1 000 each.
 * `clock.now` drives the engine's time.
 */
export function createTestRaffle(overrides: Partial<RaffleConfigInput> = {}): TestRaffle {
  const config = raffleConfig(overrides);
  const ledger = new InMemoryValueLedger({
    [config.funder]: 10_000n,
    alice: 1_000n,
    bob: 1_000n,
    carol: 1_000n,
  });
  const coordinator = new MockRandomnessCoordinator();
  const clock = { now: START };
  const logger = createMockLogger();
  const engine = deployRaffle(config, {
    ledger,
    coordinator,
    clock: () => clock.now,
    logger,
  });
  return { engine, ledger, coordinator, config, clock, logger };
}

/** Four words with the given jackpot word and tie-break words */
export function words(w0: bigint, w1 = 0n, w2 = 0n, w3 = 0n): bigint[] {
  return [w0, w1, w2, w3];
}

/** Run `fn`, returning the RaffleError it throws */
export function catchRaffleError(fn: () => unknown): RaffleError {
  try {
    fn();
  } catch (error) {
    if (isRaffleError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a RaffleError to be thrown");
}
