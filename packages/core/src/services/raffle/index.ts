/**
 * Raffle Service
 *
 * Charity raffle engine: entries routed to three charities, timed closure,
 * a random draw for the jackpot, a tally-based charity winner and an
 * escrowed donation match.
 *
 * @example
 * ```typescript
 * import {
 *   deployRaffle,
 *   InMemoryValueLedger,
 *   MockRandomnessCoordinator,
 *   loadRaffleConfig,
 * } from '@charity-raffle/core/services/raffle';
 *
 * const config = loadRaffleConfig();
 * const ledger = new InMemoryValueLedger({ [config.funder]: config.jackpot });
 * const coordinator = new MockRandomnessCoordinator();
 * const engine = deployRaffle(config, { ledger, coordinator });
 * ```
 */

export * from "./types";
export * from "./config";
export * from "./value-ledger";
export * from "./randomness";
export * from "./entry-ledger";
export * from "./winner-selector";
export * from "./tie-breaker";
export * from "./charity-resolver";
export * from "./donation-escrow";
export * from "./raffle-engine";
export * from "./keeper";
