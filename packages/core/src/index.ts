/**
 * @charity-raffle/core
 *
 * Raffle engine, lifecycle state machine, error catalog and logging.
 */

export * from "./services";
