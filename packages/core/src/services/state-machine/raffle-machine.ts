/**
 * Raffle lifecycle state machine.
 *
 * open --PERFORM_UPKEEP--> calculating --FULFILL_RANDOMNESS--> closed
 *
 * There is no way out of `closed`; a new cycle is a new raffle.
 */

import type { RaffleState } from "@charity-raffle/types";
import {
  createStateMachine,
  type MachineHooks,
  type MachineSnapshot,
  type StateMachine,
  type StateMachineConfig,
} from "./machine";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const RAFFLE_STATES = [
  "open",
  "calculating",
  "closed",
] as const satisfies readonly RaffleState[];

export const RAFFLE_EVENTS = ["PERFORM_UPKEEP", "FULFILL_RANDOMNESS"] as const;

export type RaffleEvent = (typeof RAFFLE_EVENTS)[number];

export interface RaffleMachineContext extends Record<string, unknown> {
  raffleId: string;
  /** Start of the entry window (ms since epoch). */
  startedAt: number;
  durationSeconds: number;
  /** Refreshed by the engine right before every guard evaluation. */
  now: number;
  entrantCount: number;
  balance: bigint;
  /** Outstanding randomness request, if any. */
  pendingRequestId: bigint | null;
}

export type RaffleMachine = StateMachine<RaffleState, RaffleEvent, RaffleMachineContext>;

export type RaffleMachineSnapshot = MachineSnapshot<
  RaffleState,
  RaffleEvent,
  RaffleMachineContext
>;

// ---------------------------------------------------------------------------
// Default context factory
// ---------------------------------------------------------------------------

export function createRaffleContext(
  params: Pick<RaffleMachineContext, "raffleId" | "startedAt" | "durationSeconds">,
): RaffleMachineContext {
  return {
    raffleId: params.raffleId,
    startedAt: params.startedAt,
    durationSeconds: params.durationSeconds,
    now: params.startedAt,
    entrantCount: 0,
    balance: 0n,
    pendingRequestId: null,
  };
}

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function hasDurationElapsed(ctx: RaffleMachineContext): boolean {
  return ctx.now - ctx.startedAt >= ctx.durationSeconds * 1000;
}

/**
 * Closure guard minus the state check, which the transition table covers.
 */
export function isReadyToClose(ctx: RaffleMachineContext): boolean {
  return hasDurationElapsed(ctx) && ctx.entrantCount > 0 && ctx.balance > 0n;
}

// ---------------------------------------------------------------------------
// Machine configuration
// ---------------------------------------------------------------------------

function buildRaffleConfig(
  context: RaffleMachineContext,
  hooks?: MachineHooks<RaffleState, RaffleEvent, RaffleMachineContext>,
): StateMachineConfig<RaffleState, RaffleEvent, RaffleMachineContext> {
  return {
    id: `raffle:${context.raffleId}`,
    initial: "open",
    states: RAFFLE_STATES,
    context,
    hooks,
    transitions: [
      {
        from: "open",
        to: "calculating",
        event: "PERFORM_UPKEEP",
        guard: (ctx) => isReadyToClose(ctx),
        guardDescription:
          "Duration must have elapsed with at least one entrant and a funded jackpot",
      },
      {
        from: "calculating",
        to: "closed",
        event: "FULFILL_RANDOMNESS",
        guard: (ctx) => ctx.pendingRequestId !== null,
        guardDescription: "A randomness request must be outstanding",
      },
    ],
  };
}

// ---------------------------------------------------------------------------
// Factory & helpers
// ---------------------------------------------------------------------------

export function createRaffleMachine(
  context: RaffleMachineContext,
  hooks?: MachineHooks<RaffleState, RaffleEvent, RaffleMachineContext>,
): RaffleMachine {
  return createStateMachine(buildRaffleConfig(context, hooks));
}

export function isAcceptingEntries(state: RaffleState): boolean {
  return state === "open";
}

export function isTerminalRaffleState(state: RaffleState): boolean {
  return state === "closed";
}
