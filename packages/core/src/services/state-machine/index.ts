/**
 * State Machine Library
 *
 * Lightweight, type-safe state machines with guards, hooks and snapshots.
 * - Raffle lifecycle (open -> calculating -> closed)
 */

// Core state machine
export {
  createStateMachine,
  type StateMachine,
  type StateMachineConfig,
  type MachineSnapshot,
  type TransitionRecord,
  type TransitionResult,
  type TransitionSuccess,
  type TransitionDenied,
  type TransitionDef,
  type GuardFn,
  type HookFn,
  type MachineHooks,
} from "./machine";

// Raffle state machine
export {
  createRaffleMachine,
  createRaffleContext,
  hasDurationElapsed,
  isReadyToClose,
  isAcceptingEntries,
  isTerminalRaffleState,
  RAFFLE_STATES,
  RAFFLE_EVENTS,
  type RaffleMachine,
  type RaffleMachineSnapshot,
  type RaffleMachineContext,
  type RaffleEvent,
} from "./raffle-machine";
