/**
 * Raffle Service Types
 */

import type {
  CharityChoice,
  CharityResolution,
  DonationTally,
  EscrowStatus,
  RaffleState,
  TieKind,
  UpkeepStatus,
} from "@charity-raffle/types";
import type { RaffleMachineSnapshot } from "../state-machine";

export type {
  CharityChoice,
  CharityResolution,
  DonationTally,
  EscrowStatus,
  RaffleState,
  TieKind,
  UpkeepStatus,
};

// ============================================================================
// Charities
// ============================================================================

export const CHARITY_CHOICES = [
  "CHARITY1",
  "CHARITY2",
  "CHARITY3",
] as const satisfies readonly CharityChoice[];

export function isCharityChoice(value: string): value is CharityChoice {
  return CHARITY_CHOICES.some((choice) => choice === value);
}

export function emptyTally(): DonationTally {
  return { CHARITY1: 0, CHARITY2: 0, CHARITY3: 0 };
}

// ============================================================================
// Randomness
// ============================================================================

/** Words requested per draw: 0 picks the jackpot winner, 1-3 break ties */
export const RANDOM_WORDS_PER_DRAW = 4;

/** Ordered batch of unsigned 256-bit words */
export type RandomWords = readonly bigint[];

export interface RandomWordsRequest {
  /** Gas lane / key hash identifying the randomness source */
  keyHash: string;
  subscriptionId: string;
  requestConfirmations: number;
  callbackGasLimit: number;
  numWords: number;
}

/** Receives exactly one delivery per request */
export interface RandomWordsConsumer {
  fulfillRandomWords(requestId: bigint, words: RandomWords): void;
}

export interface RandomnessCoordinator {
  requestRandomWords(request: RandomWordsRequest, consumer: RandomWordsConsumer): bigint;
}

// ============================================================================
// Value transfer
// ============================================================================

export type TransferResult = { ok: true } | { ok: false; reason: string };

export interface ValueTransfer {
  balanceOf(account: string): bigint;
  transfer(from: string, to: string, amount: bigint): TransferResult;
}

// ============================================================================
// Engine state
// ============================================================================

/**
 * Everything the engine owns. Snapshotted before each operation that can
 * fail after mutating, and restored on failure.
 */
export interface RaffleSnapshot {
  machine: RaffleMachineSnapshot;
  entrants: string[];
  tallies: DonationTally;
  escrow: EscrowStatus;
  recentWinner: string | null;
}

// ============================================================================
// Events
// ============================================================================

export interface RaffleEventMap {
  raffleEnter: { entrant: string; charity: CharityChoice; fee: bigint };
  requestedRaffleWinner: { requestId: bigint };
  winnerPicked: { winner: string; jackpot: bigint };
  charityWinnerPicked: {
    charity: CharityChoice;
    account: string;
    highestDonationCount: number;
    tie: TieKind;
  };
  donationMatchFunded: { amount: bigint };
  donationMatchReleased: { charity: string; amount: bigint };
}

export type RaffleEventName = keyof RaffleEventMap;

/** Milliseconds since epoch */
export type Clock = () => number;
