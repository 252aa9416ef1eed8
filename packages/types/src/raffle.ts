/**
 * Raffle Types
 * Shared shapes for the raffle lifecycle, charity tallies and the escrowed
 * donation match.
 */

/** Lifecycle state of a raffle cycle */
export type RaffleState = "open" | "calculating" | "closed";

/** One of the three fixed charity beneficiaries */
export type CharityChoice = "CHARITY1" | "CHARITY2" | "CHARITY3";

/** Per-charity count of entries routed to that charity */
export type DonationTally = Record<CharityChoice, number>;

/** How the charity winner was decided */
export type TieKind = "none" | "two-way" | "three-way" | "below-max";

/** Result of the closure readiness check */
export interface UpkeepStatus {
  upkeepNeeded: boolean;
  isOpen: boolean;
  timePassed: boolean;
  hasPlayers: boolean;
  hasBalance: boolean;
}

/** Escrowed donation match bookkeeping */
export interface EscrowStatus {
  highestDonationCount: number;
  charityWinner: string | null;
  funded: boolean;
}

/**
 * Reporting view of a raffle. Amounts are decimal strings so the summary
 * survives JSON serialization.
 */
export interface RaffleSummary {
  state: RaffleState;
  entranceFee: string;
  jackpot: string;
  balance: string;
  durationSeconds: number;
  startedAt: string;
  entrantCount: number;
  tallies: DonationTally;
  charities: Record<CharityChoice, string>;
  funder: string;
  recentWinner: string | null;
  escrow: EscrowStatus;
  pendingRequestId: string | null;
}

/** Charity resolution outcome published when a cycle closes */
export interface CharityResolution {
  winner: CharityChoice;
  highestDonationCount: number;
  tie: TieKind;
}
