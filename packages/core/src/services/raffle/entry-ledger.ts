/**
 * Entry Ledger
 *
 * Records entrants in arrival order and counts entries per charity. Each
 * entry fee goes straight from the entrant to the chosen charity; nothing is
 * recorded unless that transfer succeeds.
 */

import { EntryErrors, SystemErrors } from "../errors";
import {
  emptyTally,
  isCharityChoice,
  type CharityChoice,
  type DonationTally,
  type RaffleState,
  type ValueTransfer,
} from "./types";

export interface EntryLedgerOptions {
  entranceFee: bigint;
  charities: Readonly<Record<CharityChoice, string>>;
  transfer: ValueTransfer;
}

export interface EntryRequest {
  fee: bigint;
  /** Validated here; callers may pass raw input */
  charity: string;
  entrant: string;
  state: RaffleState;
}

export interface RecordedEntry {
  entrant: string;
  charity: CharityChoice;
  fee: bigint;
}

export interface EntryLedgerSnapshot {
  entrants: string[];
  tallies: DonationTally;
}

export class EntryLedger {
  private entrants: string[] = [];
  private tallies: DonationTally = emptyTally();

  constructor(private readonly options: EntryLedgerOptions) {}

  enter(request: EntryRequest): RecordedEntry {
    const { fee, charity, entrant, state } = request;

    if (!isCharityChoice(charity)) {
      throw SystemErrors.validationError({
        charity: "must be one of CHARITY1, CHARITY2, CHARITY3",
      });
    }
    if (fee < this.options.entranceFee) {
      throw EntryErrors.insufficientFee(fee, this.options.entranceFee);
    }
    if (state !== "open") {
      throw EntryErrors.raffleNotOpen(state);
    }

    const account = this.options.charities[charity];
    const result = this.options.transfer.transfer(entrant, account, fee);
    if (!result.ok) {
      throw EntryErrors.charityTransferFailed(account, result.reason);
    }

    this.tallies[charity] += 1;
    this.entrants.push(entrant);

    return { entrant, charity, fee };
  }

  getEntrants(): readonly string[] {
    return [...this.entrants];
  }

  getEntrant(index: number): string | undefined {
    return this.entrants[index];
  }

  get entrantCount(): number {
    return this.entrants.length;
  }

  getTallies(): DonationTally {
    return { ...this.tallies };
  }

  /** Empty the ledger for the next cycle, returning what it held. */
  drain(): EntryLedgerSnapshot {
    const drained = this.snapshot();
    this.entrants = [];
    this.tallies = emptyTally();
    return drained;
  }

  snapshot(): EntryLedgerSnapshot {
    return { entrants: [...this.entrants], tallies: { ...this.tallies } };
  }

  restore(snapshot: EntryLedgerSnapshot): void {
    this.entrants = [...snapshot.entrants];
    this.tallies = { ...snapshot.tallies };
  }
}
