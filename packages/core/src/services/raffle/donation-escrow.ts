/**
 * Donation Escrow
 *
 * After a cycle closes the funder matches the winning charity's entry count:
 * `fund` moves `highestDonationCount * entranceFee` into custody and
 * `release` pays the whole custody balance to the charity winner.
 */

import { EscrowErrors, LifecycleErrors } from "../errors";
import type { EscrowStatus, RaffleState, ValueTransfer } from "./types";

export interface DonationEscrowOptions {
  funder: string;
  entranceFee: bigint;
  /** Account holding the engine's funds */
  custodyAccount: string;
  transfer: ValueTransfer;
}

export interface DonationRelease {
  charity: string;
  amount: bigint;
}

export class DonationEscrow {
  private status: EscrowStatus = {
    highestDonationCount: 0,
    charityWinner: null,
    funded: false,
  };

  constructor(private readonly options: DonationEscrowOptions) {}

  /** Set once per cycle, when it closes. */
  recordCharityWinner(account: string, highestDonationCount: number): void {
    this.status = { ...this.status, charityWinner: account, highestDonationCount };
  }

  fund(caller: string, state: RaffleState): bigint {
    this.assertAllowed(caller, state);

    const previous = this.snapshot();
    const amount = BigInt(this.status.highestDonationCount) * this.options.entranceFee;
    this.status.highestDonationCount = 0;

    const result = this.options.transfer.transfer(
      this.options.funder,
      this.options.custodyAccount,
      amount,
    );
    if (!result.ok) {
      this.restore(previous);
      throw EscrowErrors.fundingTransferFailed(amount, result.reason);
    }

    this.status.funded = true;
    return amount;
  }

  release(caller: string, state: RaffleState): DonationRelease {
    this.assertAllowed(caller, state);

    if (!this.status.funded) {
      throw EscrowErrors.matchNotFunded();
    }

    const amount = this.options.transfer.balanceOf(this.options.custodyAccount);
    const charity = this.status.charityWinner;
    if (charity === null) {
      throw EscrowErrors.donationMatchFailed("none", amount, "no charity winner recorded");
    }

    const previous = this.snapshot();
    this.status.charityWinner = null;
    this.status.funded = false;

    const result = this.options.transfer.transfer(this.options.custodyAccount, charity, amount);
    if (!result.ok) {
      this.restore(previous);
      throw EscrowErrors.donationMatchFailed(charity, amount, result.reason);
    }

    return { charity, amount };
  }

  getStatus(): EscrowStatus {
    return { ...this.status };
  }

  snapshot(): EscrowStatus {
    return this.getStatus();
  }

  restore(snapshot: EscrowStatus): void {
    this.status = { ...snapshot };
  }

  private assertAllowed(caller: string, state: RaffleState): void {
    if (caller !== this.options.funder) {
      throw EscrowErrors.notFunder(caller);
    }
    if (state !== "closed") {
      throw LifecycleErrors.raffleNotClosed(state);
    }
  }
}
