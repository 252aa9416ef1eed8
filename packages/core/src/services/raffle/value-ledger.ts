/**
 * In-memory value ledger
 *
 * Holds account balances for the engine, its entrants, the charities and the
 * funder. Transfers never throw; they report rejection through
 * `TransferResult` so the caller can map it to its own typed error.
 */

import type { TransferResult, ValueTransfer } from "./types";

export class InMemoryValueLedger implements ValueTransfer {
  private readonly balances = new Map<string, bigint>();
  private readonly rejecting = new Set<string>();

  constructor(initialBalances: Record<string, bigint> = {}) {
    for (const [account, amount] of Object.entries(initialBalances)) {
      this.deposit(account, amount);
    }
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /**
   * Mint value into an account. Bootstrapping only.
   */
  deposit(account: string, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Cannot deposit a negative amount: ${amount}`);
    }
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  transfer(from: string, to: string, amount: bigint): TransferResult {
    if (amount < 0n) {
      return { ok: false, reason: "negative amount" };
    }
    if (this.rejecting.has(to)) {
      return { ok: false, reason: `recipient ${to} rejects transfers` };
    }
    const available = this.balanceOf(from);
    if (available < amount) {
      return {
        ok: false,
        reason: `insufficient funds: ${from} holds ${available}, needs ${amount}`,
      };
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return { ok: true };
  }

  /** Make every future transfer to `account` fail. */
  rejectTransfersTo(account: string): void {
    this.rejecting.add(account);
  }

  acceptTransfersTo(account: string): void {
    this.rejecting.delete(account);
  }
}
