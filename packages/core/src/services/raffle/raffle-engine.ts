/**
 * Raffle Engine
 *
 * Owns one raffle cycle: entries, closure, the random draw, the charity
 * decision and the donation match escrow. Every operation is synchronous and
 * either commits fully or leaves the engine as it found it.
 *
 * Events: raffleEnter, requestedRaffleWinner, winnerPicked,
 * charityWinnerPicked, donationMatchFunded, donationMatchReleased.
 */

import { EventEmitter } from "events";
import type { RaffleSummary } from "@charity-raffle/types";
import { EscrowErrors, LifecycleErrors, RandomnessErrors } from "../errors";
import { getLogger } from "../logger";
import type { Logger } from "../logger";
import {
  createRaffleContext,
  createRaffleMachine,
  hasDurationElapsed,
  isReadyToClose,
  type RaffleMachine,
  type RaffleMachineContext,
} from "../state-machine";
import { resolveCharityWinner, type CharityOutcome } from "./charity-resolver";
import type { RaffleConfig } from "./config";
import { DonationEscrow } from "./donation-escrow";
import { EntryLedger, type RecordedEntry } from "./entry-ledger";
import {
  RANDOM_WORDS_PER_DRAW,
  type CharityChoice,
  type Clock,
  type DonationTally,
  type RaffleEventMap,
  type RaffleEventName,
  type RaffleSnapshot,
  type RaffleState,
  type RandomnessCoordinator,
  type RandomWords,
  type RandomWordsConsumer,
  type UpkeepStatus,
  type ValueTransfer,
} from "./types";
import { selectWinner } from "./winner-selector";

// ============================================================================
// Types
// ============================================================================

export interface RaffleEngineDeps {
  ledger: ValueTransfer;
  coordinator: RandomnessCoordinator;
  clock?: Clock;
  logger?: Logger;
}

export interface DrawResult {
  requestId: bigint;
  winner: string;
  jackpot: bigint;
  charity: CharityOutcome;
  charityAccount: string;
}

// ============================================================================
// Engine
// ============================================================================

export class RaffleEngine extends EventEmitter implements RandomWordsConsumer {
  private readonly config: RaffleConfig;
  private readonly ledger: ValueTransfer;
  private readonly coordinator: RandomnessCoordinator;
  private readonly clock: Clock;
  private readonly logger: Logger;

  private readonly machine: RaffleMachine;
  private readonly entries: EntryLedger;
  private readonly escrow: DonationEscrow;
  private recentWinner: string | null = null;

  constructor(config: RaffleConfig, deps: RaffleEngineDeps) {
    super();
    this.config = config;
    this.ledger = deps.ledger;
    this.coordinator = deps.coordinator;
    this.clock = deps.clock ?? Date.now;
    this.logger = (deps.logger ?? getLogger()).child({ raffleId: config.raffleId });

    this.machine = createRaffleMachine(
      createRaffleContext({
        raffleId: config.raffleId,
        startedAt: this.clock(),
        durationSeconds: config.durationSeconds,
      }),
      {
        onTransition: (_ctx, event, from, to, metadata) => {
          this.logger.info("Raffle state changed", { from, to, event, ...metadata });
        },
      },
    );

    this.entries = new EntryLedger({
      entranceFee: config.entranceFee,
      charities: config.charities,
      transfer: this.ledger,
    });

    this.escrow = new DonationEscrow({
      funder: config.funder,
      entranceFee: config.entranceFee,
      custodyAccount: config.raffleAccount,
      transfer: this.ledger,
    });
  }

  // ==========================================================================
  // Entries
  // ==========================================================================

  enter(fee: bigint, charity: string, entrant: string): RecordedEntry {
    const entry = this.entries.enter({ fee, charity, entrant, state: this.getState() });
    this.machine.setContext({ entrantCount: this.entries.entrantCount });

    this.logger.debug("Raffle entered", {
      entrant,
      charity: entry.charity,
      fee: fee.toString(),
      entrantCount: this.entries.entrantCount,
    });
    this.publish("raffleEnter", entry);
    return entry;
  }

  // ==========================================================================
  // Closure
  // ==========================================================================

  checkUpkeep(): UpkeepStatus {
    const ctx = this.syncContext();
    const isOpen = this.machine.getState() === "open";
    return {
      upkeepNeeded: isOpen && isReadyToClose(ctx),
      isOpen,
      timePassed: hasDurationElapsed(ctx),
      hasPlayers: ctx.entrantCount > 0,
      hasBalance: ctx.balance > 0n,
    };
  }

  /**
   * Close entries and request the draw. The returned id is the only request
   * whose delivery the engine will accept.
   */
  performUpkeep(): bigint {
    const ctx = this.syncContext();
    const previous = this.machine.serialize();

    const result = this.machine.transition("PERFORM_UPKEEP");
    if (!result.ok) {
      throw LifecycleErrors.upkeepNotNeeded(ctx.balance, ctx.entrantCount, this.machine.getState());
    }

    let requestId: bigint;
    try {
      requestId = this.coordinator.requestRandomWords(
        {
          keyHash: this.config.keyHash,
          subscriptionId: this.config.subscriptionId,
          requestConfirmations: this.config.requestConfirmations,
          callbackGasLimit: this.config.callbackGasLimit,
          numWords: this.config.numWords,
        },
        this,
      );
    } catch (error) {
      this.machine.restore(previous);
      throw error;
    }

    this.machine.setContext({ pendingRequestId: requestId });
    this.logger.info("Requested raffle winner", { requestId: requestId.toString() });
    this.publish("requestedRaffleWinner", { requestId });
    return requestId;
  }

  // ==========================================================================
  // Draw
  // ==========================================================================

  /**
   * Consume a random batch: pick the jackpot winner and the charity winner,
   * close the cycle, then pay the jackpot. A rejected payout undoes the whole
   * draw and leaves the request outstanding.
   */
  fulfillRandomWords(requestId: bigint, words: RandomWords): DrawResult {
    const pending = this.machine.getContext().pendingRequestId;
    if (this.getState() !== "calculating" || pending !== requestId) {
      throw RandomnessErrors.unknownRequest(requestId, pending);
    }
    const [winnerWord] = words;
    if (words.length !== RANDOM_WORDS_PER_DRAW || winnerWord === undefined) {
      throw RandomnessErrors.invalidWords(words.length, RANDOM_WORDS_PER_DRAW);
    }

    const startTime = this.clock();
    const previous = this.snapshot();

    const winner = selectWinner(winnerWord, this.entries.getEntrants());
    const charity = resolveCharityWinner(this.entries.getTallies(), words);
    const charityAccount = this.config.charities[charity.winner];

    this.recentWinner = winner;
    this.escrow.recordCharityWinner(charityAccount, charity.highestDonationCount);
    this.entries.drain();
    const closed = this.machine.transition("FULFILL_RANDOMNESS", {
      requestId: requestId.toString(),
      winner,
    });
    if (!closed.ok) {
      this.restore(previous);
      throw new Error(`Raffle could not close: ${closed.reason}`);
    }
    this.machine.setContext({ pendingRequestId: null, entrantCount: 0 });

    const jackpot = this.getBalance();
    const payout = this.ledger.transfer(this.config.raffleAccount, winner, jackpot);
    if (!payout.ok) {
      this.restore(previous);
      this.logger.warn("Jackpot payout rejected, draw rolled back", {
        requestId: requestId.toString(),
        winner,
        reason: payout.reason,
      });
      throw EscrowErrors.jackpotTransferFailed(winner, jackpot, payout.reason);
    }

    this.logger.timing({
      operation: "fulfillRandomWords",
      duration: this.clock() - startTime,
      success: true,
    });
    this.logger.info("Winner picked", {
      winner,
      jackpot: jackpot.toString(),
      charity: charity.winner,
      tie: charity.tie,
    });

    this.publish("winnerPicked", { winner, jackpot });
    this.publish("charityWinnerPicked", {
      charity: charity.winner,
      account: charityAccount,
      highestDonationCount: charity.highestDonationCount,
      tie: charity.tie,
    });

    return { requestId, winner, jackpot, charity, charityAccount };
  }

  // ==========================================================================
  // Donation match
  // ==========================================================================

  fundDonationMatch(caller: string): bigint {
    const amount = this.escrow.fund(caller, this.getState());
    this.logger.info("Donation match funded", { amount: amount.toString() });
    this.publish("donationMatchFunded", { amount });
    return amount;
  }

  releaseDonationMatch(caller: string): { charity: string; amount: bigint } {
    const release = this.escrow.release(caller, this.getState());
    this.logger.info("Donation match released", {
      charity: release.charity,
      amount: release.amount.toString(),
    });
    this.publish("donationMatchReleased", release);
    return release;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getState(): RaffleState {
    return this.machine.getState();
  }

  getEntrants(): readonly string[] {
    return this.entries.getEntrants();
  }

  getEntrant(index: number): string | undefined {
    return this.entries.getEntrant(index);
  }

  getEntrantCount(): number {
    return this.entries.entrantCount;
  }

  getEntranceFee(): bigint {
    return this.config.entranceFee;
  }

  getJackpot(): bigint {
    return this.config.jackpot;
  }

  getDurationSeconds(): number {
    return this.config.durationSeconds;
  }

  getStartedAt(): number {
    return this.machine.getContext().startedAt;
  }

  getRecentWinner(): string | null {
    return this.recentWinner;
  }

  getCharityWinner(): string | null {
    return this.escrow.getStatus().charityWinner;
  }

  getHighestDonationCount(): number {
    return this.escrow.getStatus().highestDonationCount;
  }

  isFunded(): boolean {
    return this.escrow.getStatus().funded;
  }

  getFunder(): string {
    return this.config.funder;
  }

  getCharities(): Readonly<Record<CharityChoice, string>> {
    return { ...this.config.charities };
  }

  getTallies(): DonationTally {
    return this.entries.getTallies();
  }

  getBalance(): bigint {
    return this.ledger.balanceOf(this.config.raffleAccount);
  }

  getPendingRequestId(): bigint | null {
    return this.machine.getContext().pendingRequestId;
  }

  getHistory() {
    return this.machine.getHistory();
  }

  snapshot(): RaffleSnapshot {
    const entries = this.entries.snapshot();
    return {
      machine: this.machine.serialize(),
      entrants: entries.entrants,
      tallies: entries.tallies,
      escrow: this.escrow.snapshot(),
      recentWinner: this.recentWinner,
    };
  }

  getSummary(): RaffleSummary {
    const pendingRequestId = this.getPendingRequestId();
    return {
      state: this.getState(),
      entranceFee: this.config.entranceFee.toString(),
      jackpot: this.config.jackpot.toString(),
      balance: this.getBalance().toString(),
      durationSeconds: this.config.durationSeconds,
      startedAt: new Date(this.getStartedAt()).toISOString(),
      entrantCount: this.getEntrantCount(),
      tallies: this.getTallies(),
      charities: this.getCharities(),
      funder: this.config.funder,
      recentWinner: this.recentWinner,
      escrow: this.escrow.getStatus(),
      pendingRequestId: pendingRequestId === null ? null : pendingRequestId.toString(),
    };
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private restore(snapshot: RaffleSnapshot): void {
    this.machine.restore(snapshot.machine);
    this.entries.restore({ entrants: snapshot.entrants, tallies: snapshot.tallies });
    this.escrow.restore(snapshot.escrow);
    this.recentWinner = snapshot.recentWinner;
  }

  /** Refresh the guard inputs that live outside the machine. */
  private syncContext(): Readonly<RaffleMachineContext> {
    this.machine.setContext({
      now: this.clock(),
      entrantCount: this.entries.entrantCount,
      balance: this.getBalance(),
    });
    return this.machine.getContext();
  }

  private publish<K extends RaffleEventName>(event: K, payload: RaffleEventMap[K]): void {
    this.emit(event, payload);
  }
}

// ============================================================================
// Deployment
// ============================================================================

/**
 * Build an engine and seed its jackpot from the funder.
 */
export function deployRaffle(config: RaffleConfig, deps: RaffleEngineDeps): RaffleEngine {
  const engine = new RaffleEngine(config, deps);

  const seeded = deps.ledger.transfer(config.funder, config.raffleAccount, config.jackpot);
  if (!seeded.ok) {
    throw EscrowErrors.jackpotTransferFailed(config.raffleAccount, config.jackpot, seeded.reason);
  }

  (deps.logger ?? getLogger()).info("Raffle deployed", {
    raffleId: config.raffleId,
    jackpot: config.jackpot.toString(),
    entranceFee: config.entranceFee.toString(),
    durationSeconds: config.durationSeconds,
  });
  return engine;
}
