/**
 * Raffle Keeper
 *
 * Polls the engine's closure check on an interval and performs upkeep once
 * it reports ready.
 */

import { EventEmitter } from "events";
import { toRaffleError } from "../errors";
import { getLogger } from "../logger";
import type { Logger } from "../logger";
import type { RaffleEngine } from "./raffle-engine";

export interface RaffleKeeperConfig {
  engine: RaffleEngine;
  /** Seconds between checks */
  intervalSeconds: number;
  logger?: Logger;
}

export interface KeeperState {
  isRunning: boolean;
  lastCheckTime: number;
  checkCount: number;
  upkeepCount: number;
  errorCount: number;
}

export type TickResult =
  | { performed: true; requestId: bigint }
  | { performed: false; error?: Error };

export class RaffleKeeper extends EventEmitter {
  private readonly engine: RaffleEngine;
  private readonly intervalMs: number;
  private readonly logger: Logger;

  private timer: ReturnType<typeof setInterval> | null = null;
  private state: KeeperState = {
    isRunning: false,
    lastCheckTime: 0,
    checkCount: 0,
    upkeepCount: 0,
    errorCount: 0,
  };

  constructor(config: RaffleKeeperConfig) {
    super();
    this.engine = config.engine;
    this.intervalMs = config.intervalSeconds * 1000;
    this.logger = (config.logger ?? getLogger()).child({ component: "raffle-keeper" });
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    if (this.state.isRunning) {
      this.logger.warn("Keeper already running");
      return;
    }

    this.state.isRunning = true;
    this.logger.info("Starting raffle keeper", { intervalMs: this.intervalMs });

    this.timer = setInterval(() => {
      this.tick();
    }, this.intervalMs);

    this.emit("started");
  }

  stop(): void {
    if (!this.state.isRunning) {
      return;
    }

    this.state.isRunning = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    this.logger.info("Stopped raffle keeper");
    this.emit("stopped");
  }

  getState(): KeeperState {
    return { ...this.state };
  }

  // ==========================================================================
  // Polling
  // ==========================================================================

  /**
   * One poll: check, and perform upkeep if needed. Errors are counted,
   * logged and emitted as `upkeepError`.
   */
  tick(): TickResult {
    this.state.checkCount++;
    this.state.lastCheckTime = Date.now();

    try {
      const { upkeepNeeded } = this.engine.checkUpkeep();
      if (!upkeepNeeded) {
        return { performed: false };
      }

      const requestId = this.engine.performUpkeep();
      this.state.upkeepCount++;
      this.logger.info("Upkeep performed", { requestId: requestId.toString() });
      this.emit("upkeepPerformed", { requestId });
      return { performed: true, requestId };
    } catch (error) {
      const raffleError = toRaffleError(error);
      this.state.errorCount++;
      this.logger.error("Upkeep failed", { error: raffleError, errorCode: raffleError.errorCode });
      this.emit("upkeepError", raffleError);
      return { performed: false, error: raffleError };
    }
  }
}
