/**
 * Randomness coordinators
 *
 * A coordinator hands out request ids and later calls the consumer back with
 * the requested number of 256-bit words, exactly once per request.
 */

import { createHash, randomBytes } from "crypto";
import { RandomnessErrors } from "../errors";
import { getLogger } from "../logger";
import type { Logger } from "../logger";
import type {
  RandomnessCoordinator,
  RandomWords,
  RandomWordsConsumer,
  RandomWordsRequest,
} from "./types";

interface PendingRequest {
  request: RandomWordsRequest;
  consumer: RandomWordsConsumer;
}

function wordFromBytes(bytes: Buffer): bigint {
  return BigInt(`0x${bytes.toString("hex")}`);
}

// ============================================================================
// Mock coordinator (tests and local runs)
// ============================================================================

/**
 * Holds requests until `fulfillRandomWords` is called. Without explicit words
 * each word is sha256(`${requestId}:${index}`), so a given id always yields
 * the same batch.
 */
export class MockRandomnessCoordinator implements RandomnessCoordinator {
  private nextRequestId = 1n;
  private readonly pending = new Map<bigint, PendingRequest>();

  requestRandomWords(request: RandomWordsRequest, consumer: RandomWordsConsumer): bigint {
    const requestId = this.nextRequestId;
    this.nextRequestId += 1n;
    this.pending.set(requestId, { request, consumer });
    return requestId;
  }

  isPending(requestId: bigint): boolean {
    return this.pending.has(requestId);
  }

  pendingRequestIds(): bigint[] {
    return [...this.pending.keys()];
  }

  static deriveWords(requestId: bigint, numWords: number): bigint[] {
    return Array.from({ length: numWords }, (_, index) =>
      wordFromBytes(createHash("sha256").update(`${requestId}:${index}`).digest()),
    );
  }

  /**
   * Deliver words for a pending request. The request is only forgotten once
   * the consumer accepts the delivery, so a rejected delivery can be retried.
   */
  fulfillRandomWords(requestId: bigint, words?: RandomWords): void {
    const pending = this.pending.get(requestId);
    if (!pending) {
      throw RandomnessErrors.unknownRequest(requestId, null);
    }
    const batch = words ?? MockRandomnessCoordinator.deriveWords(requestId, pending.request.numWords);
    pending.consumer.fulfillRandomWords(requestId, batch);
    this.pending.delete(requestId);
  }
}

// ============================================================================
// Crypto coordinator (server runtime)
// ============================================================================

export interface CryptoRandomnessCoordinatorOptions {
  logger?: Logger;
}

/**
 * Draws words from `crypto.randomBytes` and delivers them on the next
 * macrotask. A failed delivery is logged; the request is then dropped.
 */
export class CryptoRandomnessCoordinator implements RandomnessCoordinator {
  private nextRequestId = 1n;
  private readonly logger: Logger;

  constructor(options: CryptoRandomnessCoordinatorOptions = {}) {
    this.logger = (options.logger ?? getLogger()).child({ component: "randomness" });
  }

  requestRandomWords(request: RandomWordsRequest, consumer: RandomWordsConsumer): bigint {
    const requestId = this.nextRequestId;
    this.nextRequestId += 1n;

    const words = Array.from({ length: request.numWords }, () => wordFromBytes(randomBytes(32)));

    setImmediate(() => {
      try {
        consumer.fulfillRandomWords(requestId, words);
        this.logger.debug("Random words delivered", { requestId: requestId.toString() });
      } catch (error) {
        this.logger.error("Random words delivery failed", {
          requestId: requestId.toString(),
          error: error instanceof Error ? error : new Error(String(error)),
        });
      }
    });

    return requestId;
  }
}
