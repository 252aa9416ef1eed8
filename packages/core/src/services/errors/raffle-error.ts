/**
 * RaffleError - error class for every raffle operation.
 *
 * Wraps catalog error codes with runtime details and provides a structured
 * JSON response format for API consumers. Every raffle failure aborts its
 * operation, so the error carries the diagnostic values a caller needs to
 * decide whether to retry later.
 */

import {
  ErrorCodes,
  getHttpStatus,
  type ErrorCodeKey,
  type ErrorEntry,
  type ErrorHttpStatus,
} from "./catalog";

// ---------------------------------------------------------------------------
// Response shape
// ---------------------------------------------------------------------------

/** Structured error response returned to API consumers. */
export interface RaffleErrorResponse {
  success: false;
  error: {
    /** Unique numeric error code from the catalog. */
    code: number;
    /** Machine-readable error key (e.g. "ENTRY_INSUFFICIENT_FEE"). */
    key: string;
    /** User-facing error message. */
    message: string;
    /** Whether the client should retry the request. */
    retryable: boolean;
    /** Diagnostic values (amounts are decimal strings). */
    details?: Record<string, unknown>;
  };
  /** Correlation / request ID. */
  requestId: string;
  /** ISO 8601 timestamp of when the error occurred. */
  timestamp: string;
}

// ---------------------------------------------------------------------------
// Error class
// ---------------------------------------------------------------------------

export class RaffleError extends Error {
  /** The catalog error code key. */
  public readonly errorCode: ErrorCodeKey;

  /** The catalog entry for this error. */
  public readonly entry: ErrorEntry;

  /** Optional structured details to include in the response. */
  public readonly details?: Record<string, unknown>;

  /** The original error that caused this one, if any. */
  public override readonly cause?: Error;

  /** Timestamp of error creation (ms since epoch). */
  public readonly timestamp: number;

  constructor(
    errorCode: ErrorCodeKey,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    const entry = ErrorCodes[errorCode];
    super(entry.message);

    Object.setPrototypeOf(this, new.target.prototype);

    this.name = "RaffleError";
    this.errorCode = errorCode;
    this.entry = entry;
    this.details = details;
    this.cause = cause;
    this.timestamp = Date.now();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RaffleError);
    }
  }

  /** Numeric error code. */
  get code(): number {
    return this.entry.code;
  }

  /** HTTP status code. */
  get status(): ErrorHttpStatus {
    return getHttpStatus(this.errorCode);
  }

  get retryable(): boolean {
    return this.entry.retryable;
  }

  /**
   * Build the structured API response object.
   *
   * @param requestId - Correlation ID from the request context.
   */
  toResponse(requestId: string): RaffleErrorResponse {
    return {
      success: false,
      error: {
        code: this.entry.code,
        key: this.errorCode,
        message: this.entry.message,
        retryable: this.entry.retryable,
        ...(this.details && Object.keys(this.details).length > 0
          ? { details: this.details }
          : {}),
      },
      requestId,
      timestamp: new Date(this.timestamp).toISOString(),
    };
  }

  /**
   * Build a log-friendly object for structured logging.
   * Includes the stack trace and cause for debugging.
   */
  toLog(): Record<string, unknown> {
    return {
      name: this.name,
      errorCode: this.errorCode,
      code: this.entry.code,
      status: this.entry.status,
      message: this.message,
      retryable: this.entry.retryable,
      details: this.details,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
            stack: this.cause.stack,
          }
        : undefined,
      stack: this.stack,
      timestamp: new Date(this.timestamp).toISOString(),
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      errorCode: this.errorCode,
      code: this.entry.code,
      status: this.entry.status,
      message: this.message,
      retryable: this.entry.retryable,
      details: this.details,
      timestamp: new Date(this.timestamp).toISOString(),
    };
  }
}

// ---------------------------------------------------------------------------
// Factory helpers
// ---------------------------------------------------------------------------

export function isRaffleError(error: unknown): error is RaffleError {
  return error instanceof RaffleError;
}

/**
 * Wrap an unknown error as a RaffleError.
 * A RaffleError is returned as-is; anything else becomes SYSTEM_INTERNAL_ERROR.
 */
export function toRaffleError(error: unknown): RaffleError {
  if (isRaffleError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new RaffleError(
      "SYSTEM_INTERNAL_ERROR",
      { originalMessage: error.message },
      error,
    );
  }

  return new RaffleError("SYSTEM_INTERNAL_ERROR", {
    originalMessage: String(error),
  });
}

// ---------------------------------------------------------------------------
// Domain-specific factory functions
// ---------------------------------------------------------------------------

export const EntryErrors = {
  insufficientFee: (fee: bigint, minimum: bigint) =>
    new RaffleError("ENTRY_INSUFFICIENT_FEE", {
      fee: fee.toString(),
      minimum: minimum.toString(),
    }),
  raffleNotOpen: (state: string) =>
    new RaffleError("ENTRY_RAFFLE_NOT_OPEN", { state }),
  charityTransferFailed: (charity: string, reason?: string) =>
    new RaffleError("ENTRY_CHARITY_TRANSFER_FAILED", { charity, reason }),
} as const;

export const LifecycleErrors = {
  upkeepNotNeeded: (balance: bigint, entrantCount: number, state: string) =>
    new RaffleError("LIFECYCLE_UPKEEP_NOT_NEEDED", {
      balance: balance.toString(),
      entrantCount,
      state,
    }),
  raffleNotClosed: (state: string) =>
    new RaffleError("LIFECYCLE_RAFFLE_NOT_CLOSED", { state }),
} as const;

export const RandomnessErrors = {
  unknownRequest: (requestId: bigint, expected: bigint | null) =>
    new RaffleError("RANDOMNESS_UNKNOWN_REQUEST", {
      requestId: requestId.toString(),
      expected: expected === null ? null : expected.toString(),
    }),
  invalidWords: (received: number, expected: number) =>
    new RaffleError("RANDOMNESS_INVALID_WORDS", { received, expected }),
} as const;

export const EscrowErrors = {
  jackpotTransferFailed: (recipient: string, amount: bigint, reason?: string) =>
    new RaffleError("JACKPOT_TRANSFER_FAILED", {
      recipient,
      amount: amount.toString(),
      reason,
    }),
  notFunder: (caller: string) =>
    new RaffleError("ESCROW_NOT_FUNDER", { caller }),
  fundingTransferFailed: (amount: bigint, reason?: string) =>
    new RaffleError("ESCROW_FUNDING_TRANSFER_FAILED", {
      amount: amount.toString(),
      reason,
    }),
  matchNotFunded: () => new RaffleError("ESCROW_MATCH_NOT_FUNDED"),
  donationMatchFailed: (charityWinner: string, amount: bigint, reason?: string) =>
    new RaffleError("ESCROW_DONATION_MATCH_FAILED", {
      charityWinner,
      amount: amount.toString(),
      reason,
    }),
} as const;

export const SystemErrors = {
  internal: (cause?: Error) =>
    new RaffleError("SYSTEM_INTERNAL_ERROR", undefined, cause),
  validationError: (fields: Record<string, string>) =>
    new RaffleError("SYSTEM_VALIDATION_ERROR", { fields }),
  unauthorized: (reason: string) =>
    new RaffleError("SYSTEM_UNAUTHORIZED", { reason }),
} as const;
