/**
 * Raffle Error Catalog
 *
 * Centralized, structured error definitions for every raffle operation.
 * Each error has a unique numeric code, HTTP status, and user-facing message.
 *
 * Code ranges:
 *   1xxx - Entries
 *   2xxx - Lifecycle & Upkeep
 *   3xxx - Randomness
 *   4xxx - Jackpot & Donation Escrow
 *   9xxx - System & Infrastructure
 */

// ---------------------------------------------------------------------------
// Error entry shape
// ---------------------------------------------------------------------------

export interface ErrorEntry {
  /** Unique numeric error code. */
  readonly code: number;
  /** HTTP status code to return in API responses. */
  readonly status: number;
  /** User-facing message (safe to display in UI). */
  readonly message: string;
  /** Whether this error should be retried by the client. */
  readonly retryable: boolean;
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

export const ErrorCodes = {
  // ==========================================================================
  // 1xxx - Entries
  // ==========================================================================
  ENTRY_INSUFFICIENT_FEE: {
    code: 1001,
    status: 400,
    message: "The entrance fee sent is below the minimum.",
    retryable: false,
  },
  ENTRY_RAFFLE_NOT_OPEN: {
    code: 1002,
    status: 409,
    message: "The raffle is not accepting entries.",
    retryable: false,
  },
  ENTRY_CHARITY_TRANSFER_FAILED: {
    code: 1003,
    status: 502,
    message: "The donation could not be transferred to the chosen charity.",
    retryable: true,
  },

  // ==========================================================================
  // 2xxx - Lifecycle & Upkeep
  // ==========================================================================
  LIFECYCLE_UPKEEP_NOT_NEEDED: {
    code: 2001,
    status: 409,
    message: "The raffle is not ready to be closed.",
    retryable: true,
  },
  LIFECYCLE_RAFFLE_NOT_CLOSED: {
    code: 2002,
    status: 409,
    message: "The raffle has not closed yet.",
    retryable: true,
  },

  // ==========================================================================
  // 3xxx - Randomness
  // ==========================================================================
  RANDOMNESS_UNKNOWN_REQUEST: {
    code: 3001,
    status: 409,
    message: "The randomness delivery does not match the outstanding request.",
    retryable: false,
  },
  RANDOMNESS_INVALID_WORDS: {
    code: 3002,
    status: 400,
    message: "The randomness delivery has the wrong number of words.",
    retryable: false,
  },

  // ==========================================================================
  // 4xxx - Jackpot & Donation Escrow
  // ==========================================================================
  JACKPOT_TRANSFER_FAILED: {
    code: 4001,
    status: 502,
    message: "The jackpot could not be transferred.",
    retryable: true,
  },
  ESCROW_NOT_FUNDER: {
    code: 4002,
    status: 403,
    message: "Only the funder may manage the donation match.",
    retryable: false,
  },
  ESCROW_FUNDING_TRANSFER_FAILED: {
    code: 4003,
    status: 502,
    message: "The donation match could not be moved into escrow.",
    retryable: true,
  },
  ESCROW_MATCH_NOT_FUNDED: {
    code: 4004,
    status: 409,
    message: "The donation match has not been funded.",
    retryable: false,
  },
  ESCROW_DONATION_MATCH_FAILED: {
    code: 4005,
    status: 502,
    message: "The donation match could not be released to the charity winner.",
    retryable: true,
  },

  // ==========================================================================
  // 9xxx - System & Infrastructure
  // ==========================================================================
  SYSTEM_INTERNAL_ERROR: {
    code: 9001,
    status: 500,
    message: "An unexpected error occurred. Please try again.",
    retryable: true,
  },
  SYSTEM_VALIDATION_ERROR: {
    code: 9002,
    status: 400,
    message: "Request validation failed.",
    retryable: false,
  },
  SYSTEM_UNAUTHORIZED: {
    code: 9003,
    status: 401,
    message: "A valid bearer token is required.",
    retryable: false,
  },
} as const satisfies Record<string, ErrorEntry>;

// ---------------------------------------------------------------------------
// Derived types
// ---------------------------------------------------------------------------

/** Union of all error code keys (e.g. "ENTRY_INSUFFICIENT_FEE"). */
export type ErrorCodeKey = keyof typeof ErrorCodes;

/** Union of all numeric error codes. */
export type NumericErrorCode = (typeof ErrorCodes)[ErrorCodeKey]["code"];

/** HTTP statuses that appear in the catalog. */
export type ErrorHttpStatus = (typeof ErrorCodes)[ErrorCodeKey]["status"];

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

/**
 * Find a catalog key by its numeric code.
 */
export function getErrorByCode(
  code: number,
): { key: ErrorCodeKey; entry: ErrorEntry } | undefined {
  for (const key of Object.keys(ErrorCodes) as ErrorCodeKey[]) {
    const entry = ErrorCodes[key];
    if (entry.code === code) {
      return { key, entry };
    }
  }
  return undefined;
}

/**
 * All entries whose key starts with the given domain prefix ("ESCROW", ...).
 */
export function getErrorsByDomain(
  domain: string,
): Array<{ key: ErrorCodeKey; entry: ErrorEntry }> {
  const prefix = `${domain.toUpperCase()}_`;
  return (Object.keys(ErrorCodes) as ErrorCodeKey[])
    .filter((key) => key.startsWith(prefix))
    .map((key) => ({ key, entry: ErrorCodes[key] }));
}

export function isRetryable(key: ErrorCodeKey): boolean {
  return ErrorCodes[key].retryable;
}

export function getHttpStatus(key: ErrorCodeKey): ErrorHttpStatus {
  return ErrorCodes[key].status;
}
