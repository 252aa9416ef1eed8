/**
 * Raffle Error Catalog & Error Handling
 *
 * - Error catalog for entries, lifecycle, randomness and escrow
 * - Type-safe error construction with RaffleError
 * - Domain-specific factory functions
 * - Structured API response formatting with request correlation
 */

// Error catalog
export {
  ErrorCodes,
  getErrorByCode,
  getErrorsByDomain,
  isRetryable,
  getHttpStatus,
  type ErrorEntry,
  type ErrorCodeKey,
  type NumericErrorCode,
  type ErrorHttpStatus,
} from "./catalog";

// Error class & utilities
export {
  RaffleError,
  isRaffleError,
  toRaffleError,
  EntryErrors,
  LifecycleErrors,
  RandomnessErrors,
  EscrowErrors,
  SystemErrors,
  type RaffleErrorResponse,
} from "./raffle-error";
