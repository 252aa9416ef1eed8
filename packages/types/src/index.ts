/**
 * Shared TypeScript types for the charity raffle workspace.
 *
 * @example
 * import type { RaffleState, CharityChoice } from "@charity-raffle/types";
 */

// Raffle types
export type {
  RaffleState,
  CharityChoice,
  DonationTally,
  TieKind,
  UpkeepStatus,
  EscrowStatus,
  RaffleSummary,
  CharityResolution,
} from "./raffle";

// API types
export type {
  ApiResponse,
  ApiError,
  ErrorResponse,
  HealthCheckResponse,
} from "./api";
