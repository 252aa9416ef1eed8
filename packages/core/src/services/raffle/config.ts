/**
 * Raffle Configuration
 *
 * Validated with zod. `loadRaffleConfig` layers `RAFFLE_*` environment
 * variables over a named network preset.
 */

import { z } from "zod";
import { SystemErrors } from "../errors";
import { RANDOM_WORDS_PER_DRAW } from "./types";

// ============================================================================
// SCHEMA
// ============================================================================

/** Smallest-unit amount as bigint, integer or decimal string */
const amountSchema = z
  .union([
    z.bigint().nonnegative(),
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/, "must be a whole number"),
  ])
  .transform((value) => BigInt(value));

const accountSchema = z.string().trim().min(1);

export const RaffleConfigSchema = z
  .object({
    raffleId: z.string().min(1).default("raffle-1"),
    /** Minimum fee per entry, smallest unit */
    entranceFee: amountSchema.refine((value) => value > 0n, {
      message: "must be positive",
    }),
    /** Seeded into custody at deployment and paid to the jackpot winner */
    jackpot: amountSchema.refine((value) => value > 0n, {
      message: "must be positive",
    }),
    durationSeconds: z.coerce.number().int().nonnegative(),
    keepersUpdateIntervalSeconds: z.coerce.number().int().positive().default(30),
    callbackGasLimit: z.coerce.number().int().positive().default(500_000),
    keyHash: z.string().min(1),
    subscriptionId: z.string().min(1),
    requestConfirmations: z.coerce.number().int().min(1).max(200).default(3),
    numWords: z.literal(RANDOM_WORDS_PER_DRAW).default(RANDOM_WORDS_PER_DRAW),
    charities: z.object({
      CHARITY1: accountSchema,
      CHARITY2: accountSchema,
      CHARITY3: accountSchema,
    }),
    funder: accountSchema,
    /** The engine's own custody account on the value ledger */
    raffleAccount: accountSchema,
  })
  .superRefine((config, ctx) => {
    const charities = Object.values(config.charities);
    if (new Set(charities).size !== charities.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["charities"],
        message: "charity accounts must be distinct",
      });
    }
    if (charities.includes(config.raffleAccount)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["raffleAccount"],
        message: "raffle account cannot be a charity",
      });
    }
  });

export type RaffleConfig = z.output<typeof RaffleConfigSchema>;
export type RaffleConfigInput = z.input<typeof RaffleConfigSchema>;

// ============================================================================
// NETWORK PRESETS
// ============================================================================

export type NetworkName = "localhost" | "testnet";

export const NETWORK_PRESETS: Record<NetworkName, RaffleConfigInput> = {
  localhost: {
    raffleId: "localhost-raffle",
    entranceFee: 100_000_000_000_000_000n, // 0.1
    jackpot: 1_000_000_000_000_000_000n, // 1
    durationSeconds: 30,
    keepersUpdateIntervalSeconds: 30,
    callbackGasLimit: 500_000,
    keyHash: "local-gas-lane",
    subscriptionId: "1",
    requestConfirmations: 1,
    charities: {
      CHARITY1: "charity-1",
      CHARITY2: "charity-2",
      CHARITY3: "charity-3",
    },
    funder: "funder",
    raffleAccount: "raffle",
  },
  testnet: {
    raffleId: "testnet-raffle",
    entranceFee: 100_000_000_000_000_000n, // 0.1
    jackpot: 200_000_000_000_000_000n, // 0.2
    durationSeconds: 30,
    keepersUpdateIntervalSeconds: 30,
    callbackGasLimit: 500_000,
    keyHash: "testnet-gas-lane-30",
    subscriptionId: "5864",
    requestConfirmations: 3,
    charities: {
      CHARITY1: "testnet-charity-1",
      CHARITY2: "testnet-charity-2",
      CHARITY3: "testnet-charity-3",
    },
    funder: "testnet-funder",
    raffleAccount: "testnet-raffle",
  },
};

function isNetworkName(value: string): value is NetworkName {
  return value in NETWORK_PRESETS;
}

// ============================================================================
// LOADING
// ============================================================================

/**
 * Validate a raffle config, throwing SYSTEM_VALIDATION_ERROR with one entry
 * per failing field.
 */
export function parseRaffleConfig(input: unknown): RaffleConfig {
  const result = RaffleConfigSchema.safeParse(input);
  if (!result.success) {
    const fields: Record<string, string> = {};
    for (const issue of result.error.issues) {
      fields[issue.path.join(".") || "config"] = issue.message;
    }
    throw SystemErrors.validationError(fields);
  }
  return result.data;
}

type Env = Record<string, string | undefined>;

/**
 * Build the config from `RAFFLE_NETWORK` (default localhost) and any
 * `RAFFLE_*` overrides.
 */
export function loadRaffleConfig(env: Env = process.env): RaffleConfig {
  const networkName = env.RAFFLE_NETWORK ?? "localhost";
  if (!isNetworkName(networkName)) {
    throw SystemErrors.validationError({
      RAFFLE_NETWORK: `unknown network "${networkName}"`,
    });
  }
  const preset = NETWORK_PRESETS[networkName];

  return parseRaffleConfig({
    ...preset,
    raffleId: env.RAFFLE_ID ?? preset.raffleId,
    entranceFee: env.RAFFLE_ENTRANCE_FEE ?? preset.entranceFee,
    jackpot: env.RAFFLE_JACKPOT ?? preset.jackpot,
    durationSeconds: env.RAFFLE_DURATION_SECONDS ?? preset.durationSeconds,
    keepersUpdateIntervalSeconds:
      env.RAFFLE_KEEPERS_UPDATE_INTERVAL ?? preset.keepersUpdateIntervalSeconds,
    callbackGasLimit: env.RAFFLE_CALLBACK_GAS_LIMIT ?? preset.callbackGasLimit,
    keyHash: env.RAFFLE_KEY_HASH ?? preset.keyHash,
    subscriptionId: env.RAFFLE_SUBSCRIPTION_ID ?? preset.subscriptionId,
    requestConfirmations:
      env.RAFFLE_REQUEST_CONFIRMATIONS ?? preset.requestConfirmations,
    charities: {
      CHARITY1: env.RAFFLE_CHARITY1 ?? preset.charities.CHARITY1,
      CHARITY2: env.RAFFLE_CHARITY2 ?? preset.charities.CHARITY2,
      CHARITY3: env.RAFFLE_CHARITY3 ?? preset.charities.CHARITY3,
    },
    funder: env.RAFFLE_FUNDER ?? preset.funder,
    raffleAccount: env.RAFFLE_ACCOUNT ?? preset.raffleAccount,
  });
}
