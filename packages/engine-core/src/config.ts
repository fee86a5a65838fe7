// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/config`
 * Purpose: Engine configuration schema with Zod validation, and the mutable settings the admin surface edits.
 * Scope: Parsing and defaults. Does not read files or env vars.
 * Invariants:
 * - Accounts are checksummed at parse time (toAccount)
 * - Amounts are decimal strings or safe integers, parsed to bigint
 * - FEE_SUM_BOUNDED: fee rates summing above 1000 are rejected, never clamped
 * - Distributor thresholds are positive
 * Side-effects: none
 * @public
 */

import {
  type Account,
  toAccount,
  toUnixSeconds,
  type UnixSeconds,
} from "@dualpool/ids";
import { SINK_ACCOUNT } from "@dualpool/ids/well-known";
import { z } from "zod";

import { rateSum } from "./fee-splitter";
import type { DistributorSettings, FeeRates, PoolId } from "./model";

export const AccountSchema = z.string().transform((raw, ctx): Account => {
  try {
    return toAccount(raw);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

export const AmountSchema = z
  .union([
    z.string().regex(/^\d+$/, "Amount must be a non-negative decimal string"),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  ])
  .transform((raw) => BigInt(raw));

export const TimestampSchema = z
  .number()
  .int()
  .nonnegative()
  .transform((raw): UnixSeconds => toUnixSeconds(raw));

const RateSchema = z.number().int().min(0).max(1000);

export const FeeRatesSchema = z
  .object({
    lpRate: RateSchema,
    burnRate: RateSchema,
    burnLpRate: RateSchema,
    fundRate: RateSchema,
  })
  .refine((rates) => rateSum(rates) <= 1000, {
    message: "Fee rates must sum to at most 1000 parts per thousand",
  });

const DistributorSchema = z.object({
  threshold: AmountSchema.refine((v) => v > 0n, "threshold must be positive"),
  minWeight: AmountSchema.default("0"),
  cooldownSeconds: z.number().int().nonnegative().default(0),
});

export const EngineConfigSchema = z.object({
  owner: AccountSchema,
  accounts: z.object({
    /** The token's own account; holds locked allocations */
    engine: AccountSchema,
    lpRewardPool: AccountSchema,
    burnRewardPool: AccountSchema,
    treasury: AccountSchema,
  }),
  fees: FeeRatesSchema,
  launchTime: TimestampSchema,
  feeExempt: z.array(AccountSchema).default([]),
  rewardExcluded: z.array(AccountSchema).default([]),
  distribution: z.object({
    /** Accounts one distributor run may visit */
    batchSize: z.number().int().positive().default(50),
    lp: DistributorSchema,
    burn: DistributorSchema,
  }),
  vesting: z
    .object({
      startTime: TimestampSchema,
      allocations: z
        .array(
          z.object({
            beneficiary: AccountSchema,
            amount: AmountSchema,
            cycleDays: z.number().int().positive(),
          })
        )
        .default([]),
    })
    .optional(),
});

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type EngineConfig = z.output<typeof EngineConfigSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => `  ${e.path.join(".")}: ${e.message}`)
    .join("\n");
}

/**
 * Parses raw engine configuration.
 * Throws on invalid config listing every failing path.
 */
export function parseEngineConfig(raw: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(
      `Invalid engine configuration:\n${formatIssues(result.error)}`
    );
  }
  return result.data;
}

export interface EngineAccounts {
  engine: Account;
  lpRewardPool: Account;
  burnRewardPool: Account;
  treasury: Account;
  pair: Account;
}

/** Live, admin-editable settings. Read through getters so edits take effect on the next call. */
export interface EngineSettings {
  accounts: EngineAccounts;
  rates: FeeRates;
  launchTime: UnixSeconds;
  vestingStart: UnixSeconds;
  batchSize: number;
  distributors: Record<PoolId, DistributorSettings>;
  feeExempt: Set<Account>;
  rewardExcluded: Set<Account>;
}

export function settingsFromConfig(
  config: EngineConfig,
  pair: Account
): EngineSettings {
  const { engine, lpRewardPool, burnRewardPool, treasury } = config.accounts;
  return {
    accounts: { engine, lpRewardPool, burnRewardPool, treasury, pair },
    rates: { ...config.fees },
    launchTime: config.launchTime,
    vestingStart: config.vesting?.startTime ?? config.launchTime,
    batchSize: config.distribution.batchSize,
    distributors: {
      lp: { ...config.distribution.lp },
      burn: { ...config.distribution.burn },
    },
    // Protocol accounts and the owner never pay fees
    feeExempt: new Set([
      config.owner,
      engine,
      lpRewardPool,
      burnRewardPool,
      treasury,
      ...config.feeExempt,
    ]),
    // Pools, the pair and the sink never earn rewards
    rewardExcluded: new Set([
      SINK_ACCOUNT,
      engine,
      lpRewardPool,
      burnRewardPool,
      pair,
      ...config.rewardExcluded,
    ]),
  };
}
