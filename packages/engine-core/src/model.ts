// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/model`
 * Purpose: Domain types and enums for the transfer engine.
 * Scope: Pure types. Does not contain business logic or perform I/O.
 * Invariants: All token amounts are bigint (no floating point); fee rates are parts-per-thousand integers.
 * Side-effects: none
 * @public
 */

import type { Account, UnixSeconds } from "@dualpool/ids";

/** Reward pools, one distributor each */
export const POOL_IDS = ["lp", "burn"] as const;
export type PoolId = (typeof POOL_IDS)[number];

/** Transfer classes relative to the AMM pair */
export const TRANSFER_CLASSES = ["sell", "buy", "plain"] as const;
export type TransferClass = (typeof TRANSFER_CLASSES)[number];

/** Fee components in forwarding order */
export const FEE_COMPONENTS = ["lp", "burn", "burnLp", "fund"] as const;
export type FeeComponent = (typeof FEE_COMPONENTS)[number];

export const FEE_DENOMINATOR = 1000n;

/** Fee rates in parts-per-thousand */
export interface FeeRates {
  readonly lpRate: number;
  readonly burnRate: number;
  readonly burnLpRate: number;
  readonly fundRate: number;
}

export interface FeeBreakdown {
  readonly lpFee: bigint;
  readonly burnFee: bigint;
  readonly burnLpFee: bigint;
  readonly fundFee: bigint;
  readonly totalFee: bigint;
  /** Amount the recipient receives */
  readonly net: bigint;
}

export interface DistributorSettings {
  /** Pool balance that triggers a round; also the cap paid per round */
  readonly threshold: bigint;
  /** Minimum weight an account needs to be paid */
  readonly minWeight: bigint;
  /** Seconds that must pass after a run before the next one (0 = none) */
  readonly cooldownSeconds: number;
}

/** Persisted scan position of one distributor */
export interface DistributorCursor {
  readonly position: number;
  readonly lastRunAt: UnixSeconds | null;
}

export interface LockAllocation {
  readonly beneficiary: Account;
  readonly total: bigint;
  readonly cycleDays: number;
  readonly released: bigint;
}

export interface Payout {
  readonly pool: PoolId;
  readonly account: Account;
  readonly amount: bigint;
}

export interface Release {
  readonly beneficiary: Account;
  readonly amount: bigint;
}

export interface BurnContribution {
  readonly account: Account;
  readonly amount: bigint;
}

/** Everything one committed transfer did */
export interface TransferReceipt {
  readonly from: Account;
  readonly to: Account;
  readonly amount: bigint;
  readonly spender: Account | null;
  readonly transferClass: TransferClass;
  readonly fees: FeeBreakdown;
  readonly holdersAdded: readonly Account[];
  readonly burnContributions: readonly BurnContribution[];
  /** Distributor selected by the alternation flag, or null when the call did not qualify */
  readonly distributor: PoolId | null;
  readonly payouts: readonly Payout[];
  readonly releases: readonly Release[];
}
