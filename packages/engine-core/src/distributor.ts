// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/distributor`
 * Purpose: Resumable round-robin payout scan over a roster, bounded by an explicit iteration budget.
 * Scope: Plans payouts onto a LedgerOverlay and returns the next cursor. One instance per reward pool.
 * Invariants:
 * - BUDGET_BOUNDED: one run visits at most min(budget, roster length) accounts
 * - CURSOR_ADVANCES: the cursor moves one position per visited account (mod length), paid or not
 * - POOL_CAPPED: one run pays out at most `threshold`, however large the pool balance is
 * - Payout = floor(threshold * weight / totalWeight); sum of payouts ≤ threshold
 * - Empty roster, cooldown, zero total weight and pool below threshold are silent no-ops
 * Side-effects: none
 * @public
 */

import type { Account, UnixSeconds } from "@dualpool/ids";
import type { LedgerOverlay } from "@dualpool/token-ledger";

import type {
  DistributorCursor,
  DistributorSettings,
  Payout,
  PoolId,
} from "./model";
import type { RosterReader } from "./roster";

/** What a distributor scans: a roster and how to weigh its members. */
export interface WeightedRoster {
  readonly roster: RosterReader;
  weightOf(account: Account): bigint;
  totalWeight(): bigint;
}

export interface DistributionContext {
  /** Pool balance reads and payout transfers */
  readonly ledger: LedgerOverlay;
  readonly now: UnixSeconds;
  isExcluded(account: Account): boolean;
}

export type SkipReason =
  | "empty_roster"
  | "cooldown"
  | "zero_weight"
  | "below_threshold";

export interface DistributionPlan {
  readonly payouts: readonly Payout[];
  readonly visited: number;
  readonly cursor: DistributorCursor;
  readonly skipped: SkipReason | null;
}

export const INITIAL_CURSOR: DistributorCursor = {
  position: 0,
  lastRunAt: null,
};

export class RewardDistributor {
  private persisted: DistributorCursor = INITIAL_CURSOR;

  constructor(
    readonly pool: PoolId,
    private readonly poolAccount: () => Account,
    private readonly settings: () => DistributorSettings
  ) {}

  cursor(): DistributorCursor {
    return this.persisted;
  }

  restore(cursor: DistributorCursor): void {
    this.persisted = cursor;
  }

  /** Plans and persists one run. Payouts land on `ctx.ledger`. */
  run(
    source: WeightedRoster,
    ctx: DistributionContext,
    budget: number
  ): DistributionPlan {
    const plan = this.plan(source, ctx, budget, this.persisted);
    this.persisted = plan.cursor;
    return plan;
  }

  /**
   * Plan one bounded scan starting from `from`. Pushes payouts onto `ctx.ledger`
   * and returns the cursor to persist; does not touch this instance's state.
   */
  plan(
    source: WeightedRoster,
    ctx: DistributionContext,
    budget: number,
    from: DistributorCursor
  ): DistributionPlan {
    if (!Number.isSafeInteger(budget) || budget < 1) {
      throw new RangeError(
        `Distribution budget must be a positive integer: ${budget}`
      );
    }

    const skip = (skipped: SkipReason): DistributionPlan => ({
      payouts: [],
      visited: 0,
      cursor: from,
      skipped,
    });

    const { threshold, minWeight, cooldownSeconds } = this.settings();
    const length = source.roster.length;
    if (length === 0) {
      return skip("empty_roster");
    }
    if (
      cooldownSeconds > 0 &&
      from.lastRunAt !== null &&
      ctx.now < from.lastRunAt + cooldownSeconds
    ) {
      return skip("cooldown");
    }
    const totalWeight = source.totalWeight();
    if (totalWeight === 0n) {
      return skip("zero_weight");
    }
    const pool = this.poolAccount();
    if (threshold === 0n || ctx.ledger.balanceOf(pool) < threshold) {
      return skip("below_threshold");
    }

    const payouts: Payout[] = [];
    const limit = Math.min(budget, length);
    let position = from.position >= length ? 0 : from.position;
    let visited = 0;

    while (visited < limit) {
      const account = source.roster.at(position);
      const weight = source.weightOf(account);
      if (weight >= minWeight && !ctx.isExcluded(account)) {
        const amount = (threshold * weight) / totalWeight;
        if (amount > 0n) {
          ctx.ledger.push({ kind: "transfer", from: pool, to: account, amount });
          payouts.push({ pool: this.pool, account, amount });
        }
      }
      position = (position + 1) % length;
      visited += 1;
    }

    return {
      payouts,
      visited,
      cursor: { position, lastRunAt: ctx.now },
      skipped: null,
    };
  }
}
