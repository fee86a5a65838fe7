// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/vesting`
 * Purpose: Linear day-based release of locked allocations held by the engine account.
 * Scope: Plans releases onto a LedgerOverlay and returns the next schedule state.
 * Invariants:
 * - released(d) = floor(total * min(d, cycleDays) / cycleDays); monotone in d; released(cycleDays) = total
 * - Evaluation only happens when elapsed days exceed the release cursor; re-checking the same day pays nothing
 * - Before the start time the schedule is a no-op
 * Side-effects: none
 * @public
 */

import type { Account, UnixSeconds } from "@dualpool/ids";
import type { LedgerOverlay } from "@dualpool/token-ledger";

import { diffDays } from "./calendar";
import type { LockAllocation, Release } from "./model";

export interface LockAllocationSeed {
  readonly beneficiary: Account;
  readonly total: bigint;
  readonly cycleDays: number;
}

export interface VestingState {
  readonly locks: readonly LockAllocation[];
  /** Elapsed-day count at the last evaluation */
  readonly releaseCursor: number;
}

export interface VestingPlan {
  readonly releases: readonly Release[];
  readonly state: VestingState;
}

/** Amount unlocked after `elapsedDays` for an allocation. */
export function releasedAfter(
  total: bigint,
  cycleDays: number,
  elapsedDays: number
): bigint {
  const capped = Math.min(elapsedDays, cycleDays);
  return (total * BigInt(capped)) / BigInt(cycleDays);
}

export class VestingSchedule {
  private persisted: VestingState;

  constructor(
    seeds: readonly LockAllocationSeed[],
    private readonly startTime: () => UnixSeconds,
    private readonly payer: () => Account
  ) {
    for (const seed of seeds) {
      if (!Number.isSafeInteger(seed.cycleDays) || seed.cycleDays < 1) {
        throw new RangeError(
          `Release cycle for ${seed.beneficiary} must be a positive whole number of days: ${seed.cycleDays}`
        );
      }
      if (seed.total < 0n) {
        throw new RangeError(`Negative lock total for ${seed.beneficiary}`);
      }
    }
    this.persisted = {
      locks: seeds.map((seed) => ({ ...seed, released: 0n })),
      releaseCursor: 0,
    };
  }

  state(): VestingState {
    return this.persisted;
  }

  restore(state: VestingState): void {
    this.persisted = state;
  }

  /** Plans and persists one evaluation. Releases land on `ledger`. */
  processLock(ledger: LedgerOverlay, now: UnixSeconds): readonly Release[] {
    const plan = this.plan(ledger, now, this.persisted);
    this.persisted = plan.state;
    return plan.releases;
  }

  plan(
    ledger: LedgerOverlay,
    now: UnixSeconds,
    from: VestingState
  ): VestingPlan {
    const start = this.startTime();
    if (now < start) {
      return { releases: [], state: from };
    }
    const elapsed = diffDays(start, now);
    if (elapsed <= from.releaseCursor) {
      return { releases: [], state: from };
    }

    const payer = this.payer();
    const releases: Release[] = [];
    const locks = from.locks.map((lock) => {
      if (lock.released >= lock.total) {
        return lock;
      }
      const target = releasedAfter(lock.total, lock.cycleDays, elapsed);
      if (target <= lock.released) {
        return lock;
      }
      const amount = target - lock.released;
      ledger.push({
        kind: "transfer",
        from: payer,
        to: lock.beneficiary,
        amount,
      });
      releases.push({ beneficiary: lock.beneficiary, amount });
      return { ...lock, released: target };
    });

    return { releases, state: { locks, releaseCursor: elapsed } };
  }
}
