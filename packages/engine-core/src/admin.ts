// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/admin`
 * Purpose: Single-owner administrative surface over the engine's live settings.
 * Scope: Guarded setters and ownership transfer. Does not move tokens.
 * Invariants:
 * - OWNER_ONLY: every operation checks the caller first; a rejected call changes nothing
 * - After renounceOwnership no caller passes the guard
 * - FEE_SUM_BOUNDED: setFeeRates rejects rate sums above 1000 (no clamping)
 * - Out-of-range values are rejected with InvalidSettingError before anything changes
 * - setPair swaps the pair account and its receipt-token source together
 * - A replaced treasury loses the fee exemption it had as treasury
 * Side-effects: mutates the EngineSettings object it was given; rebinds the engine's weight source
 * @public
 */

import type { Account, UnixSeconds } from "@dualpool/ids";
import { NULL_ACCOUNT } from "@dualpool/ids/well-known";
import {
  NullAccountError,
  type WeightSourcePort,
} from "@dualpool/token-ledger";

import type { EngineSettings } from "./config";
import {
  FeeOverflowError,
  InvalidSettingError,
  NotOwnerError,
} from "./errors";
import { rateSum } from "./fee-splitter";
import type { LoggerLike } from "./logger";
import type { DistributorSettings, FeeRates, PoolId } from "./model";

function checkRate(name: string, rate: number): void {
  if (!Number.isInteger(rate) || rate < 0 || rate > 1000) {
    throw new InvalidSettingError(
      name,
      `${name} must be an integer in 0..1000: ${rate}`
    );
  }
}

export class AdminController {
  private currentOwner: Account | null;

  constructor(
    owner: Account,
    private readonly settings: EngineSettings,
    private readonly logger: LoggerLike,
    private readonly rebindPair: (source: WeightSourcePort) => void
  ) {
    this.currentOwner = owner;
  }

  owner(): Account | null {
    return this.currentOwner;
  }

  setFeeRates(caller: Account, rates: FeeRates): void {
    this.guard(caller, "setFeeRates");
    checkRate("lpRate", rates.lpRate);
    checkRate("burnRate", rates.burnRate);
    checkRate("burnLpRate", rates.burnLpRate);
    checkRate("fundRate", rates.fundRate);
    const sum = rateSum(rates);
    if (sum > 1000) {
      throw new FeeOverflowError(
        `Fee rates sum to ${sum}/1000; at most 1000 is allowed`
      );
    }
    this.settings.rates = { ...rates };
    this.logger.info({ ...rates }, "Fee rates updated");
  }

  setFeeExempt(caller: Account, account: Account, exempt: boolean): void {
    this.guard(caller, "setFeeExempt");
    if (exempt) {
      this.settings.feeExempt.add(account);
    } else {
      this.settings.feeExempt.delete(account);
    }
    this.logger.info({ account, exempt }, "Fee exemption updated");
  }

  setRewardExcluded(caller: Account, account: Account, excluded: boolean): void {
    this.guard(caller, "setRewardExcluded");
    if (excluded) {
      this.settings.rewardExcluded.add(account);
    } else {
      this.settings.rewardExcluded.delete(account);
    }
    this.logger.info({ account, excluded }, "Reward exclusion updated");
  }

  setDistributor(
    caller: Account,
    pool: PoolId,
    patch: Partial<DistributorSettings>
  ): void {
    this.guard(caller, "setDistributor");
    const next = { ...this.settings.distributors[pool], ...patch };
    if (next.threshold <= 0n) {
      throw new InvalidSettingError(
        "threshold",
        `${pool} threshold must be positive`
      );
    }
    if (next.minWeight < 0n) {
      throw new InvalidSettingError(
        "minWeight",
        `${pool} minWeight must not be negative`
      );
    }
    if (!Number.isSafeInteger(next.cooldownSeconds) || next.cooldownSeconds < 0) {
      throw new InvalidSettingError(
        "cooldownSeconds",
        `${pool} cooldownSeconds must be a non-negative integer`
      );
    }
    this.settings.distributors[pool] = next;
    this.logger.info(
      {
        pool,
        threshold: next.threshold.toString(),
        minWeight: next.minWeight.toString(),
        cooldownSeconds: next.cooldownSeconds,
      },
      "Distributor settings updated"
    );
  }

  setBatchSize(caller: Account, batchSize: number): void {
    this.guard(caller, "setBatchSize");
    if (!Number.isSafeInteger(batchSize) || batchSize < 1) {
      throw new InvalidSettingError(
        "batchSize",
        `batchSize must be a positive integer: ${batchSize}`
      );
    }
    this.settings.batchSize = batchSize;
    this.logger.info({ batchSize }, "Batch size updated");
  }

  setLaunchTime(caller: Account, launchTime: UnixSeconds): void {
    this.guard(caller, "setLaunchTime");
    this.settings.launchTime = launchTime;
    this.logger.info({ launchTime }, "Launch time updated");
  }

  setTreasury(caller: Account, treasury: Account): void {
    this.guard(caller, "setTreasury");
    this.requireAccount(treasury, "setTreasury");
    const previous = this.settings.accounts.treasury;
    if (previous !== treasury && !this.isProtocolAccount(previous)) {
      this.settings.feeExempt.delete(previous);
    }
    this.settings.accounts.treasury = treasury;
    this.settings.feeExempt.add(treasury);
    this.logger.info({ previous, treasury }, "Treasury updated");
  }

  /** Moves trading to another pair; LP admission and weights then read its receipt token. */
  setPair(caller: Account, source: WeightSourcePort): void {
    this.guard(caller, "setPair");
    const pair = source.pairAccount();
    this.requireAccount(pair, "setPair");
    this.settings.accounts.pair = pair;
    this.settings.rewardExcluded.add(pair);
    this.rebindPair(source);
    this.logger.info({ pair }, "Pair updated");
  }

  transferOwnership(caller: Account, next: Account): void {
    this.guard(caller, "transferOwnership");
    this.requireAccount(next, "transferOwnership");
    this.currentOwner = next;
    this.logger.info({ previous: caller, next }, "Ownership transferred");
  }

  renounceOwnership(caller: Account): void {
    this.guard(caller, "renounceOwnership");
    this.currentOwner = null;
    this.logger.info({ previous: caller }, "Ownership renounced");
  }

  private guard(caller: Account, operation: string): void {
    if (this.currentOwner === null || caller !== this.currentOwner) {
      throw new NotOwnerError(caller, operation);
    }
  }

  // The owner and the engine's own accounts stay exempt whatever role they held
  private isProtocolAccount(account: Account): boolean {
    const { engine, lpRewardPool, burnRewardPool } = this.settings.accounts;
    return (
      account === this.currentOwner ||
      account === engine ||
      account === lpRewardPool ||
      account === burnRewardPool
    );
  }

  private requireAccount(account: Account, operation: string): void {
    if (account === NULL_ACCOUNT) {
      throw new NullAccountError(operation);
    }
  }
}
