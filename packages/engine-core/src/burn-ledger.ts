// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/burn-ledger`
 * Purpose: Per-account record of tokens sent to the burn sink, weighting the burn reward pool.
 * Scope: Bookkeeping and staging only. Token movement to the sink happens on the ledger.
 * Invariants:
 * - First contribution appends the account (1-based index); later ones only accumulate
 * - contributionOf(a) is monotone non-decreasing; total() === sum of contributions
 * - A contribution exists only for an indexed account
 * Side-effects: none
 * @public
 */

import type { Account } from "@dualpool/ids";

import type { BurnContribution } from "./model";
import { Roster, RosterOverlay, type RosterReader } from "./roster";

export interface BurnLedgerReader {
  readonly roster: RosterReader;
  contributionOf(account: Account): bigint;
  total(): bigint;
}

function checkAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new RangeError(`Negative burn contribution: ${amount}`);
  }
}

export class BurnLedger implements BurnLedgerReader {
  private readonly entries = new Roster();
  private readonly contributions = new Map<Account, bigint>();
  private totalContributed = 0n;

  get roster(): RosterReader {
    return this.entries;
  }

  contributionOf(account: Account): bigint {
    return this.contributions.get(account) ?? 0n;
  }

  total(): bigint {
    return this.totalContributed;
  }

  addBurnContribution(account: Account, amount: bigint): void {
    checkAmount(amount);
    if (amount === 0n) {
      return;
    }
    this.entries.append(account);
    this.contributions.set(account, this.contributionOf(account) + amount);
    this.totalContributed += amount;
  }

  stage(): BurnLedgerDraft {
    return new BurnLedgerDraft(this, new RosterOverlay(this.entries));
  }
}

export class BurnLedgerDraft implements BurnLedgerReader {
  private readonly staged: BurnContribution[] = [];
  private readonly deltas = new Map<Account, bigint>();
  private totalDelta = 0n;

  constructor(
    private readonly base: BurnLedger,
    private readonly overlay: RosterOverlay
  ) {}

  get roster(): RosterReader {
    return this.overlay;
  }

  contributionOf(account: Account): bigint {
    return this.base.contributionOf(account) + (this.deltas.get(account) ?? 0n);
  }

  total(): bigint {
    return this.base.total() + this.totalDelta;
  }

  addBurnContribution(account: Account, amount: bigint): void {
    checkAmount(amount);
    if (amount === 0n) {
      return;
    }
    this.overlay.append(account);
    this.deltas.set(account, (this.deltas.get(account) ?? 0n) + amount);
    this.totalDelta += amount;
    this.staged.push({ account, amount });
  }

  contributions(): readonly BurnContribution[] {
    return this.staged;
  }

  commit(): void {
    for (const { account, amount } of this.staged) {
      this.base.addBurnContribution(account, amount);
    }
  }
}
