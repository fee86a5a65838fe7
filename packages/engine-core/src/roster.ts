// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/roster`
 * Purpose: Append-only account roster with a 1-based presence index, plus an overlay that stages appends.
 * Scope: Pure in-memory collections. Used by HolderRegistry and BurnLedger.
 * Invariants:
 * - ROSTER_APPEND_ONLY: entries are never removed or reordered
 * - indexOf(a) === 0 iff a is absent; otherwise at(indexOf(a) - 1) === a
 * - No duplicates: appending a present account returns its existing index
 * - An overlay's commit() appends its staged entries to the base in staging order
 * Side-effects: none
 * @public
 */

import type { Account } from "@dualpool/ids";

export interface RosterReader {
  readonly length: number;
  /** 0-based position */
  at(position: number): Account;
  /** 1-based index, 0 when absent */
  indexOf(account: Account): number;
}

export interface MutableRoster extends RosterReader {
  /** Returns the account's 1-based index, appending it first when absent. */
  append(account: Account): number;
}

export class Roster implements MutableRoster {
  private readonly entries: Account[] = [];
  private readonly positions = new Map<Account, number>();

  get length(): number {
    return this.entries.length;
  }

  at(position: number): Account {
    const account = this.entries[position];
    if (account === undefined) {
      throw new RangeError(
        `Roster position ${position} out of range (length ${this.entries.length})`
      );
    }
    return account;
  }

  indexOf(account: Account): number {
    return this.positions.get(account) ?? 0;
  }

  append(account: Account): number {
    const existing = this.indexOf(account);
    if (existing > 0) {
      return existing;
    }
    this.entries.push(account);
    this.positions.set(account, this.entries.length);
    return this.entries.length;
  }
}

export class RosterOverlay implements MutableRoster {
  private readonly staged: Account[] = [];

  constructor(private readonly base: Roster) {}

  get length(): number {
    return this.base.length + this.staged.length;
  }

  at(position: number): Account {
    if (position < this.base.length) {
      return this.base.at(position);
    }
    const account = this.staged[position - this.base.length];
    if (account === undefined) {
      throw new RangeError(
        `Roster position ${position} out of range (length ${this.length})`
      );
    }
    return account;
  }

  indexOf(account: Account): number {
    const committed = this.base.indexOf(account);
    if (committed > 0) {
      return committed;
    }
    const staged = this.staged.indexOf(account);
    return staged === -1 ? 0 : this.base.length + staged + 1;
  }

  append(account: Account): number {
    const existing = this.indexOf(account);
    if (existing > 0) {
      return existing;
    }
    this.staged.push(account);
    return this.length;
  }

  appended(): readonly Account[] {
    return this.staged;
  }

  commit(): void {
    for (const account of this.staged) {
      this.base.append(account);
    }
  }
}
