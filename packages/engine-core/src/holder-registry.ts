// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/holder-registry`
 * Purpose: Roster of liquidity providers eligible for LP rewards.
 * Scope: Admission rules and staging. Weights are read live from the weight source by the distributor, not stored here.
 * Invariants:
 * - REGISTRY_IDEMPOTENT: admitting an indexed account is a no-op
 * - Excluded and code-bearing accounts are never admitted
 * - Entries are never removed (exclusion only stops payouts)
 * Side-effects: none
 * @public
 */

import type { Account } from "@dualpool/ids";

import {
  type MutableRoster,
  Roster,
  RosterOverlay,
  type RosterReader,
} from "./roster";

export interface HolderRegistryDeps {
  isExcluded: (account: Account) => boolean;
  hasCode: (account: Account) => boolean;
}

function admit(
  roster: MutableRoster,
  account: Account,
  deps: HolderRegistryDeps
): boolean {
  if (
    roster.indexOf(account) > 0 ||
    deps.isExcluded(account) ||
    deps.hasCode(account)
  ) {
    return false;
  }
  roster.append(account);
  return true;
}

export class HolderRegistry {
  private readonly entries = new Roster();

  constructor(private readonly deps: HolderRegistryDeps) {}

  get roster(): RosterReader {
    return this.entries;
  }

  /** Returns true when the account was appended. */
  addHolder(account: Account): boolean {
    return admit(this.entries, account, this.deps);
  }

  stage(): HolderRegistryDraft {
    return new HolderRegistryDraft(new RosterOverlay(this.entries), this.deps);
  }
}

export class HolderRegistryDraft {
  constructor(
    private readonly overlay: RosterOverlay,
    private readonly deps: HolderRegistryDeps
  ) {}

  get roster(): RosterReader {
    return this.overlay;
  }

  addHolder(account: Account): boolean {
    return admit(this.overlay, account, this.deps);
  }

  added(): readonly Account[] {
    return this.overlay.appended();
  }

  commit(): void {
    this.overlay.commit();
  }
}
