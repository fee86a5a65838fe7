// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/genesis`
 * Purpose: Initial issuance: mints opening balances and funds the engine account with every locked allocation.
 * Scope: One-shot setup against a fresh ledger. Not part of the transfer path.
 * Invariants: After mintGenesis, engine account balance ≥ sum of lock totals.
 * Side-effects: mints on the given ledger; returns any listener failures the mints raised
 * @public
 */

import type { Account } from "@dualpool/ids";
import type { LedgerPort, ListenerFailure } from "@dualpool/token-ledger";

import type { EngineConfig } from "./config";

export interface OpeningBalance {
  readonly account: Account;
  readonly amount: bigint;
}

export function lockedTotal(config: EngineConfig): bigint {
  return (config.vesting?.allocations ?? []).reduce(
    (sum, allocation) => sum + allocation.amount,
    0n
  );
}

export function mintGenesis(
  ledger: LedgerPort,
  config: EngineConfig,
  balances: readonly OpeningBalance[]
): readonly ListenerFailure[] {
  const failures: ListenerFailure[] = [];
  for (const { account, amount } of balances) {
    failures.push(...ledger.mint(account, amount));
  }
  const locked = lockedTotal(config);
  if (locked > 0n) {
    failures.push(...ledger.mint(config.accounts.engine, locked));
  }
  return failures;
}
