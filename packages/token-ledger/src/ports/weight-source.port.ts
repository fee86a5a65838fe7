// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/ports/weight-source`
 * Purpose: Read-only view of the AMM pair and the receipt token it issues to liquidity providers.
 * Scope: Identity and weight queries only. The engine never swaps or moves liquidity through this port.
 * Invariants: totalSupply() ≥ balanceOf(a) for every account a.
 * Side-effects: none (interface definition only)
 * Links: InMemoryPair
 * @public
 */

import type { Account } from "@dualpool/ids";

export interface WeightSourcePort {
  /** Ledger account of the pair itself (the counterparty of buys and sells). */
  pairAccount: () => Account;
  balanceOf: (account: Account) => bigint;
  totalSupply: () => bigint;
}
