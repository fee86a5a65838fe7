// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/adapters/in-memory-pair`
 * Purpose: In-process stand-in for the AMM pair's receipt token (WeightSourcePort).
 * Scope: Tracks receipt-token balances and supply. Does not model reserves or pricing.
 * Invariants: totalSupply === sum of balances.
 * Side-effects: none (process memory only)
 * Links: ports/weight-source.port.ts
 * @public
 */

import type { Account } from "@dualpool/ids";

import type { WeightSourcePort } from "../ports";

export class InMemoryPair implements WeightSourcePort {
  private readonly balances = new Map<Account, bigint>();
  private supply = 0n;

  constructor(private readonly account: Account) {}

  pairAccount = (): Account => this.account;

  balanceOf = (account: Account): bigint => this.balances.get(account) ?? 0n;

  totalSupply = (): bigint => this.supply;

  /** Sets a provider's receipt-token balance, adjusting supply by the difference. */
  setBalance(account: Account, amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`Negative receipt balance: ${amount}`);
    }
    this.supply += amount - this.balanceOf(account);
    if (amount === 0n) {
      this.balances.delete(account);
    } else {
      this.balances.set(account, amount);
    }
  }
}
