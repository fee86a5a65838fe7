// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/overlay`
 * Purpose: Pending-operation layer over a LedgerReader. Validates each operation against the balances
 *   it would see after every earlier pending operation, without touching the underlying ledger.
 * Scope: Pure in-memory bookkeeping. Does not commit anything.
 * Invariants:
 * - Reads through the overlay equal base reads plus the net effect of accepted operations
 * - A rejected operation leaves the overlay unchanged
 * - Amounts are non-negative bigint
 * Side-effects: none
 * Links: InMemoryLedger.applyBatch, engine-core EngineDraft
 * @public
 */

import type { Account } from "@dualpool/ids";
import { NULL_ACCOUNT } from "@dualpool/ids/well-known";

import {
  InsufficientAllowanceError,
  InsufficientBalanceError,
  NullAccountError,
} from "./errors";
import type { LedgerOperation, LedgerReader } from "./ports";

function allowanceKey(owner: Account, spender: Account): string {
  return `${owner}:${spender}`;
}

export class LedgerOverlay implements LedgerReader {
  private readonly balanceDeltas = new Map<Account, bigint>();
  private readonly allowanceSpent = new Map<string, bigint>();
  private readonly accepted: LedgerOperation[] = [];

  constructor(private readonly base: LedgerReader) {}

  balanceOf = (account: Account): bigint =>
    this.base.balanceOf(account) + (this.balanceDeltas.get(account) ?? 0n);

  totalSupply = (): bigint => this.base.totalSupply();

  allowance = (owner: Account, spender: Account): bigint =>
    this.base.allowance(owner, spender) -
    (this.allowanceSpent.get(allowanceKey(owner, spender)) ?? 0n);

  /** Validates and records one operation. Throws without recording on any violation. */
  push(operation: LedgerOperation): void {
    if (operation.amount < 0n) {
      throw new RangeError(
        `Negative amount in ${operation.kind}: ${operation.amount}`
      );
    }

    if (operation.kind === "spendAllowance") {
      if (
        operation.owner === NULL_ACCOUNT ||
        operation.spender === NULL_ACCOUNT
      ) {
        throw new NullAccountError("spendAllowance");
      }
      const available = this.allowance(operation.owner, operation.spender);
      if (available < operation.amount) {
        throw new InsufficientAllowanceError(
          operation.owner,
          operation.spender,
          available,
          operation.amount
        );
      }
      const key = allowanceKey(operation.owner, operation.spender);
      this.allowanceSpent.set(
        key,
        (this.allowanceSpent.get(key) ?? 0n) + operation.amount
      );
      this.accepted.push(operation);
      return;
    }

    if (operation.from === NULL_ACCOUNT || operation.to === NULL_ACCOUNT) {
      throw new NullAccountError("transfer");
    }
    const balance = this.balanceOf(operation.from);
    if (balance < operation.amount) {
      throw new InsufficientBalanceError(
        operation.from,
        balance,
        operation.amount
      );
    }
    this.shift(operation.from, -operation.amount);
    this.shift(operation.to, operation.amount);
    this.accepted.push(operation);
  }

  operations(): readonly LedgerOperation[] {
    return this.accepted;
  }

  private shift(account: Account, delta: bigint): void {
    this.balanceDeltas.set(
      account,
      (this.balanceDeltas.get(account) ?? 0n) + delta
    );
  }
}
