// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/adapters/in-memory-ledger`
 * Purpose: In-process LedgerPort implementation: balance map, allowance map, supply, mint/burn, notifications.
 * Scope: Bookkeeping only. Knows nothing about fees or rewards.
 * Invariants:
 * - Sum of balances === totalSupply at all times
 * - applyBatch validates the whole batch through a LedgerOverlay before mutating anything
 * - Listeners run after the batch has landed, in operation order
 * - Every listener hears every notification; listener errors are collected, never rethrown
 * Side-effects: none (process memory only)
 * Links: ports/ledger.port.ts
 * @public
 */

import type { Account } from "@dualpool/ids";
import { NULL_ACCOUNT } from "@dualpool/ids/well-known";

import { InsufficientBalanceError, NullAccountError } from "../errors";
import { LedgerOverlay } from "../overlay";
import type {
  LedgerOperation,
  LedgerPort,
  ListenerFailure,
  TransferListener,
  TransferNotification,
} from "../ports";

export class InMemoryLedger implements LedgerPort {
  private readonly balances = new Map<Account, bigint>();
  private readonly allowances = new Map<Account, Map<Account, bigint>>();
  private readonly listeners = new Set<TransferListener>();
  private supply = 0n;

  balanceOf = (account: Account): bigint => this.balances.get(account) ?? 0n;

  totalSupply = (): bigint => this.supply;

  allowance = (owner: Account, spender: Account): bigint =>
    this.allowances.get(owner)?.get(spender) ?? 0n;

  approve = (owner: Account, spender: Account, amount: bigint): void => {
    if (owner === NULL_ACCOUNT || spender === NULL_ACCOUNT) {
      throw new NullAccountError("approve");
    }
    if (amount < 0n) {
      throw new RangeError(`Negative allowance: ${amount}`);
    }
    let bySpender = this.allowances.get(owner);
    if (!bySpender) {
      bySpender = new Map();
      this.allowances.set(owner, bySpender);
    }
    bySpender.set(spender, amount);
  };

  applyBatch = (
    operations: readonly LedgerOperation[]
  ): readonly ListenerFailure[] => {
    const overlay = new LedgerOverlay(this);
    for (const operation of operations) {
      overlay.push(operation);
    }

    const notifications: TransferNotification[] = [];
    for (const operation of operations) {
      if (operation.kind === "spendAllowance") {
        this.approve(
          operation.owner,
          operation.spender,
          this.allowance(operation.owner, operation.spender) - operation.amount
        );
        continue;
      }
      this.credit(operation.from, -operation.amount);
      this.credit(operation.to, operation.amount);
      notifications.push({
        from: operation.from,
        to: operation.to,
        amount: operation.amount,
      });
    }

    return notifications.flatMap((notification) => this.emit(notification));
  };

  mint = (to: Account, amount: bigint): readonly ListenerFailure[] => {
    if (to === NULL_ACCOUNT) {
      throw new NullAccountError("mint");
    }
    if (amount < 0n) {
      throw new RangeError(`Negative mint amount: ${amount}`);
    }
    this.credit(to, amount);
    this.supply += amount;
    return this.emit({ from: NULL_ACCOUNT, to, amount });
  };

  burn = (from: Account, amount: bigint): readonly ListenerFailure[] => {
    if (from === NULL_ACCOUNT) {
      throw new NullAccountError("burn");
    }
    if (amount < 0n) {
      throw new RangeError(`Negative burn amount: ${amount}`);
    }
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new InsufficientBalanceError(from, balance, amount);
    }
    this.credit(from, -amount);
    this.supply -= amount;
    return this.emit({ from, to: NULL_ACCOUNT, amount });
  };

  onTransfer = (listener: TransferListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  private credit(account: Account, delta: bigint): void {
    const next = this.balanceOf(account) + delta;
    if (next === 0n) {
      this.balances.delete(account);
    } else {
      this.balances.set(account, next);
    }
  }

  private emit(notification: TransferNotification): ListenerFailure[] {
    const failures: ListenerFailure[] = [];
    for (const listener of this.listeners) {
      try {
        listener(notification);
      } catch (error) {
        failures.push({ notification, error });
      }
    }
    return failures;
  }
}
