// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/ports/ledger`
 * Purpose: Base fungible-ledger port consumed by the transfer engine.
 * Scope: Defines balance, allowance, supply and atomic batch contracts. Does not contain implementations.
 * Invariants:
 * - applyBatch is all-or-nothing: either every operation lands or none does
 * - Transfer notifications are emitted only after a batch has fully landed
 * - A throwing listener does not stop later notifications or undo the landed batch; its error is returned
 * - mint/burn adjust totalSupply and the account balance symmetrically
 * Side-effects: none (interface definition only)
 * Links: InMemoryLedger
 * @public
 */

import type { Account } from "@dualpool/ids";

export type LedgerOperation =
  | {
      readonly kind: "transfer";
      readonly from: Account;
      readonly to: Account;
      readonly amount: bigint;
    }
  | {
      readonly kind: "spendAllowance";
      readonly owner: Account;
      readonly spender: Account;
      readonly amount: bigint;
    };

export interface TransferNotification {
  readonly from: Account;
  readonly to: Account;
  readonly amount: bigint;
}

export type TransferListener = (notification: TransferNotification) => void;

/** A listener error caught while notifying about an operation that already landed. */
export interface ListenerFailure {
  readonly notification: TransferNotification;
  readonly error: unknown;
}

/** Read side of the ledger. Drafts layer pending operations over this. */
export interface LedgerReader {
  balanceOf: (account: Account) => bigint;
  totalSupply: () => bigint;
  allowance: (owner: Account, spender: Account) => bigint;
}

/**
 * Function properties (not methods) for contravariant param checking on branded types.
 */
export interface LedgerPort extends LedgerReader {
  approve: (owner: Account, spender: Account, amount: bigint) => void;
  /**
   * Validates every operation, then applies them in order. Throws on the first invalid one.
   * Returns the listener failures raised after the batch landed.
   */
  applyBatch: (
    operations: readonly LedgerOperation[]
  ) => readonly ListenerFailure[];
  mint: (to: Account, amount: bigint) => readonly ListenerFailure[];
  burn: (from: Account, amount: bigint) => readonly ListenerFailure[];
  /** Returns an unsubscribe function. */
  onTransfer: (listener: TransferListener) => () => void;
}
