// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/errors`
 * Purpose: Precondition errors raised by the base ledger primitives.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

import type { Account } from "@dualpool/ids";

export class NullAccountError extends Error {
  public readonly code = "NULL_ACCOUNT" as const;
  constructor(public readonly operation: string) {
    super(`${operation}: null account is not a valid party`);
    this.name = "NullAccountError";
  }
}

export class InsufficientBalanceError extends Error {
  public readonly code = "INSUFFICIENT_BALANCE" as const;
  constructor(
    public readonly account: Account,
    public readonly balance: bigint,
    public readonly required: bigint
  ) {
    super(`Account ${account} holds ${balance}, needs ${required}`);
    this.name = "InsufficientBalanceError";
  }
}

export class InsufficientAllowanceError extends Error {
  public readonly code = "INSUFFICIENT_ALLOWANCE" as const;
  constructor(
    public readonly owner: Account,
    public readonly spender: Account,
    public readonly allowance: bigint,
    public readonly required: bigint
  ) {
    super(
      `Spender ${spender} may move ${allowance} of ${owner}'s tokens, needs ${required}`
    );
    this.name = "InsufficientAllowanceError";
  }
}

// Type guards

export function isNullAccountError(error: unknown): error is NullAccountError {
  return error instanceof Error && error.name === "NullAccountError";
}

export function isInsufficientBalanceError(
  error: unknown
): error is InsufficientBalanceError {
  return error instanceof Error && error.name === "InsufficientBalanceError";
}

export function isInsufficientAllowanceError(
  error: unknown
): error is InsufficientAllowanceError {
  return error instanceof Error && error.name === "InsufficientAllowanceError";
}
