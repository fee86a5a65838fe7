// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/errors`
 * Purpose: Domain error classes for engine preconditions and access control.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants: All errors have a readonly `code` discriminant for type guards.
 * Side-effects: none
 * @public
 */

import type { Account, UnixSeconds } from "@dualpool/ids";

export class TradingNotOpenError extends Error {
  public readonly code = "TRADING_NOT_OPEN" as const;
  constructor(
    public readonly launchTime: UnixSeconds,
    public readonly now: UnixSeconds
  ) {
    super(`Trading opens at ${launchTime}, ledger time is ${now}`);
    this.name = "TradingNotOpenError";
  }
}

export class ContractSellerError extends Error {
  public readonly code = "CONTRACT_SELLER" as const;
  constructor(public readonly account: Account) {
    super(`Account ${account} carries code and may not sell to the pair`);
    this.name = "ContractSellerError";
  }
}

export class FeeOverflowError extends Error {
  public readonly code = "FEE_OVERFLOW" as const;
  constructor(message: string) {
    super(message);
    this.name = "FeeOverflowError";
  }
}

export class ReentrantCallError extends Error {
  public readonly code = "REENTRANT_CALL" as const;
  constructor() {
    super("Transfer attempted while another transfer is in progress");
    this.name = "ReentrantCallError";
  }
}

export class NotOwnerError extends Error {
  public readonly code = "NOT_OWNER" as const;
  constructor(
    public readonly caller: Account,
    public readonly operation: string
  ) {
    super(`${operation}: caller ${caller} is not the owner`);
    this.name = "NotOwnerError";
  }
}

export class InvalidSettingError extends Error {
  public readonly code = "INVALID_SETTING" as const;
  constructor(
    public readonly setting: string,
    message: string
  ) {
    super(message);
    this.name = "InvalidSettingError";
  }
}

export class CalendarRangeError extends Error {
  public readonly code = "CALENDAR_RANGE" as const;
  constructor(
    public readonly from: number,
    public readonly to: number
  ) {
    super(`Start ${from} is after end ${to}`);
    this.name = "CalendarRangeError";
  }
}

// Type guards

export function isTradingNotOpenError(
  error: unknown
): error is TradingNotOpenError {
  return error instanceof Error && error.name === "TradingNotOpenError";
}

export function isContractSellerError(
  error: unknown
): error is ContractSellerError {
  return error instanceof Error && error.name === "ContractSellerError";
}

export function isFeeOverflowError(error: unknown): error is FeeOverflowError {
  return error instanceof Error && error.name === "FeeOverflowError";
}

export function isReentrantCallError(
  error: unknown
): error is ReentrantCallError {
  return error instanceof Error && error.name === "ReentrantCallError";
}

export function isNotOwnerError(error: unknown): error is NotOwnerError {
  return error instanceof Error && error.name === "NotOwnerError";
}

export function isInvalidSettingError(
  error: unknown
): error is InvalidSettingError {
  return error instanceof Error && error.name === "InvalidSettingError";
}

export function isCalendarRangeError(
  error: unknown
): error is CalendarRangeError {
  return error instanceof Error && error.name === "CalendarRangeError";
}
