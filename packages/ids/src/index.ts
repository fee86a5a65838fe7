// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/ids`
 * Purpose: Branded account and timestamp types shared by the ledger, the engine and the replay service.
 * Scope: Type definitions and boundary constructors only. Well-known accounts live in @dualpool/ids/well-known.
 * Invariants:
 * - toAccount() is the single entry point for creating an Account (EIP-55 checksummed via viem)
 * - toUnixSeconds() is the single entry point for creating UnixSeconds (non-negative integer)
 * - No `as Account` / `as UnixSeconds` casts outside this package and test fixtures
 * Side-effects: none
 * @public
 */

import type { Tagged } from "type-fest";
import { type Address, getAddress, isAddress } from "viem";

/** Checksummed 20-byte account identifier. */
export type Account = Tagged<Address, "Account">;

/** Ledger time in whole seconds since the unix epoch. */
export type UnixSeconds = Tagged<number, "UnixSeconds">;

export const SECONDS_PER_DAY = 86_400;

/** Validate and brand a raw hex string as Account. Boundary constructor; call at edges only. */
export function toAccount(raw: string): Account {
  if (!isAddress(raw, { strict: false })) {
    throw new Error(`Invalid Account (expected 20-byte hex address): ${raw}`);
  }
  return getAddress(raw) as Account;
}

export function isAccount(raw: unknown): raw is Account {
  return typeof raw === "string" && isAddress(raw, { strict: true });
}

export function toUnixSeconds(raw: number): UnixSeconds {
  if (!Number.isSafeInteger(raw) || raw < 0) {
    throw new Error(
      `Invalid UnixSeconds (expected non-negative integer): ${raw}`
    );
  }
  return raw as UnixSeconds;
}

/** Same account regardless of hex casing. */
export function sameAccount(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
