// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/ids/well-known`
 * Purpose: Fixed accounts with protocol meaning (null account, burn sink).
 * Scope: Constants only.
 * Invariants:
 * - NULL_ACCOUNT is never a valid transfer party
 * - SINK_ACCOUNT has no key; tokens sent there never move again but stay in total supply
 * Side-effects: none
 * @public
 */

import { zeroAddress } from "viem";

import { type Account, toAccount } from "./index";

export const NULL_ACCOUNT: Account = toAccount(zeroAddress);

export const SINK_ACCOUNT: Account = toAccount(
  "0x000000000000000000000000000000000000dEaD"
);

export function isNullAccount(account: Account): boolean {
  return account === NULL_ACCOUNT;
}
