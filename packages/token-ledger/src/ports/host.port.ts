// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/ports/host`
 * Purpose: Host queries the engine needs besides the ledger: current ledger time and code detection.
 * Scope: Interface definitions only.
 * Side-effects: none
 * @public
 */

import type { Account, UnixSeconds } from "@dualpool/ids";

export interface ClockPort {
  now: () => UnixSeconds;
}

export interface CodeInspectorPort {
  /** True when the account carries executable code (a contract, not a key holder). */
  hasCode: (account: Account) => boolean;
}
