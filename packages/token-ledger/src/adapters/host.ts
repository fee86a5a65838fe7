// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/adapters/host`
 * Purpose: Controllable clock and code inspector for replay and tests.
 * Scope: Time advances only via explicit calls; code-bearing accounts are declared up front or marked later.
 * Side-effects: none
 * Links: ports/host.port.ts
 * @public
 */

import {
  type Account,
  SECONDS_PER_DAY,
  toUnixSeconds,
  type UnixSeconds,
} from "@dualpool/ids";

import type { ClockPort, CodeInspectorPort } from "../ports";

export class ManualClock implements ClockPort {
  private current: UnixSeconds;

  constructor(start: UnixSeconds) {
    this.current = start;
  }

  now = (): UnixSeconds => this.current;

  advance(seconds: number): void {
    this.current = toUnixSeconds(this.current + seconds);
  }

  advanceDays(days: number): void {
    this.advance(days * SECONDS_PER_DAY);
  }

  setTime(time: UnixSeconds): void {
    this.current = time;
  }
}

export class StaticCodeInspector implements CodeInspectorPort {
  private readonly contracts: Set<Account>;

  constructor(contracts: Iterable<Account> = []) {
    this.contracts = new Set(contracts);
  }

  hasCode = (account: Account): boolean => this.contracts.has(account);

  markContract(account: Account): void {
    this.contracts.add(account);
  }
}
