// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/ports`
 * Purpose: Barrel export for ledger and host ports.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export type { ClockPort, CodeInspectorPort } from "./host.port";
export type {
  LedgerOperation,
  LedgerPort,
  LedgerReader,
  ListenerFailure,
  TransferListener,
  TransferNotification,
} from "./ledger.port";
export type { WeightSourcePort } from "./weight-source.port";
