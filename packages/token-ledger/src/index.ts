// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger`
 * Purpose: Base fungible ledger and host ports consumed by the engine, with in-process adapters.
 * Scope: Re-exports ports, overlay, adapters and errors. Contains no fee or reward logic.
 * Invariants: No imports from engine-core or services.
 * Side-effects: none
 * @public
 */

// Adapters
export { ManualClock, StaticCodeInspector } from "./adapters/host";
export { InMemoryLedger } from "./adapters/in-memory-ledger";
export { InMemoryPair } from "./adapters/in-memory-pair";
// Errors
export {
  InsufficientAllowanceError,
  InsufficientBalanceError,
  isInsufficientAllowanceError,
  isInsufficientBalanceError,
  isNullAccountError,
  NullAccountError,
} from "./errors";
// Overlay
export { LedgerOverlay } from "./overlay";
// Ports
export type {
  ClockPort,
  CodeInspectorPort,
  LedgerOperation,
  LedgerPort,
  LedgerReader,
  ListenerFailure,
  TransferListener,
  TransferNotification,
  WeightSourcePort,
} from "./ports";
