// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-sim-service/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Only redact known secret-bearing keys, never account addresses.
 * Side-effects: none
 * @internal
 */

export const REDACT_PATHS = [
  "password",
  "token",
  "secret",
  "apiKey",
  "api_key",
  // Wallet/crypto
  "privateKey",
  "mnemonic",
  "seed",
  "*.privateKey",
];
