// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/logger`
 * Purpose: Structural logger contract the engine logs through; compatible with pino's Logger.
 * Scope: Interface and a silent default. Does not create pino instances (composition roots own that).
 * Invariants: Log payloads never carry bigint values (JSON serializers reject them); amounts are logged as strings.
 * Side-effects: none
 * @public
 */

export interface LoggerLike {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug?(obj: Record<string, unknown>, msg?: string): void;
}

export const silentLogger: LoggerLike = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
