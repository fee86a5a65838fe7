// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-sim-service/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers for the replay service.
 * Invariants: Always emits JSON to stdout; silenced under test tooling. Safe to call at module scope (no env validation).
 * Side-effects: none
 * Notes: Use makeNoopLogger for tests. Formatting via external pipe (pino-pretty).
 * Links: REDACT_PATHS
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

export interface LoggerOptions {
  readonly level?: string;
  readonly serviceName?: string;
  readonly bindings?: Record<string, unknown>;
}

export function makeLogger(options: LoggerOptions = {}): Logger {
  // Logging config only - direct access, no validation required
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  const serviceName =
    options.serviceName ?? process.env.SERVICE_NAME ?? "token-sim";

  return pino(
    {
      level,
      enabled: !(isVitest || nodeEnv === "test"),
      base: { ...options.bindings, service: serviceName },
      messageKey: "msg",
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    },
    pino.destination({ dest: 1, sync: true })
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
