// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-sim-service/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No engine construction, no side-effects beyond process.env read.
 * Invariants:
 * - SCENARIO_PATH required
 * - Fails fast listing every invalid variable
 * Side-effects: Reads process.env
 * @internal
 */

import { z } from "zod";

const EnvSchema = z.object({
  /** JSON scenario file to replay (required) */
  SCENARIO_PATH: z.string().min(1, "SCENARIO_PATH is required"),

  /** Log level (default: info) */
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),

  /** Service name for logging (default: token-sim) */
  SERVICE_NAME: z.string().default("token-sim"),
});

export type Env = z.infer<typeof EnvSchema>;

/** Validates an environment record. Throws on invalid config. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
