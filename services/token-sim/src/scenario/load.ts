// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-sim-service/scenario/load`
 * Purpose: Reads a scenario file from disk and validates it.
 * Scope: File IO and JSON decoding only.
 * Side-effects: IO (file read)
 * @public
 */

import { readFile } from "node:fs/promises";

import { parseScenario, type Scenario } from "./schema";

export async function loadScenario(path: string): Promise<Scenario> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new Error(`Scenario ${path} is not valid JSON`, { cause: error });
  }
  return parseScenario(raw);
}
