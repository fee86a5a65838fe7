// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-sim-service/tests/fixtures`
 * Purpose: Minimal scenario inputs for runner and schema tests.
 * Scope: Test data only.
 * @internal
 */

import { type Account, toAccount } from "@dualpool/ids";

import type { ScenarioInput } from "../src/scenario/schema";

export const addr = (n: number): Account =>
  toAccount(`0x${n.toString(16).padStart(40, "0")}`);

export const OWNER = addr(0x100);
export const ENGINE = addr(0x200);
export const LP_POOL = addr(0x300);
export const BURN_POOL = addr(0x400);
export const TREASURY = addr(0x500);
export const PAIR = addr(0x600);
export const ALICE = addr(0xa1);
export const BOB = addr(0xb2);

export function makeScenarioInput(
  steps: ScenarioInput["steps"],
  overrides: Partial<ScenarioInput> = {}
): ScenarioInput {
  return {
    name: "unit",
    engine: {
      owner: OWNER,
      accounts: {
        engine: ENGINE,
        lpRewardPool: LP_POOL,
        burnRewardPool: BURN_POOL,
        treasury: TREASURY,
      },
      fees: { lpRate: 20, burnRate: 5, burnLpRate: 20, fundRate: 15 },
      launchTime: 1_700_000_000,
      distribution: { lp: { threshold: "100" }, burn: { threshold: "100" } },
    },
    pair: PAIR,
    balances: [{ account: ALICE, amount: "1000" }],
    steps,
    ...overrides,
  };
}
