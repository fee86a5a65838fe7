// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-sim-service/scenario/schema`
 * Purpose: Zod schema for replay scenarios: engine config, genesis state and an ordered list of steps.
 * Scope: Validation only. Reuses engine-core's account, amount and timestamp schemas.
 * Invariants:
 * - Every step carries an `op` discriminant
 * - `expectError` names the error code a step must be rejected with; absent means the step must apply
 * - Admin fee rates and batch sizes are not range-checked here; the engine rejects them with INVALID_SETTING
 * Side-effects: none
 * @public
 */

import {
  AccountSchema,
  AmountSchema,
  EngineConfigSchema,
  formatIssues,
  TimestampSchema,
} from "@dualpool/engine-core";
import { z } from "zod";

const AmountEntrySchema = z.object({
  account: AccountSchema,
  amount: AmountSchema,
});

const StepBase = z.object({
  /** Error code the step is expected to fail with */
  expectError: z.string().min(1).optional(),
});

export const ScenarioStepSchema = z.discriminatedUnion("op", [
  StepBase.extend({
    op: z.literal("transfer"),
    from: AccountSchema,
    to: AccountSchema,
    amount: AmountSchema,
  }),
  StepBase.extend({
    op: z.literal("transferFrom"),
    spender: AccountSchema,
    from: AccountSchema,
    to: AccountSchema,
    amount: AmountSchema,
  }),
  StepBase.extend({
    op: z.literal("approve"),
    owner: AccountSchema,
    spender: AccountSchema,
    amount: AmountSchema,
  }),
  StepBase.extend({
    op: z.literal("advance"),
    seconds: z.number().int().nonnegative().default(0),
    days: z.number().int().nonnegative().default(0),
  }),
  StepBase.extend({
    op: z.literal("setLpBalance"),
    account: AccountSchema,
    amount: AmountSchema,
  }),
  StepBase.extend({
    op: z.literal("markContract"),
    account: AccountSchema,
  }),
  StepBase.extend({
    op: z.literal("setFeeRates"),
    caller: AccountSchema,
    fees: z.object({
      lpRate: z.number().int(),
      burnRate: z.number().int(),
      burnLpRate: z.number().int(),
      fundRate: z.number().int(),
    }),
  }),
  StepBase.extend({
    op: z.literal("setFeeExempt"),
    caller: AccountSchema,
    account: AccountSchema,
    exempt: z.boolean(),
  }),
  StepBase.extend({
    op: z.literal("setRewardExcluded"),
    caller: AccountSchema,
    account: AccountSchema,
    excluded: z.boolean(),
  }),
  StepBase.extend({
    op: z.literal("setBatchSize"),
    caller: AccountSchema,
    batchSize: z.number().int(),
  }),
  StepBase.extend({
    op: z.literal("setLaunchTime"),
    caller: AccountSchema,
    launchTime: TimestampSchema,
  }),
  StepBase.extend({
    op: z.literal("transferOwnership"),
    caller: AccountSchema,
    next: AccountSchema,
  }),
  StepBase.extend({
    op: z.literal("renounceOwnership"),
    caller: AccountSchema,
  }),
]);

export const ScenarioSchema = z.object({
  name: z.string().min(1),
  engine: EngineConfigSchema,
  /** AMM pair account; also the LP receipt token */
  pair: AccountSchema,
  /** Clock start; defaults to the engine's launch time */
  startTime: TimestampSchema.optional(),
  contracts: z.array(AccountSchema).default([]),
  balances: z.array(AmountEntrySchema).default([]),
  lpBalances: z.array(AmountEntrySchema).default([]),
  steps: z.array(ScenarioStepSchema).min(1, "A scenario needs at least one step"),
});

export type ScenarioInput = z.input<typeof ScenarioSchema>;
export type Scenario = z.output<typeof ScenarioSchema>;
export type ScenarioStep = Scenario["steps"][number];

export function parseScenario(raw: unknown): Scenario {
  const result = ScenarioSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid scenario:\n${formatIssues(result.error)}`);
  }
  return result.data;
}
