// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-sim-service/runner`
 * Purpose: Replays a scenario against a fresh engine over in-memory ports and summarizes the outcome.
 * Scope: World construction, step dispatch and outcome bookkeeping. Does not read files or env.
 * Invariants:
 * - Each step is applied once, in order, on the same engine
 * - A step rejected with a coded domain error is recorded; an uncoded error is a bug and propagates
 * - A failure is either an unexpected rejection or a missing expected one
 * - Logged amounts are decimal strings
 * Side-effects: logs through the given logger
 * @public
 */

import {
  DualPoolEngine,
  type EngineSnapshot,
  mintGenesis,
  type TransferReceipt,
} from "@dualpool/engine-core";
import type { Account } from "@dualpool/ids";
import { SINK_ACCOUNT } from "@dualpool/ids/well-known";
import {
  InMemoryLedger,
  InMemoryPair,
  ManualClock,
  StaticCodeInspector,
} from "@dualpool/token-ledger";

import type { Logger } from "./observability/logger";
import type { Scenario, ScenarioStep } from "./scenario/schema";

export interface World {
  readonly ledger: InMemoryLedger;
  readonly pair: InMemoryPair;
  readonly clock: ManualClock;
  readonly inspector: StaticCodeInspector;
  readonly engine: DualPoolEngine;
}

export interface StepFailure {
  readonly index: number;
  readonly op: ScenarioStep["op"];
  readonly reason: string;
}

export interface ReplaySummary {
  readonly name: string;
  readonly applied: number;
  readonly rejected: number;
  readonly failures: readonly StepFailure[];
  /** Final balances of every account the scenario touched, as decimal strings */
  readonly balances: Readonly<Record<string, string>>;
  readonly snapshot: EngineSnapshot;
}

export function buildWorld(scenario: Scenario, logger: Logger): World {
  const ledger = new InMemoryLedger();
  const pair = new InMemoryPair(scenario.pair);
  const clock = new ManualClock(scenario.startTime ?? scenario.engine.launchTime);
  const inspector = new StaticCodeInspector(scenario.contracts);

  mintGenesis(ledger, scenario.engine, scenario.balances);
  for (const { account, amount } of scenario.lpBalances) {
    pair.setBalance(account, amount);
  }

  const engine = new DualPoolEngine(scenario.engine, {
    ledger,
    weightSource: pair,
    clock,
    codeInspector: inspector,
    logger: logger.child({ component: "engine" }),
  });
  return { ledger, pair, clock, inspector, engine };
}

function describeReceipt(receipt: TransferReceipt): Record<string, unknown> {
  return {
    from: receipt.from,
    to: receipt.to,
    amount: receipt.amount.toString(),
    transferClass: receipt.transferClass,
    totalFee: receipt.fees.totalFee.toString(),
    net: receipt.fees.net.toString(),
    distributor: receipt.distributor,
    payouts: receipt.payouts.map((p) => ({
      pool: p.pool,
      account: p.account,
      amount: p.amount.toString(),
    })),
    releases: receipt.releases.map((r) => ({
      beneficiary: r.beneficiary,
      amount: r.amount.toString(),
    })),
    holdersAdded: receipt.holdersAdded,
  };
}

/** Accounts a step names, for the final balance report. */
function participants(step: ScenarioStep): Account[] {
  switch (step.op) {
    case "transfer":
      return [step.from, step.to];
    case "transferFrom":
      return [step.spender, step.from, step.to];
    case "approve":
      return [step.owner, step.spender];
    case "setLpBalance":
    case "markContract":
    case "setFeeExempt":
    case "setRewardExcluded":
      return [step.account];
    case "transferOwnership":
      return [step.next];
    default:
      return [];
  }
}

function applyStep(world: World, step: ScenarioStep): Record<string, unknown> {
  const { engine, clock, pair, inspector } = world;
  const admin = engine.admin;
  switch (step.op) {
    case "transfer":
      return describeReceipt(engine.transfer(step.from, step.to, step.amount));
    case "transferFrom":
      return describeReceipt(
        engine.transferFrom(step.spender, step.from, step.to, step.amount)
      );
    case "approve":
      engine.approve(step.owner, step.spender, step.amount);
      return { owner: step.owner, spender: step.spender };
    case "advance":
      clock.advance(step.seconds);
      clock.advanceDays(step.days);
      return { now: clock.now() };
    case "setLpBalance":
      pair.setBalance(step.account, step.amount);
      return { account: step.account, amount: step.amount.toString() };
    case "markContract":
      inspector.markContract(step.account);
      return { account: step.account };
    case "setFeeRates":
      admin.setFeeRates(step.caller, step.fees);
      return { ...step.fees };
    case "setFeeExempt":
      admin.setFeeExempt(step.caller, step.account, step.exempt);
      return { account: step.account, exempt: step.exempt };
    case "setRewardExcluded":
      admin.setRewardExcluded(step.caller, step.account, step.excluded);
      return { account: step.account, excluded: step.excluded };
    case "setBatchSize":
      admin.setBatchSize(step.caller, step.batchSize);
      return { batchSize: step.batchSize };
    case "setLaunchTime":
      admin.setLaunchTime(step.caller, step.launchTime);
      return { launchTime: step.launchTime };
    case "transferOwnership":
      admin.transferOwnership(step.caller, step.next);
      return { next: step.next };
    case "renounceOwnership":
      admin.renounceOwnership(step.caller);
      return {};
    default: {
      const unreachable: never = step;
      throw new Error(`Unknown step: ${JSON.stringify(unreachable)}`);
    }
  }
}

function errorCode(error: unknown): string | null {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return null;
}

export function runScenario(scenario: Scenario, logger: Logger): ReplaySummary {
  const world = buildWorld(scenario, logger);
  const { engine, ledger } = world;
  const log = logger.child({ scenario: scenario.name });

  const touched = new Set<Account>([
    SINK_ACCOUNT,
    scenario.pair,
    scenario.engine.accounts.engine,
    scenario.engine.accounts.lpRewardPool,
    scenario.engine.accounts.burnRewardPool,
    scenario.engine.accounts.treasury,
    ...scenario.balances.map((b) => b.account),
    ...(scenario.engine.vesting?.allocations ?? []).map((a) => a.beneficiary),
  ]);

  const failures: StepFailure[] = [];
  let applied = 0;
  let rejected = 0;

  scenario.steps.forEach((step, index) => {
    for (const account of participants(step)) {
      touched.add(account);
    }
    try {
      const detail = applyStep(world, step);
      applied += 1;
      if (step.expectError !== undefined) {
        failures.push({
          index,
          op: step.op,
          reason: `expected ${step.expectError}, but the step applied`,
        });
        log.error({ index, op: step.op, ...detail }, "Step applied unexpectedly");
        return;
      }
      log.info({ index, op: step.op, ...detail }, "Step applied");
    } catch (error) {
      const code = errorCode(error);
      if (code === null) {
        throw error;
      }
      rejected += 1;
      if (step.expectError === code) {
        log.info({ index, op: step.op, code }, "Step rejected as expected");
        return;
      }
      failures.push({
        index,
        op: step.op,
        reason:
          step.expectError === undefined
            ? `unexpected ${code}`
            : `expected ${step.expectError}, got ${code}`,
      });
      log.error({ index, op: step.op, code, err: error }, "Step rejected");
    }
  });

  const balances: Record<string, string> = {};
  for (const account of touched) {
    balances[account] = ledger.balanceOf(account).toString();
  }

  return {
    name: scenario.name,
    applied,
    rejected,
    failures,
    balances,
    snapshot: engine.snapshot(),
  };
}
