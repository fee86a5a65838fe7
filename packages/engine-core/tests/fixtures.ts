// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/tests/fixtures`
 * Purpose: Reusable accounts, config and an in-process engine harness for engine-core unit tests.
 * Scope: Builds engines over InMemoryLedger / InMemoryPair / ManualClock. No network, no real time.
 * Invariants: Account constants are distinct and never the null account or the sink.
 * Side-effects: none (pure functions)
 * Links: tests/*.test.ts
 * @internal
 */

import { type Account, toAccount, toUnixSeconds } from "@dualpool/ids";
import {
  InMemoryLedger,
  InMemoryPair,
  ManualClock,
  StaticCodeInspector,
} from "@dualpool/token-ledger";

import {
  DualPoolEngine,
  type EngineConfig,
  type EngineConfigInput,
  type LoggerLike,
  mintGenesis,
  type OpeningBalance,
  parseEngineConfig,
} from "../src/index";

export function account(n: number): Account {
  return toAccount(`0x${n.toString(16).padStart(40, "0")}`);
}

export const ACCOUNTS = {
  owner: account(0x100),
  engine: account(0x200),
  lpPool: account(0x300),
  burnPool: account(0x400),
  treasury: account(0x500),
  pair: account(0x600),
  alice: account(0xa1),
  bob: account(0xb2),
  carol: account(0xc3),
  dave: account(0xd4),
  bot: account(0xe5),
  beneficiary: account(0xf6),
} as const;

/** Fixed launch time for deterministic tests. */
export const T0 = toUnixSeconds(1_700_000_000);

export function makeConfigInput(
  overrides: Partial<EngineConfigInput> = {}
): EngineConfigInput {
  return {
    owner: ACCOUNTS.owner,
    accounts: {
      engine: ACCOUNTS.engine,
      lpRewardPool: ACCOUNTS.lpPool,
      burnRewardPool: ACCOUNTS.burnPool,
      treasury: ACCOUNTS.treasury,
    },
    fees: { lpRate: 20, burnRate: 5, burnLpRate: 20, fundRate: 15 },
    launchTime: T0,
    distribution: {
      batchSize: 50,
      lp: { threshold: "100" },
      burn: { threshold: "100" },
    },
    ...overrides,
  };
}

export function makeConfig(
  overrides: Partial<EngineConfigInput> = {}
): EngineConfig {
  return parseEngineConfig(makeConfigInput(overrides));
}

export interface Harness {
  readonly ledger: InMemoryLedger;
  readonly pair: InMemoryPair;
  readonly clock: ManualClock;
  readonly inspector: StaticCodeInspector;
  readonly engine: DualPoolEngine;
}

export function makeHarness(options: {
  config?: Partial<EngineConfigInput>;
  balances?: readonly OpeningBalance[];
  logger?: LoggerLike;
} = {}): Harness {
  const config = makeConfig(options.config);
  const ledger = new InMemoryLedger();
  const pair = new InMemoryPair(ACCOUNTS.pair);
  const clock = new ManualClock(T0);
  const inspector = new StaticCodeInspector();
  mintGenesis(ledger, config, options.balances ?? []);
  const engine = new DualPoolEngine(config, {
    ledger,
    weightSource: pair,
    clock,
    codeInspector: inspector,
    logger: options.logger,
  });
  return { ledger, pair, clock, inspector, engine };
}
