// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/engine-core/tests/engine`
 * Purpose: End-to-end tests for the transfer interceptor over in-memory ports.
 * Scope: Fees, registry deferral, distributor alternation, vesting, launch gate, atomicity and reentrancy.
 * Invariants: A rejected transfer leaves ledger and engine state exactly as before.
 * Side-effects: none (in-process ledger and clock only)
 * Links: src/engine.ts
 * @internal
 */

import { toUnixSeconds } from "@dualpool/ids";
import { NULL_ACCOUNT, SINK_ACCOUNT } from "@dualpool/ids/well-known";
import {
  isInsufficientAllowanceError,
  isInsufficientBalanceError,
  isNullAccountError,
} from "@dualpool/token-ledger";
import { describe, expect, it, vi } from "vitest";

import {
  INITIAL_CURSOR,
  isContractSellerError,
  isReentrantCallError,
  isTradingNotOpenError,
  type LoggerLike,
} from "../src/index";
import { ACCOUNTS, makeHarness, T0 } from "./fixtures";

const {
  owner,
  engine: engineAccount,
  lpPool,
  burnPool,
  treasury,
  pair,
  alice,
  bob,
  carol,
  dave,
  bot,
  beneficiary,
} = ACCOUNTS;

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

describe("DualPoolEngine", () => {
  describe("fees", () => {
    it("splits a 1000 sell across the pools, the sink and the treasury", () => {
      const { engine, ledger } = makeHarness({
        balances: [{ account: alice, amount: 1000n }],
      });

      const receipt = engine.transfer(alice, pair, 1000n);

      expect(receipt.transferClass).toBe("sell");
      expect(receipt.fees.totalFee).toBe(60n);
      expect(ledger.balanceOf(alice)).toBe(0n);
      expect(ledger.balanceOf(pair)).toBe(940n);
      expect(ledger.balanceOf(lpPool)).toBe(20n);
      expect(ledger.balanceOf(SINK_ACCOUNT)).toBe(5n);
      expect(ledger.balanceOf(burnPool)).toBe(20n);
      expect(ledger.balanceOf(treasury)).toBe(15n);
      expect(receipt.burnContributions).toEqual([
        { account: alice, amount: 5n },
      ]);
      expect(engine.burns.contributionOf(alice)).toBe(5n);
    });

    it("charges nothing on buys and plain transfers", () => {
      const { engine, ledger } = makeHarness({
        balances: [
          { account: pair, amount: 1000n },
          { account: alice, amount: 1000n },
        ],
      });

      expect(engine.transfer(pair, bob, 500n).transferClass).toBe("buy");
      expect(engine.transfer(alice, carol, 300n).transferClass).toBe("plain");
      expect(ledger.balanceOf(bob)).toBe(500n);
      expect(ledger.balanceOf(carol)).toBe(300n);
      expect(ledger.balanceOf(treasury)).toBe(0n);
    });

    it("lets exempt accounts sell fee-free and skips distribution", () => {
      const { engine, ledger } = makeHarness({
        balances: [{ account: owner, amount: 1000n }],
      });

      const receipt = engine.transfer(owner, pair, 1000n);

      expect(receipt.fees.totalFee).toBe(0n);
      expect(receipt.distributor).toBeNull();
      expect(ledger.balanceOf(pair)).toBe(1000n);
      expect(engine.snapshot().nextDistributor).toBe("lp");
    });

    it("counts a direct send to the sink as a burn contribution", () => {
      const { engine, ledger } = makeHarness({
        balances: [{ account: alice, amount: 100n }],
      });

      engine.transfer(alice, SINK_ACCOUNT, 50n);

      expect(ledger.balanceOf(SINK_ACCOUNT)).toBe(50n);
      expect(engine.burns.contributionOf(alice)).toBe(50n);
      expect(engine.snapshot().burnTotal).toBe(50n);
    });
  });

  describe("launch gate and seller checks", () => {
    it("rejects trades before launch but allows plain and exempt transfers", () => {
      const { engine, ledger, clock } = makeHarness({
        config: { launchTime: T0 + 100 },
        balances: [
          { account: alice, amount: 1000n },
          { account: owner, amount: 1000n },
          { account: pair, amount: 1000n },
        ],
      });

      const sell = thrown(() => engine.transfer(alice, pair, 10n));
      expect(isTradingNotOpenError(sell)).toBe(true);
      const buy = thrown(() => engine.transfer(pair, bob, 10n));
      expect(isTradingNotOpenError(buy)).toBe(true);

      engine.transfer(alice, bob, 10n);
      engine.transfer(owner, pair, 10n);
      expect(ledger.balanceOf(bob)).toBe(10n);

      clock.setTime(toUnixSeconds(T0 + 100));
      engine.transfer(alice, pair, 100n);
      expect(ledger.balanceOf(pair)).toBe(1010n + 95n);
    });

    it("refuses sells from code-bearing accounts", () => {
      const { engine, ledger, inspector } = makeHarness({
        balances: [{ account: bot, amount: 100n }],
      });
      inspector.markContract(bot);

      const error = thrown(() => engine.transfer(bot, pair, 100n));

      expect(isContractSellerError(error)).toBe(true);
      expect(ledger.balanceOf(bot)).toBe(100n);
      engine.transfer(bot, alice, 40n);
      expect(ledger.balanceOf(alice)).toBe(40n);
    });

    it("rejects the null account as either party", () => {
      const { engine } = makeHarness({
        balances: [{ account: alice, amount: 10n }],
      });
      const error = thrown(() => engine.transfer(alice, NULL_ACCOUNT, 1n));
      expect(isNullAccountError(error)).toBe(true);
    });
  });

  describe("holder registry", () => {
    it("admits a pair sender on the next call once it holds LP weight", () => {
      const { engine, pair: lp } = makeHarness({
        balances: [
          { account: alice, amount: 1000n },
          { account: bob, amount: 1000n },
        ],
      });

      const first = engine.transfer(alice, pair, 100n);
      expect(first.holdersAdded).toEqual([]);
      expect(engine.snapshot().pendingPairSender).toBe(alice);

      lp.setBalance(alice, 50n);
      const second = engine.transfer(bob, carol, 10n);

      expect(second.holdersAdded).toEqual([alice]);
      expect(engine.holders.roster.indexOf(alice)).toBe(1);
      expect(engine.snapshot().pendingPairSender).toBeNull();
    });

    it("drops a pending sender that holds no LP weight", () => {
      const { engine } = makeHarness({
        balances: [
          { account: alice, amount: 1000n },
          { account: bob, amount: 1000n },
        ],
      });

      engine.transfer(alice, pair, 100n);
      engine.transfer(bob, carol, 10n);

      expect(engine.holders.roster.length).toBe(0);
      expect(engine.snapshot().pendingPairSender).toBeNull();
    });
  });

  describe("distribution", () => {
    it("alternates distributors on qualifying calls only", () => {
      const { engine } = makeHarness({
        balances: [
          { account: alice, amount: 1000n },
          { account: owner, amount: 1000n },
        ],
      });

      expect(engine.transfer(alice, bob, 1n).distributor).toBe("lp");
      expect(engine.transfer(owner, bob, 1n).distributor).toBeNull();
      expect(engine.transfer(alice, bob, 1n).distributor).toBe("burn");
      expect(engine.transfer(alice, bob, 1n).distributor).toBe("lp");
      expect(engine.snapshot().nextDistributor).toBe("burn");
    });

    it("pays LP holders pro rata from the LP reward pool", () => {
      const { engine, ledger, pair: lp } = makeHarness({
        balances: [
          { account: lpPool, amount: 1000n },
          { account: carol, amount: 100n },
        ],
      });
      engine.holders.addHolder(alice);
      engine.holders.addHolder(bob);
      lp.setBalance(alice, 75n);
      lp.setBalance(bob, 25n);

      const receipt = engine.transfer(carol, dave, 10n);

      expect(receipt.payouts).toEqual([
        { pool: "lp", account: alice, amount: 75n },
        { pool: "lp", account: bob, amount: 25n },
      ]);
      expect(ledger.balanceOf(alice)).toBe(75n);
      expect(ledger.balanceOf(bob)).toBe(25n);
      expect(ledger.balanceOf(lpPool)).toBe(900n);
      expect(engine.distributors.lp.cursor()).toEqual({
        position: 0,
        lastRunAt: T0,
      });
    });

    it("pays burners pro rata from the burn reward pool", () => {
      const { engine, ledger } = makeHarness({
        balances: [
          { account: burnPool, amount: 1000n },
          { account: carol, amount: 100n },
        ],
      });
      engine.burns.addBurnContribution(alice, 30n);
      engine.burns.addBurnContribution(bob, 10n);

      engine.transfer(carol, dave, 1n);
      const receipt = engine.transfer(carol, dave, 1n);

      expect(receipt.distributor).toBe("burn");
      expect(receipt.payouts).toEqual([
        { pool: "burn", account: alice, amount: 75n },
        { pool: "burn", account: bob, amount: 25n },
      ]);
      expect(ledger.balanceOf(burnPool)).toBe(900n);
    });

    it("honours a smaller batch size set by the owner", () => {
      const { engine, ledger } = makeHarness({
        balances: [
          { account: burnPool, amount: 1000n },
          { account: carol, amount: 100n },
        ],
      });
      engine.admin.setBatchSize(owner, 1);
      engine.burns.addBurnContribution(alice, 30n);
      engine.burns.addBurnContribution(bob, 10n);

      engine.transfer(carol, dave, 1n);
      engine.transfer(carol, dave, 1n);

      expect(ledger.balanceOf(alice)).toBe(75n);
      expect(ledger.balanceOf(bob)).toBe(0n);
      expect(engine.distributors.burn.cursor().position).toBe(1);
    });
  });

  describe("vesting", () => {
    it("releases locked allocations from the engine account on qualifying calls", () => {
      const { engine, ledger, clock } = makeHarness({
        config: {
          vesting: {
            startTime: T0,
            allocations: [{ beneficiary, amount: "900", cycleDays: 3 }],
          },
        },
        balances: [
          { account: alice, amount: 100n },
          { account: owner, amount: 100n },
        ],
      });
      expect(ledger.balanceOf(engineAccount)).toBe(900n);

      clock.advanceDays(1);
      expect(engine.transfer(alice, bob, 1n).releases).toEqual([
        { beneficiary, amount: 300n },
      ]);

      clock.advanceDays(1);
      expect(engine.transfer(owner, bob, 1n).releases).toEqual([]);

      clock.advanceDays(5);
      expect(engine.transfer(alice, bob, 1n).releases).toEqual([
        { beneficiary, amount: 600n },
      ]);
      expect(ledger.balanceOf(beneficiary)).toBe(900n);
      expect(ledger.balanceOf(engineAccount)).toBe(0n);
    });
  });

  describe("atomicity", () => {
    it("leaves every balance and every piece of engine state untouched on failure", () => {
      const warn = vi.fn();
      const logger: LoggerLike = {
        info: vi.fn(),
        warn,
        error: vi.fn(),
      };
      const { engine, ledger, pair: lp } = makeHarness({
        balances: [
          { account: alice, amount: 900n },
          { account: lpPool, amount: 1000n },
        ],
        logger,
      });
      engine.holders.addHolder(bob);
      lp.setBalance(bob, 10n);

      const error = thrown(() => engine.transfer(alice, pair, 1000n));

      expect(isInsufficientBalanceError(error)).toBe(true);
      expect(ledger.balanceOf(alice)).toBe(900n);
      expect(ledger.balanceOf(lpPool)).toBe(1000n);
      expect(ledger.balanceOf(bob)).toBe(0n);
      expect(ledger.balanceOf(SINK_ACCOUNT)).toBe(0n);
      expect(ledger.balanceOf(treasury)).toBe(0n);
      expect(engine.snapshot()).toEqual({
        holderCount: 1,
        burnerCount: 0,
        burnTotal: 0n,
        cursors: { lp: INITIAL_CURSOR, burn: INITIAL_CURSOR },
        nextDistributor: "lp",
        pendingPairSender: null,
        vesting: { locks: [], releaseCursor: 0 },
      });
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ from: alice, to: pair, amount: "1000" }),
        "Transfer rejected"
      );
    });

    it("spends allowance only when the whole transfer commits", () => {
      const { engine, ledger } = makeHarness({
        balances: [{ account: alice, amount: 1000n }],
      });
      engine.approve(alice, bob, 300n);

      engine.transferFrom(bob, alice, carol, 200n);
      expect(ledger.allowance(alice, bob)).toBe(100n);
      expect(ledger.balanceOf(carol)).toBe(200n);

      const error = thrown(() => engine.transferFrom(bob, alice, carol, 200n));
      expect(isInsufficientAllowanceError(error)).toBe(true);
      expect(ledger.allowance(alice, bob)).toBe(100n);
      expect(ledger.balanceOf(alice)).toBe(800n);
    });
  });

  describe("reentrancy", () => {
    it("rejects a transfer started from a transfer listener", () => {
      const { engine, ledger } = makeHarness({
        balances: [{ account: alice, amount: 1000n }],
      });
      let nested: unknown = null;
      const unsubscribe = ledger.onTransfer(() => {
        if (nested === null) {
          nested = thrown(() => engine.transfer(alice, dave, 1n));
        }
      });

      engine.transfer(alice, bob, 10n);
      unsubscribe();

      expect(isReentrantCallError(nested)).toBe(true);
      expect(ledger.balanceOf(bob)).toBe(10n);
      expect(ledger.balanceOf(dave)).toBe(0n);
      engine.transfer(alice, dave, 1n);
      expect(ledger.balanceOf(dave)).toBe(1n);
    });

    it("keeps a committed transfer when a listener throws", () => {
      const warn = vi.fn();
      const error = vi.fn();
      const logger: LoggerLike = { info: vi.fn(), warn, error };
      const { engine, ledger } = makeHarness({
        balances: [{ account: alice, amount: 1000n }],
        logger,
      });
      const heard: bigint[] = [];
      ledger.onTransfer(() => {
        throw new Error("listener failed");
      });
      ledger.onTransfer((notification) => {
        heard.push(notification.amount);
      });

      const receipt = engine.transfer(alice, bob, 10n);

      expect(receipt.fees.net).toBe(10n);
      expect(ledger.balanceOf(bob)).toBe(10n);
      expect(heard).toEqual([10n]);
      expect(engine.snapshot().nextDistributor).toBe("burn");
      expect(error).toHaveBeenCalledWith(
        { from: alice, to: bob, amount: "10", err: expect.any(Error) },
        "Transfer listener failed"
      );
      expect(warn).not.toHaveBeenCalled();
    });
  });
});
