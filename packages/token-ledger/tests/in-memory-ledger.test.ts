// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@dualpool/token-ledger/tests/in-memory-ledger`
 * Purpose: Unit tests for the in-memory ledger, its overlay and the pair stand-in.
 * Scope: Bookkeeping only. Does not involve fees or rewards.
 * Invariants: applyBatch is all-or-nothing; notifications follow a landed batch.
 * Side-effects: none
 * Links: src/adapters/in-memory-ledger.ts, src/overlay.ts
 * @internal
 */

import { toAccount } from "@dualpool/ids";
import { NULL_ACCOUNT } from "@dualpool/ids/well-known";
import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  InMemoryLedger,
  InMemoryPair,
  isInsufficientAllowanceError,
  isInsufficientBalanceError,
  isNullAccountError,
  LedgerOverlay,
  type TransferNotification,
} from "../src/index";

const ALICE = toAccount("0x00000000000000000000000000000000000a11ce");
const BOB = toAccount("0x0000000000000000000000000000000000000b0b");
const CAROL = toAccount("0x00000000000000000000000000000000000ca201");

describe("InMemoryLedger", () => {
  let ledger: InMemoryLedger;

  beforeEach(() => {
    ledger = new InMemoryLedger();
    ledger.mint(ALICE, 1_000n);
  });

  it("mints into balance and supply", () => {
    expect(ledger.balanceOf(ALICE)).toBe(1_000n);
    expect(ledger.totalSupply()).toBe(1_000n);
  });

  it("burns from balance and supply", () => {
    ledger.burn(ALICE, 400n);
    expect(ledger.balanceOf(ALICE)).toBe(600n);
    expect(ledger.totalSupply()).toBe(600n);
  });

  it("rejects burning more than the balance", () => {
    expect(() => ledger.burn(ALICE, 1_001n)).toThrow(
      `Account ${ALICE} holds 1000, needs 1001`
    );
  });

  it("rejects minting to the null account", () => {
    let caught: unknown;
    try {
      ledger.mint(NULL_ACCOUNT, 1n);
    } catch (error) {
      caught = error;
    }
    expect(isNullAccountError(caught)).toBe(true);
  });

  it("applies a batch in order", () => {
    ledger.applyBatch([
      { kind: "transfer", from: ALICE, to: BOB, amount: 300n },
      { kind: "transfer", from: BOB, to: CAROL, amount: 100n },
    ]);
    expect(ledger.balanceOf(ALICE)).toBe(700n);
    expect(ledger.balanceOf(BOB)).toBe(200n);
    expect(ledger.balanceOf(CAROL)).toBe(100n);
    expect(ledger.totalSupply()).toBe(1_000n);
  });

  it("leaves every balance untouched when a later operation fails", () => {
    let caught: unknown;
    try {
      ledger.applyBatch([
        { kind: "transfer", from: ALICE, to: BOB, amount: 300n },
        { kind: "transfer", from: BOB, to: CAROL, amount: 301n },
      ]);
    } catch (error) {
      caught = error;
    }
    expect(isInsufficientBalanceError(caught)).toBe(true);
    expect(ledger.balanceOf(ALICE)).toBe(1_000n);
    expect(ledger.balanceOf(BOB)).toBe(0n);
    expect(ledger.balanceOf(CAROL)).toBe(0n);
  });

  it("spends allowance inside a batch", () => {
    ledger.approve(ALICE, BOB, 500n);
    ledger.applyBatch([
      { kind: "spendAllowance", owner: ALICE, spender: BOB, amount: 200n },
      { kind: "transfer", from: ALICE, to: CAROL, amount: 200n },
    ]);
    expect(ledger.allowance(ALICE, BOB)).toBe(300n);
    expect(ledger.balanceOf(CAROL)).toBe(200n);
  });

  it("rejects overspending an allowance", () => {
    ledger.approve(ALICE, BOB, 50n);
    let caught: unknown;
    try {
      ledger.applyBatch([
        { kind: "spendAllowance", owner: ALICE, spender: BOB, amount: 51n },
      ]);
    } catch (error) {
      caught = error;
    }
    expect(isInsufficientAllowanceError(caught)).toBe(true);
    expect(ledger.allowance(ALICE, BOB)).toBe(50n);
  });

  it("notifies listeners after the batch lands", () => {
    const seen: TransferNotification[] = [];
    const listener = vi.fn((n: TransferNotification) => {
      seen.push(n);
      // balances are already final when the first notification fires
      expect(ledger.balanceOf(CAROL)).toBe(100n);
    });
    ledger.onTransfer(listener);

    ledger.applyBatch([
      { kind: "transfer", from: ALICE, to: BOB, amount: 300n },
      { kind: "transfer", from: BOB, to: CAROL, amount: 100n },
    ]);

    expect(listener).toHaveBeenCalledTimes(2);
    expect(seen).toEqual([
      { from: ALICE, to: BOB, amount: 300n },
      { from: BOB, to: CAROL, amount: 100n },
    ]);
  });

  it("notifies every listener and returns the errors of those that throw", () => {
    const failure = new Error("listener failed");
    const later = vi.fn();
    ledger.onTransfer(() => {
      throw failure;
    });
    ledger.onTransfer(later);

    const failures = ledger.applyBatch([
      { kind: "transfer", from: ALICE, to: BOB, amount: 5n },
    ]);

    expect(later).toHaveBeenCalledWith({ from: ALICE, to: BOB, amount: 5n });
    expect(failures).toEqual([
      { notification: { from: ALICE, to: BOB, amount: 5n }, error: failure },
    ]);
    expect(ledger.balanceOf(BOB)).toBe(5n);
  });

  it("stops notifying after unsubscribe", () => {
    const listener = vi.fn();
    const off = ledger.onTransfer(listener);
    off();
    ledger.applyBatch([
      { kind: "transfer", from: ALICE, to: BOB, amount: 1n },
    ]);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe("LedgerOverlay", () => {
  it("reads through pending operations without touching the base", () => {
    const ledger = new InMemoryLedger();
    ledger.mint(ALICE, 100n);
    const overlay = new LedgerOverlay(ledger);

    overlay.push({ kind: "transfer", from: ALICE, to: BOB, amount: 40n });

    expect(overlay.balanceOf(ALICE)).toBe(60n);
    expect(overlay.balanceOf(BOB)).toBe(40n);
    expect(ledger.balanceOf(ALICE)).toBe(100n);
    expect(overlay.operations()).toHaveLength(1);
  });

  it("does not record a rejected operation", () => {
    const ledger = new InMemoryLedger();
    ledger.mint(ALICE, 10n);
    const overlay = new LedgerOverlay(ledger);

    expect(() =>
      overlay.push({ kind: "transfer", from: ALICE, to: BOB, amount: 11n })
    ).toThrow(/needs 11/);
    expect(overlay.operations()).toEqual([]);
    expect(overlay.balanceOf(ALICE)).toBe(10n);
  });

  it("rejects negative amounts", () => {
    const overlay = new LedgerOverlay(new InMemoryLedger());
    expect(() =>
      overlay.push({ kind: "transfer", from: ALICE, to: BOB, amount: -1n })
    ).toThrow(RangeError);
  });
});

describe("InMemoryPair", () => {
  it("keeps supply equal to the sum of balances", () => {
    const pair = new InMemoryPair(CAROL);
    pair.setBalance(ALICE, 30n);
    pair.setBalance(BOB, 70n);
    pair.setBalance(ALICE, 10n);

    expect(pair.totalSupply()).toBe(80n);
    expect(pair.balanceOf(ALICE)).toBe(10n);
    expect(pair.pairAccount()).toBe(CAROL);
  });
});
