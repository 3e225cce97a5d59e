/**
 * Tests for vesting locks and the early-exit penalty curve.
 *
 * Covers:
 * - Penalty at maturity, before maturity and at the boundaries
 * - One active lock per address
 * - Lock consumption
 */

import { describe, it, expect, beforeEach } from "vitest";
import { VestingLockTable, computeUnlock } from "../src/vesting.js";
import { LOCK_DURATION, StakeLedgerError } from "../src/types.js";

const E18 = 10n ** 18n;
const DAY = 86_400;
const START = 1_700_000_000;
const LOCK = { amount: 50n * E18, startTime: START };

describe("computeUnlock", () => {
  it.each([
    { days: 0, penalty: 50n * E18, payout: 0n },
    { days: 10, penalty: 33_333_333_333_333_333_333n, payout: 16_666_666_666_666_666_667n },
    { days: 15, penalty: 25n * E18, payout: 25n * E18 },
    { days: 24, penalty: 10n * E18, payout: 40n * E18 },
  ])("applies the linear penalty after $days days", ({ days, penalty, payout }) => {
    const quote = computeUnlock(LOCK, START + days * DAY);

    expect(quote).toEqual({ payout, penalty, elapsed: days * DAY, matured: false });
  });

  it("matures at exactly the lock duration", () => {
    expect(computeUnlock(LOCK, START + Number(LOCK_DURATION))).toEqual({
      payout: 50n * E18,
      penalty: 0n,
      elapsed: 30 * DAY,
      matured: true,
    });
  });

  it("penalizes one second before maturity", () => {
    const quote = computeUnlock(LOCK, START + 30 * DAY - 1);

    expect(quote.matured).toBe(false);
    expect(quote.penalty).toBe(19_290_123_456_790n);
    expect(quote.payout).toBe(49_999_980_709_876_543_210n);
  });

  it("pays in full long after maturity", () => {
    expect(computeUnlock(LOCK, START + 365 * DAY).payout).toBe(50n * E18);
  });

  it("treats a clock reading before the start as zero elapsed", () => {
    expect(computeUnlock(LOCK, START - 100)).toEqual({
      payout: 0n,
      penalty: 50n * E18,
      elapsed: 0,
      matured: false,
    });
  });

  it("always splits the full amount", () => {
    for (const seconds of [1, 7, 3_599, 86_401, 2_000_000]) {
      const quote = computeUnlock({ amount: 1_000_003n, startTime: 0 }, seconds);
      expect(quote.payout + quote.penalty).toBe(1_000_003n);
    }
  });
});

describe("VestingLockTable", () => {
  let table: VestingLockTable;

  beforeEach(() => {
    table = new VestingLockTable();
  });

  it("opens a lock", () => {
    const lock = table.open("alice", 5n, START);

    expect(lock).toEqual({ amount: 5n, startTime: START });
    expect(table.get("alice")).toEqual({ amount: 5n, startTime: START });
    expect(table.isActive("alice")).toBe(true);
    expect(table.totalLocked()).toBe(5n);
  });

  it("rejects a non-positive amount", () => {
    expect(() => table.open("alice", 0n, START)).toThrow(StakeLedgerError);
    expect(table.isActive("alice")).toBe(false);
  });

  it("rejects a second active lock", () => {
    table.open("alice", 5n, START);

    try {
      table.open("alice", 1n, START + 1);
      expect.unreachable("second lock should be rejected");
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(StakeLedgerError);
      expect(err).toMatchObject({ code: "LOCK_ALREADY_ACTIVE" });
    }
    expect(table.get("alice")).toEqual({ amount: 5n, startTime: START });
  });

  it("closes a lock and frees the slot", () => {
    table.open("alice", 5n, START);

    expect(table.close("alice")).toEqual({ amount: 5n, startTime: START });
    expect(table.get("alice")).toBeUndefined();
    expect(table.entries()).toEqual([]);
    expect(table.totalLocked()).toBe(0n);

    table.open("alice", 9n, START + DAY);
    expect(table.get("alice")).toEqual({ amount: 9n, startTime: START + DAY });
  });

  it("rejects closing when no lock is active", () => {
    expect(() => table.close("alice")).toThrow(/no active lock/);
  });

  it("keeps locks per address", () => {
    table.open("alice", 5n, START);
    table.open("bob", 7n, START + 1);

    expect(table.entries()).toEqual([
      ["alice", { amount: 5n, startTime: START }],
      ["bob", { amount: 7n, startTime: START + 1 }],
    ]);
    expect(table.totalLocked()).toBe(12n);
  });
});
