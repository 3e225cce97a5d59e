/**
 * Tests for the reserve manager.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ReserveManager } from "../src/reserve.js";
import { StakeLedgerError } from "../src/types.js";

describe("ReserveManager", () => {
  let reserve: ReserveManager;

  beforeEach(() => {
    reserve = new ReserveManager();
  });

  it("starts empty", () => {
    expect(reserve.stats()).toEqual({ balance: 0n, totalDeposited: 0n, totalPaidOut: 0n });
  });

  it("tracks deposits and payouts", () => {
    reserve.deposit(100n);
    reserve.payOut(30n);
    reserve.deposit(5n);

    expect(reserve.stats()).toEqual({ balance: 75n, totalDeposited: 105n, totalPaidOut: 30n });
  });

  it("rejects a non-positive deposit", () => {
    expect(() => reserve.deposit(0n)).toThrow(StakeLedgerError);
    expect(() => reserve.deposit(-1n)).toThrow(/must be positive/);
  });

  it("covers a payout equal to the balance", () => {
    reserve.deposit(10n);

    expect(() => reserve.assertCovers(10n)).not.toThrow();
    reserve.payOut(10n);
    expect(reserve.balance).toBe(0n);
  });

  it("refuses a payout above the balance without changing it", () => {
    reserve.deposit(10n);

    try {
      reserve.payOut(11n);
      expect.unreachable("payout should be refused");
    } catch (err: unknown) {
      expect(err).toMatchObject({ code: "INSUFFICIENT_RESERVE" });
    }
    expect(reserve.stats()).toEqual({ balance: 10n, totalDeposited: 10n, totalPaidOut: 0n });
  });

  describe("restore", () => {
    it("rebuilds from cumulative counters", () => {
      expect(ReserveManager.restore(50n, 20n).stats()).toEqual({
        balance: 30n,
        totalDeposited: 50n,
        totalPaidOut: 20n,
      });
    });

    it("rejects payouts above deposits", () => {
      expect(() => ReserveManager.restore(5n, 6n)).toThrow(/Inconsistent reserve counters/);
    });

    it("rejects negative counters", () => {
      expect(() => ReserveManager.restore(-1n, 0n)).toThrow(StakeLedgerError);
    });
  });
});
