/**
 * Tests for the stake account table.
 *
 * Covers:
 * - Implicit empty records
 * - Replace-on-write semantics
 * - Negative balance rejection
 * - Re-derived totals
 */

import { describe, it, expect, beforeEach } from "vitest";
import { StakeAccountTable, EMPTY_STAKE_ACCOUNT } from "../src/accounts.js";
import { StakeLedgerError } from "../src/types.js";

// ─── Tests ───────────────────────────────────────────────────────────────

describe("StakeAccountTable", () => {
  let table: StakeAccountTable;

  beforeEach(() => {
    table = new StakeAccountTable();
  });

  describe("get", () => {
    it("reads an unknown address as the empty record", () => {
      expect(table.get("alice")).toEqual({ stakedAmount: 0n, unclaimedRewards: 0n, lastUpdateTime: 0 });
      expect(table.get("alice")).toBe(EMPTY_STAKE_ACCOUNT);
    });

    it("does not insert on read", () => {
      table.get("alice");
      expect(table.has("alice")).toBe(false);
      expect(table.count).toBe(0);
    });
  });

  describe("set", () => {
    it("stores a copy of the record", () => {
      const record = { stakedAmount: 5n, unclaimedRewards: 1n, lastUpdateTime: 100 };
      table.set("alice", record);

      const stored = table.get("alice");
      expect(stored).toEqual(record);
      expect(stored).not.toBe(record);
    });

    it("replaces an existing record", () => {
      table.set("alice", { stakedAmount: 5n, unclaimedRewards: 0n, lastUpdateTime: 100 });
      table.set("alice", { stakedAmount: 2n, unclaimedRewards: 3n, lastUpdateTime: 200 });

      expect(table.get("alice")).toEqual({ stakedAmount: 2n, unclaimedRewards: 3n, lastUpdateTime: 200 });
      expect(table.count).toBe(1);
    });

    it("rejects a negative stake", () => {
      expect(() =>
        table.set("alice", { stakedAmount: -1n, unclaimedRewards: 0n, lastUpdateTime: 0 }),
      ).toThrow(StakeLedgerError);
      expect(table.has("alice")).toBe(false);
    });

    it("rejects negative unclaimed rewards", () => {
      expect(() =>
        table.set("alice", { stakedAmount: 0n, unclaimedRewards: -1n, lastUpdateTime: 0 }),
      ).toThrow(/negative balance/);
    });
  });

  describe("totals", () => {
    it("sums every stake", () => {
      table.set("alice", { stakedAmount: 5n, unclaimedRewards: 9n, lastUpdateTime: 0 });
      table.set("bob", { stakedAmount: 7n, unclaimedRewards: 0n, lastUpdateTime: 0 });
      table.set("carol", { stakedAmount: 0n, unclaimedRewards: 4n, lastUpdateTime: 0 });

      expect(table.sumStaked()).toBe(12n);
    });

    it("lists addresses in insertion order", () => {
      table.set("bob", EMPTY_STAKE_ACCOUNT);
      table.set("alice", EMPTY_STAKE_ACCOUNT);

      expect(table.addresses()).toEqual(["bob", "alice"]);
      expect(table.entries().map(([address]) => address)).toEqual(["bob", "alice"]);
    });
  });
});
