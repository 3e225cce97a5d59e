/**
 * @stakewell/ledger — Vesting locks and the early-exit penalty curve.
 *
 * A lock converts reward asset back into base asset. Held for the
 * full LOCK_DURATION it pays out 1:1; withdrawn early, the penalty
 * is linear in the time remaining:
 *
 *   penalty = amount * (LOCK_DURATION - elapsed) / LOCK_DURATION
 *   payout  = amount - penalty
 *
 * Rules:
 * - At most one active lock per address
 * - Locks are all-or-nothing: no partial unlocks
 */

import type { Address, UnixSeconds, UnlockQuote, VestingLock } from "@stakewell/types";
import { LOCK_DURATION, StakeLedgerError } from "./types.js";

/**
 * Compute payout and penalty for unlocking `lock` at `now`.
 * Pure: nothing is consumed.
 */
export function computeUnlock(lock: VestingLock, now: UnixSeconds): UnlockQuote {
  const elapsed = Math.max(0, now - lock.startTime);
  const held = BigInt(elapsed);

  if (held >= LOCK_DURATION) {
    return { payout: lock.amount, penalty: 0n, elapsed, matured: true };
  }

  const remaining = LOCK_DURATION - held;
  const penalty = (lock.amount * remaining) / LOCK_DURATION;

  return { payout: lock.amount - penalty, penalty, elapsed, matured: false };
}

export class VestingLockTable {
  private readonly _locks: Map<Address, VestingLock> = new Map();

  /**
   * Get the active lock for an address, or undefined if none.
   */
  get(address: Address): VestingLock | undefined {
    const lock = this._locks.get(address);
    return lock !== undefined && lock.amount > 0n ? lock : undefined;
  }

  isActive(address: Address): boolean {
    return this.get(address) !== undefined;
  }

  /**
   * Open a new lock. Throws if one is already active.
   */
  open(address: Address, amount: bigint, startTime: UnixSeconds): VestingLock {
    if (amount <= 0n) {
      throw new StakeLedgerError("INVALID_AMOUNT", "Lock amount must be positive");
    }
    if (this.isActive(address)) {
      throw new StakeLedgerError(
        "LOCK_ALREADY_ACTIVE",
        `Address "${address}" already has an active lock`,
      );
    }

    const lock: VestingLock = { amount, startTime };
    this._locks.set(address, lock);
    return lock;
  }

  /**
   * Consume the active lock. Throws if none is active.
   */
  close(address: Address): VestingLock {
    const lock = this.get(address);
    if (lock === undefined) {
      throw new StakeLedgerError("NO_LOCK_ACTIVE", `Address "${address}" has no active lock`);
    }

    this._locks.delete(address);
    return lock;
  }

  /** All active locks, in creation order. */
  entries(): readonly (readonly [Address, VestingLock])[] {
    return [...this._locks.entries()];
  }

  /** Reward asset currently held in vesting. */
  totalLocked(): bigint {
    let sum = 0n;
    for (const lock of this._locks.values()) {
      sum += lock.amount;
    }
    return sum;
  }
}
