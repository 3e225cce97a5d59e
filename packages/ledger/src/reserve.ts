/**
 * @stakewell/ledger — Reserve manager.
 *
 * Tracks the base asset set aside to back unlock payouts.
 * Increased only by administrator deposits, decreased only by
 * successful unlocks. Invariant: balance = totalDeposited - totalPaidOut.
 */

import type { ReserveStats } from "./types.js";
import { StakeLedgerError } from "./types.js";

export class ReserveManager {
  private _totalDeposited = 0n;
  private _totalPaidOut = 0n;

  get balance(): bigint {
    return this._totalDeposited - this._totalPaidOut;
  }

  get totalDeposited(): bigint {
    return this._totalDeposited;
  }

  get totalPaidOut(): bigint {
    return this._totalPaidOut;
  }

  /**
   * Throws INSUFFICIENT_RESERVE if `payout` exceeds the balance.
   * Does not modify the reserve.
   */
  assertCovers(payout: bigint): void {
    if (payout > this.balance) {
      throw new StakeLedgerError(
        "INSUFFICIENT_RESERVE",
        `Payout ${payout.toString()} exceeds reserve ${this.balance.toString()}`,
      );
    }
  }

  deposit(amount: bigint): void {
    if (amount <= 0n) {
      throw new StakeLedgerError("INVALID_AMOUNT", "Reserve deposit must be positive");
    }
    this._totalDeposited += amount;
  }

  payOut(amount: bigint): void {
    this.assertCovers(amount);
    this._totalPaidOut += amount;
  }

  stats(): ReserveStats {
    return {
      balance: this.balance,
      totalDeposited: this._totalDeposited,
      totalPaidOut: this._totalPaidOut,
    };
  }

  /**
   * Rebuild a reserve from its cumulative counters.
   */
  static restore(totalDeposited: bigint, totalPaidOut: bigint): ReserveManager {
    if (totalDeposited < 0n || totalPaidOut < 0n || totalPaidOut > totalDeposited) {
      throw new StakeLedgerError(
        "INVALID_SNAPSHOT",
        `Inconsistent reserve counters: deposited=${totalDeposited.toString()}, paidOut=${totalPaidOut.toString()}`,
      );
    }

    const reserve = new ReserveManager();
    reserve._totalDeposited = totalDeposited;
    reserve._totalPaidOut = totalPaidOut;
    return reserve;
  }
}
