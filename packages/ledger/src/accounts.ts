/**
 * @stakewell/ledger — Stake account table.
 *
 * One StakeAccount per address, created implicitly on first write.
 * Records are never deleted; an address that has fully unstaked keeps
 * a zero-stake record with its last checkpoint time.
 */

import type { Address, StakeAccount } from "@stakewell/types";
import { StakeLedgerError } from "./types.js";

/** The record every address starts from. */
export const EMPTY_STAKE_ACCOUNT: StakeAccount = {
  stakedAmount: 0n,
  unclaimedRewards: 0n,
  lastUpdateTime: 0,
};

export class StakeAccountTable {
  private readonly _accounts: Map<Address, StakeAccount> = new Map();

  /**
   * Get the record for an address.
   * Unknown addresses read as the empty record without being inserted.
   */
  get(address: Address): StakeAccount {
    return this._accounts.get(address) ?? EMPTY_STAKE_ACCOUNT;
  }

  has(address: Address): boolean {
    return this._accounts.has(address);
  }

  /**
   * Replace the record for an address.
   * Throws if either balance would be negative.
   */
  set(address: Address, account: StakeAccount): void {
    if (account.stakedAmount < 0n || account.unclaimedRewards < 0n) {
      throw new StakeLedgerError(
        "INVALID_AMOUNT",
        `Stake account "${address}" cannot hold a negative balance`,
      );
    }

    this._accounts.set(address, { ...account });
  }

  addresses(): readonly Address[] {
    return [...this._accounts.keys()];
  }

  entries(): readonly (readonly [Address, StakeAccount])[] {
    return [...this._accounts.entries()];
  }

  /** Sum of every stakedAmount, recomputed from the table. */
  sumStaked(): bigint {
    let sum = 0n;
    for (const account of this._accounts.values()) {
      sum += account.stakedAmount;
    }
    return sum;
  }

  get count(): number {
    return this._accounts.size;
  }
}
