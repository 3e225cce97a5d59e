/**
 * @stakewell/ledger — Reward accrual.
 *
 * Lazy, checkpoint-based accrual: the reward owed since the last
 * checkpoint is a pure function of (stored record, now). There is no
 * scheduler; every state-touching operation checkpoints first.
 *
 *   accrued = stakedAmount * elapsed * REWARD_RATE / (SECONDS_PER_DAY * ONE)
 *
 * Division truncates toward zero once per checkpoint.
 */

import type { StakeAccount, UnixSeconds } from "@stakewell/types";
import { ONE, REWARD_RATE, SECONDS_PER_DAY } from "./types.js";

/**
 * Reward accrued between the record's last checkpoint and `now`.
 * A reading earlier than the checkpoint accrues nothing.
 */
export function accruedSince(account: StakeAccount, now: UnixSeconds): bigint {
  if (account.stakedAmount === 0n) {
    return 0n;
  }

  const elapsed = now - account.lastUpdateTime;
  if (elapsed <= 0) {
    return 0n;
  }

  return (account.stakedAmount * BigInt(elapsed) * REWARD_RATE) / (SECONDS_PER_DAY * ONE);
}

/**
 * Commit accrual up to `now`, returning the new record.
 * The input record is not modified.
 */
export function checkpoint(account: StakeAccount, now: UnixSeconds): StakeAccount {
  return {
    stakedAmount: account.stakedAmount,
    unclaimedRewards: account.unclaimedRewards + accruedSince(account, now),
    lastUpdateTime: Math.max(account.lastUpdateTime, now),
  };
}

/**
 * Unclaimed plus would-be-accrued reward, without checkpointing.
 */
export function pendingRewardOf(account: StakeAccount, now: UnixSeconds): bigint {
  return account.unclaimedRewards + accruedSince(account, now);
}
