/**
 * Staking Types
 *
 * Records owned by the stake ledger and the events it emits.
 *
 * Rules:
 * - All quantities are bigint base units of an 18-decimal fixed-point scale
 * - Both assets share that scale; nothing converts between scales
 * - Timestamps are integer unix seconds
 */

/** An account identifier on either asset ledger. */
export type Address = string;

/** Integer unix time in seconds. */
export type UnixSeconds = number;

/**
 * Per-address staking position.
 * Adjusted only through checkpoint-then-mutate.
 */
export interface StakeAccount {
  /** Base asset currently staked */
  readonly stakedAmount: bigint;

  /** Reward asset accrued up to lastUpdateTime but not yet claimed */
  readonly unclaimedRewards: bigint;

  /** Time of the last accrual checkpoint */
  readonly lastUpdateTime: UnixSeconds;
}

/**
 * Reward asset placed into the 30-day vesting schedule.
 * `amount === 0n` means the address has no active lock.
 */
export interface VestingLock {
  readonly amount: bigint;
  readonly startTime: UnixSeconds;
}

/** Outcome of converting a vesting lock back into the base asset. */
export interface UnlockQuote {
  /** Base asset paid out to the holder */
  readonly payout: bigint;

  /** Reward asset destroyed for exiting early */
  readonly penalty: bigint;

  /** Seconds the lock has been held */
  readonly elapsed: number;

  readonly matured: boolean;
}

// =============================================================================
// Events
// =============================================================================

export type StakingEventType =
  | "staked"
  | "unstaked"
  | "reward.claimed"
  | "tokens.locked"
  | "tokens.unlocked"
  | "reserve.deposited";

interface StakingEventBase<TType extends StakingEventType> {
  readonly type: TType;
  readonly account: Address;
  readonly timestamp: UnixSeconds;
}

export interface StakedEvent extends StakingEventBase<"staked"> {
  readonly amount: bigint;
}

export interface UnstakedEvent extends StakingEventBase<"unstaked"> {
  readonly amount: bigint;
}

export interface RewardClaimedEvent extends StakingEventBase<"reward.claimed"> {
  readonly amount: bigint;
}

export interface TokensLockedEvent extends StakingEventBase<"tokens.locked"> {
  readonly amount: bigint;
}

export interface TokensUnlockedEvent extends StakingEventBase<"tokens.unlocked"> {
  readonly payout: bigint;
  readonly penalty: bigint;
}

export interface ReserveDepositedEvent extends StakingEventBase<"reserve.deposited"> {
  readonly amount: bigint;
}

/**
 * Emitted exactly once per successful ledger operation.
 * Discriminated by `type`.
 */
export type StakingEvent =
  | StakedEvent
  | UnstakedEvent
  | RewardClaimedEvent
  | TokensLockedEvent
  | TokensUnlockedEvent
  | ReserveDepositedEvent;
