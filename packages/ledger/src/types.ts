/**
 * @stakewell/ledger — Internal types and constants for the stake ledger.
 *
 * These extend the shared @stakewell/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Stored records are replaced, never mutated in place
 * - Fail-closed: invalid requests throw, never silently succeed
 */

import type { Address, StakingEvent, UnixSeconds } from "@stakewell/types";

// ─── Fixed-Point Constants ───────────────────────────────────────────────

/** Fractional decimal digits shared by the base and reward assets. */
export const DECIMALS = 18;

/** One whole unit in base units (1e18). */
export const ONE = 10n ** 18n;

/** 1 reward unit per staked unit per day, in fixed point. */
export const REWARD_RATE = ONE;

export const SECONDS_PER_DAY = 86_400n;

/** Vesting period after which a lock converts at full value. */
export const LOCK_DURATION = 30n * SECONDS_PER_DAY;

// ─── Time ────────────────────────────────────────────────────────────────

/**
 * Source of "now" for accrual and vesting.
 * Must be monotonic; readings are integer unix seconds.
 */
export interface Clock {
  now(): UnixSeconds;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for stake ledger operations. */
export type StakeLedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INSUFFICIENT_STAKE"
  | "INSUFFICIENT_RESERVE"
  | "INSUFFICIENT_ASSET_BALANCE"
  | "NO_REWARD"
  | "NO_LOCK_ACTIVE"
  | "LOCK_ALREADY_ACTIVE"
  | "NOT_AUTHORIZED"
  | "REENTRANT_CALL"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the stake ledger.
 * A thrown StakeLedgerError means nothing was committed.
 */
export class StakeLedgerError extends Error {
  public readonly code: StakeLedgerErrorCode;

  constructor(code: StakeLedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StakeLedgerError";
    this.code = code;
  }
}

// ─── Subscriptions ───────────────────────────────────────────────────────

export type StakingEventHandler = (event: StakingEvent) => void;

/** Called with whatever a StakingEventHandler threw. */
export type SubscriberErrorHandler = (error: unknown, event: StakingEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// ─── Query Types ─────────────────────────────────────────────────────────

export interface ReserveStats {
  readonly balance: bigint;
  readonly totalDeposited: bigint;
  readonly totalPaidOut: bigint;
}

/**
 * Result of re-deriving the ledger totals from the per-account tables.
 */
export interface ConservationReport {
  readonly totalStaked: bigint;
  readonly sumOfStakes: bigint;
  readonly reserve: bigint;
  /** totalDeposited - totalPaidOut */
  readonly expectedReserve: bigint;
  readonly balanced: boolean;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/** Amounts are base-unit decimal strings so the snapshot is JSON-safe. */
export interface StakeAccountRecord {
  readonly address: Address;
  readonly stakedAmount: string;
  readonly unclaimedRewards: string;
  readonly lastUpdateTime: UnixSeconds;
}

export interface VestingLockRecord {
  readonly address: Address;
  readonly amount: string;
  readonly startTime: UnixSeconds;
}

/**
 * Serializable snapshot of the persisted state surface.
 * Restored with StakeLedger.fromSnapshot().
 */
export interface StakeLedgerSnapshot {
  readonly version: 1;
  readonly accounts: readonly StakeAccountRecord[];
  readonly locks: readonly VestingLockRecord[];
  readonly totalStaked: string;
  readonly reserve: {
    readonly balance: string;
    readonly totalDeposited: string;
    readonly totalPaidOut: string;
  };
  readonly createdAt: string;
}
