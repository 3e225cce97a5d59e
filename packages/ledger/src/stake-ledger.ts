/**
 * @stakewell/ledger — Core StakeLedger class.
 *
 * Accounts stake the base asset and accrue the reward asset per second
 * of stake. Claimed rewards may be locked into a 30-day vesting schedule
 * that converts back into the base asset, at a linear discount when
 * withdrawn early. Payouts are bounded by an administrator-funded reserve.
 *
 * API surface:
 * - stake() / unstake() — Move base asset in and out of the stake
 * - claimReward() — Mint the accrued reward asset to the caller
 * - lockTokens() / unlockTokens() — Vest reward asset back into base asset
 * - depositReserve() — Administrator funds unlock payouts
 * - pendingReward() / getUserShare() / previewUnlock() — Read-only queries
 * - snapshot() / fromSnapshot() — Persist and restore the ledger state
 *
 * Every mutating operation follows the same protocol:
 *   1. enter the reentrancy guard
 *   2. checkpoint the caller's accrual (staged, not yet stored)
 *   3. validate and stage the mutation
 *   4. call the asset ports
 *   5. commit the staged records and emit one event
 * A throw at any step before 5 leaves the ledger untouched. Subscribers
 * cannot fail a committed operation: their errors go to
 * `onSubscriberError`.
 */

import type {
  Address,
  StakeAccount,
  StakingEvent,
  UnixSeconds,
  UnlockQuote,
  VestingLock,
} from "@stakewell/types";
import { isAddress, isBaseUnitString, isUnixSeconds } from "@stakewell/types";
import { StakeAccountTable } from "./accounts.js";
import { checkpoint, pendingRewardOf } from "./accrual.js";
import type { AssetPort, RewardAssetPort } from "./asset-port.js";
import { AssetError } from "./asset-port.js";
import { systemClock } from "./clock.js";
import { ReentrancyGuard } from "./guard.js";
import { ReserveManager } from "./reserve.js";
import type {
  Clock,
  ConservationReport,
  ReserveStats,
  StakeLedgerSnapshot,
  StakingEventHandler,
  SubscriberErrorHandler,
  Subscription,
} from "./types.js";
import { REWARD_RATE, StakeLedgerError } from "./types.js";
import { VestingLockTable, computeUnlock } from "./vesting.js";

export interface StakeLedgerDeps {
  readonly baseAsset: AssetPort;
  readonly rewardAsset: RewardAssetPort;
  /** The only address allowed to fund the reserve */
  readonly administrator: Address;
  readonly clock?: Clock | undefined;
  /** Receives errors thrown by event subscribers. Defaults to console.error. */
  readonly onSubscriberError?: SubscriberErrorHandler | undefined;
}

export class StakeLedger {
  private readonly _base: AssetPort;
  private readonly _reward: RewardAssetPort;
  private readonly _administrator: Address;
  private readonly _clock: Clock;
  private readonly _onSubscriberError: SubscriberErrorHandler;

  private readonly _accounts = new StakeAccountTable();
  private readonly _locks = new VestingLockTable();
  private _reserve = new ReserveManager();
  private _totalStaked = 0n;

  private readonly _guard = new ReentrancyGuard();
  private readonly _subscribers = new Set<StakingEventHandler>();

  constructor(deps: StakeLedgerDeps) {
    assertAddress(deps.administrator, "administrator");
    if (
      deps.administrator === deps.baseAsset.custody ||
      deps.administrator === deps.rewardAsset.custody
    ) {
      throw new StakeLedgerError(
        "INVALID_ADDRESS",
        `Administrator "${deps.administrator}" cannot be a custody address`,
      );
    }
    this._base = deps.baseAsset;
    this._reward = deps.rewardAsset;
    this._administrator = deps.administrator;
    this._clock = deps.clock ?? systemClock;
    this._onSubscriberError = deps.onSubscriberError ?? reportSubscriberError;
  }

  // ─── Staking ─────────────────────────────────────────────────────────

  /**
   * Stake `amount` of base asset. The caller must have approved the
   * base asset custody for at least `amount`.
   */
  stake(caller: Address, amount: bigint): StakeAccount {
    return this._guard.run("stake", () => {
      this._assertCaller(caller);
      assertPositive(amount, "Stake");

      const now = this._clock.now();
      const current = checkpoint(this._accounts.get(caller), now);
      const next: StakeAccount = { ...current, stakedAmount: current.stakedAmount + amount };

      this._transfer(`Pull of ${this._base.symbol}`, () => this._base.pull(caller, amount));

      this._accounts.set(caller, next);
      this._totalStaked += amount;
      this._emit({ type: "staked", account: caller, amount, timestamp: now });
      return next;
    });
  }

  /**
   * Withdraw `amount` of staked base asset back to the caller.
   */
  unstake(caller: Address, amount: bigint): StakeAccount {
    return this._guard.run("unstake", () => {
      this._assertCaller(caller);
      assertPositive(amount, "Unstake");

      const now = this._clock.now();
      const current = checkpoint(this._accounts.get(caller), now);
      if (amount > current.stakedAmount) {
        throw new StakeLedgerError(
          "INSUFFICIENT_STAKE",
          `Cannot unstake ${amount.toString()}: "${caller}" has ${current.stakedAmount.toString()} staked`,
        );
      }
      const next: StakeAccount = { ...current, stakedAmount: current.stakedAmount - amount };

      this._transfer(`Push of ${this._base.symbol}`, () => this._base.push(caller, amount));

      this._accounts.set(caller, next);
      this._totalStaked -= amount;
      this._emit({ type: "unstaked", account: caller, amount, timestamp: now });
      return next;
    });
  }

  /**
   * Mint every accrued reward to the caller. The only path that mints.
   * Returns the amount minted.
   */
  claimReward(caller: Address): bigint {
    return this._guard.run("claimReward", () => {
      this._assertCaller(caller);

      const now = this._clock.now();
      const current = checkpoint(this._accounts.get(caller), now);
      const reward = current.unclaimedRewards;
      if (reward === 0n) {
        throw new StakeLedgerError("NO_REWARD", `"${caller}" has no reward to claim`);
      }
      const next: StakeAccount = { ...current, unclaimedRewards: 0n };

      this._transfer(`Mint of ${this._reward.symbol}`, () => this._reward.mint(caller, reward));

      this._accounts.set(caller, next);
      this._emit({ type: "reward.claimed", account: caller, amount: reward, timestamp: now });
      return reward;
    });
  }

  // ─── Vesting ─────────────────────────────────────────────────────────

  /**
   * Move `amount` of reward asset into a new vesting lock.
   * Operates on the reward asset only, so no stake checkpoint runs.
   */
  lockTokens(caller: Address, amount: bigint): VestingLock {
    return this._guard.run("lockTokens", () => {
      this._assertCaller(caller);
      assertPositive(amount, "Lock");

      if (this._locks.isActive(caller)) {
        throw new StakeLedgerError(
          "LOCK_ALREADY_ACTIVE",
          `"${caller}" already has an active lock`,
        );
      }
      const now = this._clock.now();

      this._transfer(`Pull of ${this._reward.symbol}`, () => this._reward.pull(caller, amount));

      const lock = this._locks.open(caller, amount, now);
      this._emit({ type: "tokens.locked", account: caller, amount, timestamp: now });
      return lock;
    });
  }

  /**
   * Convert the caller's lock into base asset. Before maturity the
   * linear penalty is burned; the payout always comes from the reserve.
   *
   * On INSUFFICIENT_RESERVE the lock stays in place and may be retried.
   */
  unlockTokens(caller: Address): UnlockQuote {
    return this._guard.run("unlockTokens", () => {
      this._assertCaller(caller);

      const now = this._clock.now();
      const account = checkpoint(this._accounts.get(caller), now);
      const lock = this._locks.get(caller);
      if (lock === undefined) {
        throw new StakeLedgerError("NO_LOCK_ACTIVE", `"${caller}" has no active lock`);
      }

      const quote = computeUnlock(lock, now);
      this._reserve.assertCovers(quote.payout);

      // Both effects are checked up front so that neither runs alone.
      this._assertCustody(this._reward, quote.penalty);
      this._assertCustody(this._base, quote.payout);

      // The push may call out to the recipient; burn only once it has succeeded.
      if (quote.payout > 0n) {
        this._transfer(`Push of ${this._base.symbol}`, () => this._base.push(caller, quote.payout));
      }
      if (quote.penalty > 0n) {
        this._transfer(`Burn of ${this._reward.symbol}`, () =>
          this._reward.burn(this._reward.custody, quote.penalty),
        );
      }

      this._accounts.set(caller, account);
      this._locks.close(caller);
      this._reserve.payOut(quote.payout);
      this._emit({
        type: "tokens.unlocked",
        account: caller,
        payout: quote.payout,
        penalty: quote.penalty,
        timestamp: now,
      });
      return quote;
    });
  }

  // ─── Reserve ─────────────────────────────────────────────────────────

  /**
   * Fund the reserve with `amount` of base asset. Administrator only.
   */
  depositReserve(caller: Address, amount: bigint): ReserveStats {
    return this._guard.run("depositReserve", () => {
      this._assertCaller(caller);
      assertPositive(amount, "Reserve deposit");
      if (caller !== this._administrator) {
        throw new StakeLedgerError(
          "NOT_AUTHORIZED",
          `"${caller}" is not the ledger administrator`,
        );
      }

      const now = this._clock.now();
      const account = checkpoint(this._accounts.get(caller), now);

      this._transfer(`Pull of ${this._base.symbol}`, () => this._base.pull(caller, amount));

      this._accounts.set(caller, account);
      this._reserve.deposit(amount);
      this._emit({ type: "reserve.deposited", account: caller, amount, timestamp: now });
      return this._reserve.stats();
    });
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Unclaimed plus accrued-but-not-checkpointed reward, as of now.
   */
  pendingReward(address: Address): bigint {
    return pendingRewardOf(this._accounts.get(address), this._clock.now());
  }

  /**
   * stakedAmount * REWARD_RATE / totalStaked, or 0 with nothing staked.
   */
  getUserShare(address: Address): bigint {
    if (this._totalStaked === 0n) {
      return 0n;
    }
    return (this._accounts.get(address).stakedAmount * REWARD_RATE) / this._totalStaked;
  }

  getStakeAccount(address: Address): StakeAccount {
    return { ...this._accounts.get(address) };
  }

  getVestingLock(address: Address): VestingLock | undefined {
    const lock = this._locks.get(address);
    return lock !== undefined ? { ...lock } : undefined;
  }

  /**
   * What unlockTokens() would pay out right now, without unlocking.
   */
  previewUnlock(address: Address): UnlockQuote | undefined {
    const lock = this._locks.get(address);
    return lock !== undefined ? computeUnlock(lock, this._clock.now()) : undefined;
  }

  /** Addresses that have a stake record. */
  getAccounts(): readonly Address[] {
    return this._accounts.addresses();
  }

  get totalStaked(): bigint {
    return this._totalStaked;
  }

  get reserve(): bigint {
    return this._reserve.balance;
  }

  get reserveStats(): ReserveStats {
    return this._reserve.stats();
  }

  get totalLocked(): bigint {
    return this._locks.totalLocked();
  }

  get administrator(): Address {
    return this._administrator;
  }

  /**
   * Re-derive totals from the per-account tables and compare them to
   * the incrementally maintained ones.
   */
  verifyConservation(): ConservationReport {
    const sumOfStakes = this._accounts.sumStaked();
    const stats = this._reserve.stats();
    const expectedReserve = stats.totalDeposited - stats.totalPaidOut;

    return {
      totalStaked: this._totalStaked,
      sumOfStakes,
      reserve: stats.balance,
      expectedReserve,
      balanced: sumOfStakes === this._totalStaked && stats.balance === expectedReserve,
    };
  }

  // ─── Subscriptions ───────────────────────────────────────────────────

  /**
   * Receive every event after its operation has committed.
   * Handlers run inside the operation's guard: calling back into a
   * mutating operation fails with REENTRANT_CALL. A handler that throws
   * is reported to `onSubscriberError`; the operation still succeeds and
   * later handlers still run.
   */
  subscribe(handler: StakingEventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): StakeLedgerSnapshot {
    const stats = this._reserve.stats();

    return {
      version: 1,
      accounts: this._accounts.entries().map(([address, account]) => ({
        address,
        stakedAmount: account.stakedAmount.toString(),
        unclaimedRewards: account.unclaimedRewards.toString(),
        lastUpdateTime: account.lastUpdateTime,
      })),
      locks: this._locks.entries().map(([address, lock]) => ({
        address,
        amount: lock.amount.toString(),
        startTime: lock.startTime,
      })),
      totalStaked: this._totalStaked.toString(),
      reserve: {
        balance: stats.balance.toString(),
        totalDeposited: stats.totalDeposited.toString(),
        totalPaidOut: stats.totalPaidOut.toString(),
      },
      createdAt: new Date(this._clock.now() * 1000).toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot. Every record is validated and
   * totalStaked is recomputed; any inconsistency throws INVALID_SNAPSHOT.
   */
  static fromSnapshot(snapshot: StakeLedgerSnapshot, deps: StakeLedgerDeps): StakeLedger {
    if (snapshot.version !== 1) {
      throw new StakeLedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const ledger = new StakeLedger(deps);

    for (const record of snapshot.accounts) {
      if (!isAddress(record.address) || ledger._accounts.has(record.address)) {
        throw new StakeLedgerError(
          "INVALID_SNAPSHOT",
          `Invalid or duplicate account address: "${String(record.address)}"`,
        );
      }
      ledger._accounts.set(record.address, {
        stakedAmount: snapshotAmount(record.stakedAmount, "stakedAmount"),
        unclaimedRewards: snapshotAmount(record.unclaimedRewards, "unclaimedRewards"),
        lastUpdateTime: snapshotTime(record.lastUpdateTime, "lastUpdateTime"),
      });
    }

    for (const record of snapshot.locks) {
      if (!isAddress(record.address) || ledger._locks.isActive(record.address)) {
        throw new StakeLedgerError(
          "INVALID_SNAPSHOT",
          `Invalid or duplicate lock address: "${String(record.address)}"`,
        );
      }
      const amount = snapshotAmount(record.amount, "lock amount");
      if (amount === 0n) {
        throw new StakeLedgerError("INVALID_SNAPSHOT", `Lock for "${record.address}" is empty`);
      }
      ledger._locks.open(record.address, amount, snapshotTime(record.startTime, "startTime"));
    }

    ledger._totalStaked = ledger._accounts.sumStaked();
    if (ledger._totalStaked !== snapshotAmount(snapshot.totalStaked, "totalStaked")) {
      throw new StakeLedgerError(
        "INVALID_SNAPSHOT",
        `totalStaked ${snapshot.totalStaked} does not match the sum of stakes ${ledger._totalStaked.toString()}`,
      );
    }

    ledger._reserve = ReserveManager.restore(
      snapshotAmount(snapshot.reserve.totalDeposited, "reserve.totalDeposited"),
      snapshotAmount(snapshot.reserve.totalPaidOut, "reserve.totalPaidOut"),
    );
    if (ledger._reserve.balance !== snapshotAmount(snapshot.reserve.balance, "reserve.balance")) {
      throw new StakeLedgerError(
        "INVALID_SNAPSHOT",
        `Reserve balance ${snapshot.reserve.balance} does not match deposits minus payouts`,
      );
    }

    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Run an asset-port call, translating balance and allowance failures.
   * Anything else (including REENTRANT_CALL) propagates unchanged.
   */
  private _transfer(description: string, effect: () => void): void {
    try {
      effect();
    } catch (err: unknown) {
      if (
        err instanceof AssetError &&
        (err.code === "INSUFFICIENT_BALANCE" || err.code === "INSUFFICIENT_ALLOWANCE")
      ) {
        throw new StakeLedgerError(
          "INSUFFICIENT_ASSET_BALANCE",
          `${description} failed: ${err.message}`,
          { cause: err },
        );
      }
      throw err;
    }
  }

  private _assertCaller(caller: Address): void {
    assertAddress(caller, "caller");
    if (caller === this._base.custody || caller === this._reward.custody) {
      throw new StakeLedgerError(
        "NOT_AUTHORIZED",
        `Custody address "${caller}" cannot act as a caller`,
      );
    }
  }

  private _assertCustody(port: AssetPort, amount: bigint): void {
    if (amount === 0n) {
      return;
    }
    const held = port.balanceOf(port.custody);
    if (held < amount) {
      throw new StakeLedgerError(
        "INSUFFICIENT_ASSET_BALANCE",
        `Custody holds ${held.toString()} ${port.symbol}, needs ${amount.toString()}`,
      );
    }
  }

  private _emit(event: StakingEvent): void {
    for (const handler of this._subscribers) {
      try {
        handler(event);
      } catch (err: unknown) {
        this._onSubscriberError(err, event);
      }
    }
  }
}

function reportSubscriberError(error: unknown, event: StakingEvent): void {
  // eslint-disable-next-line no-console
  console.error(`Staking event handler failed on "${event.type}":`, error);
}

// ─── Validation Helpers ──────────────────────────────────────────────────

function assertAddress(value: Address, role: string): void {
  if (!isAddress(value)) {
    throw new StakeLedgerError("INVALID_ADDRESS", `Invalid ${role} address: "${String(value)}"`);
  }
}

function assertPositive(amount: bigint, what: string): void {
  if (amount <= 0n) {
    throw new StakeLedgerError(
      "INVALID_AMOUNT",
      `${what} amount must be positive, got ${amount.toString()}`,
    );
  }
}

function snapshotAmount(value: string, field: string): bigint {
  if (!isBaseUnitString(value)) {
    throw new StakeLedgerError("INVALID_SNAPSHOT", `Invalid ${field}: "${String(value)}"`);
  }
  return BigInt(value);
}

function snapshotTime(value: UnixSeconds, field: string): UnixSeconds {
  if (!isUnixSeconds(value)) {
    throw new StakeLedgerError("INVALID_SNAPSHOT", `Invalid ${field}: ${String(value)}`);
  }
  return value;
}
