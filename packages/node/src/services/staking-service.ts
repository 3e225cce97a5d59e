/**
 * StakingService — Composition root for the node.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service owns:
 * - the base and reward assets (in-memory)
 * - the StakeLedger
 * - the event store that records every ledger event
 *
 * Amounts cross this boundary as decimal strings and are converted
 * to base units here.
 */

import { randomUUID } from "node:crypto";
import {
  InMemoryAsset,
  LOCK_DURATION,
  StakeLedger,
  formatUnits,
  parseUnits,
} from "@stakewell/ledger";
import type {
  Clock,
  ConservationReport,
  ReserveStats,
  StakeLedgerSnapshot,
  SubscriberErrorHandler,
} from "@stakewell/ledger";
import {
  InMemoryEventStore,
  accountStreamId,
  toDomainEvent,
} from "@stakewell/event-store";
import type {
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
} from "@stakewell/event-store";
import type { Address, StakeAccount, StakingEvent, UnlockQuote, VestingLock } from "@stakewell/types";
import type {
  AccountView,
  AllowanceView,
  AssetKind,
  LedgerView,
  LockView,
  PositionView,
  ReserveView,
  UnlockView,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface StakingServiceConfig {
  /** Address allowed to fund the reserve */
  readonly administrator: Address;
  /** Address holding both assets on the ledger's behalf */
  readonly custody: Address;
  readonly baseAssetSymbol: string;
  readonly rewardAssetSymbol: string;
  readonly clock?: Clock | undefined;
  /** Receives errors from event subscribers, including the event log's own append */
  readonly onSubscriberError?: SubscriberErrorHandler | undefined;
}

export interface ReadinessReport {
  readonly integrity: EventStoreIntegrityResult;
  readonly conservation: ConservationReport;
  readonly ready: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class StakingService {
  readonly baseAsset: InMemoryAsset;
  readonly rewardAsset: InMemoryAsset;
  readonly ledger: StakeLedger;
  readonly eventStore: InMemoryEventStore;

  /** Correlation ID of the operation currently running, if any */
  private _correlationId: string | undefined;

  constructor(config: StakingServiceConfig) {
    this.baseAsset = new InMemoryAsset({ symbol: config.baseAssetSymbol, custody: config.custody });
    this.rewardAsset = new InMemoryAsset({ symbol: config.rewardAssetSymbol, custody: config.custody });
    this.ledger = new StakeLedger({
      baseAsset: this.baseAsset,
      rewardAsset: this.rewardAsset,
      administrator: config.administrator,
      clock: config.clock,
      onSubscriberError: config.onSubscriberError,
    });
    this.eventStore = new InMemoryEventStore();

    this.ledger.subscribe((event) => this._record(event));
  }

  // ─── Staking ───────────────────────────────────────────────────────

  stake(caller: Address, amount: string, correlationId: string): PositionView {
    const units = parseUnits(amount);
    this._within(correlationId, () => this.ledger.stake(caller, units));
    return this.getPosition(caller);
  }

  unstake(caller: Address, amount: string, correlationId: string): PositionView {
    const units = parseUnits(amount);
    this._within(correlationId, () => this.ledger.unstake(caller, units));
    return this.getPosition(caller);
  }

  claim(caller: Address, correlationId: string): { readonly amount: string } {
    const minted = this._within(correlationId, () => this.ledger.claimReward(caller));
    return { amount: formatUnits(minted) };
  }

  // ─── Vesting ───────────────────────────────────────────────────────

  lock(caller: Address, amount: string, correlationId: string): LockView {
    const units = parseUnits(amount);
    const lock = this._within(correlationId, () => this.ledger.lockTokens(caller, units));
    return toLockView(lock);
  }

  unlock(caller: Address, correlationId: string): UnlockView {
    const quote = this._within(correlationId, () => this.ledger.unlockTokens(caller));
    return toUnlockView(quote);
  }

  // ─── Reserve ───────────────────────────────────────────────────────

  depositReserve(caller: Address, amount: string, correlationId: string): ReserveView {
    const units = parseUnits(amount);
    const stats = this._within(correlationId, () => this.ledger.depositReserve(caller, units));
    return toReserveView(stats);
  }

  // ─── Assets ────────────────────────────────────────────────────────

  /**
   * Set how much of `owner`'s balance the ledger custody may pull.
   */
  approve(asset: AssetKind, owner: Address, amount: string): AllowanceView {
    const port = this._asset(asset);
    port.approve(owner, port.custody, parseUnits(amount));
    return {
      asset: port.symbol,
      owner,
      spender: port.custody,
      allowance: formatUnits(port.allowance(owner, port.custody)),
    };
  }

  /**
   * Faucet: create base asset out of thin air. Administrator only at the route.
   */
  mintBase(to: Address, amount: string): { readonly address: string; readonly balance: string } {
    this.baseAsset.mint(to, parseUnits(amount));
    return { address: to, balance: formatUnits(this.baseAsset.balanceOf(to)) };
  }

  // ─── Queries ───────────────────────────────────────────────────────

  getPosition(address: Address): PositionView {
    return toPositionView(
      address,
      this.ledger.getStakeAccount(address),
      this.ledger.pendingReward(address),
      this.ledger.getUserShare(address),
    );
  }

  getAccount(address: Address): AccountView {
    const lock = this.ledger.getVestingLock(address);
    const preview = this.ledger.previewUnlock(address);
    const custody = this.baseAsset.custody;

    return {
      position: this.getPosition(address),
      lock:
        lock !== undefined && preview !== undefined
          ? { ...toLockView(lock), preview: toUnlockView(preview) }
          : null,
      balances: {
        base: formatUnits(this.baseAsset.balanceOf(address)),
        reward: formatUnits(this.rewardAsset.balanceOf(address)),
      },
      allowances: {
        base: formatUnits(this.baseAsset.allowance(address, custody)),
        reward: formatUnits(this.rewardAsset.allowance(address, this.rewardAsset.custody)),
      },
    };
  }

  getLedger(): LedgerView {
    return {
      administrator: this.ledger.administrator,
      custody: this.baseAsset.custody,
      assets: { base: this.baseAsset.symbol, reward: this.rewardAsset.symbol },
      totalStaked: formatUnits(this.ledger.totalStaked),
      totalLocked: formatUnits(this.ledger.totalLocked),
      reserve: toReserveView(this.ledger.reserveStats),
      accounts: this.ledger.getAccounts().length,
      balanced: this.ledger.verifyConservation().balanced,
    };
  }

  snapshot(): StakeLedgerSnapshot {
    return this.ledger.snapshot();
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readAccountEvents(address: Address, options?: ReadOptions): readonly HashedStoredEvent[] {
    return this.eventStore.read(accountStreamId(address), options);
  }

  // ─── Health & Integrity ────────────────────────────────────────────

  /**
   * Deep readiness: event store hash chain and ledger conservation.
   */
  checkReadiness(): ReadinessReport {
    const integrity = this.eventStore.verifyIntegrity();
    const conservation = this.ledger.verifyConservation();
    return { integrity, conservation, ready: integrity.valid && conservation.balanced };
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private _within<T>(correlationId: string, operation: () => T): T {
    this._correlationId = correlationId;
    try {
      return operation();
    } finally {
      this._correlationId = undefined;
    }
  }

  private _record(event: StakingEvent): void {
    this.eventStore.append(accountStreamId(event.account), [
      toDomainEvent(event, {
        eventId: randomUUID(),
        correlationId: this._correlationId ?? randomUUID(),
      }),
    ]);
  }

  private _asset(kind: AssetKind): InMemoryAsset {
    return kind === "base" ? this.baseAsset : this.rewardAsset;
  }
}

// =============================================================================
// View Mapping
// =============================================================================

function toPositionView(
  address: Address,
  account: StakeAccount,
  pending: bigint,
  share: bigint,
): PositionView {
  return {
    address,
    stakedAmount: formatUnits(account.stakedAmount),
    unclaimedRewards: formatUnits(account.unclaimedRewards),
    pendingReward: formatUnits(pending),
    lastUpdateTime: account.lastUpdateTime,
    share: formatUnits(share),
  };
}

function toLockView(lock: VestingLock): LockView {
  return {
    amount: formatUnits(lock.amount),
    startTime: lock.startTime,
    maturesAt: lock.startTime + Number(LOCK_DURATION),
  };
}

function toUnlockView(quote: UnlockQuote): UnlockView {
  return {
    payout: formatUnits(quote.payout),
    penalty: formatUnits(quote.penalty),
    elapsed: quote.elapsed,
    matured: quote.matured,
  };
}

function toReserveView(stats: ReserveStats): ReserveView {
  return {
    balance: formatUnits(stats.balance),
    totalDeposited: formatUnits(stats.totalDeposited),
    totalPaidOut: formatUnits(stats.totalPaidOut),
  };
}
