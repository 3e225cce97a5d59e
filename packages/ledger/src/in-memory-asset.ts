/**
 * @stakewell/ledger — In-memory fungible asset.
 *
 * Balances, allowances and supply held in plain maps. Suitable for:
 * - Unit and integration tests
 * - The development node
 *
 * Implements RewardAssetPort, so the same class serves as the base
 * asset (mint used only by a faucet) and the reward asset.
 */

import type { Address } from "@stakewell/types";
import type { RewardAssetPort } from "./asset-port.js";
import { AssetError } from "./asset-port.js";

export interface InMemoryAssetOptions {
  readonly symbol: string;
  /** Address that pull/push move assets into and out of */
  readonly custody: Address;
}

export class InMemoryAsset implements RewardAssetPort {
  readonly symbol: string;
  readonly custody: Address;

  private readonly _balances = new Map<Address, bigint>();
  private readonly _allowances = new Map<Address, Map<Address, bigint>>();
  private _totalSupply = 0n;

  constructor(options: InMemoryAssetOptions) {
    this.symbol = options.symbol;
    this.custody = options.custody;
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  balanceOf(address: Address): bigint {
    return this._balances.get(address) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(owner)?.get(spender) ?? 0n;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  // ─── Holder Operations ──────────────────────────────────────────────

  /**
   * Set (not add to) the amount `spender` may move out of `owner`'s balance.
   */
  approve(owner: Address, spender: Address, amount: bigint): void {
    this._assertNonNegative(amount);

    let spenders = this._allowances.get(owner);
    if (spenders === undefined) {
      spenders = new Map();
      this._allowances.set(owner, spenders);
    }
    spenders.set(spender, amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this._assertNonNegative(amount);
    this._assertBalance(from, amount);

    this._balances.set(from, this.balanceOf(from) - amount);
    this._balances.set(to, this.balanceOf(to) + amount);
  }

  // ─── Port Operations ────────────────────────────────────────────────

  pull(from: Address, amount: bigint): void {
    this._assertNonNegative(amount);

    const allowed = this.allowance(from, this.custody);
    if (allowed < amount) {
      throw new AssetError(
        "INSUFFICIENT_ALLOWANCE",
        this.symbol,
        `${this.symbol}: allowance ${allowed.toString()} from "${from}" is below ${amount.toString()}`,
      );
    }

    this.transfer(from, this.custody, amount);
    this.approve(from, this.custody, allowed - amount);
  }

  push(to: Address, amount: bigint): void {
    this.transfer(this.custody, to, amount);
  }

  mint(to: Address, amount: bigint): void {
    this._assertNonNegative(amount);

    this._balances.set(to, this.balanceOf(to) + amount);
    this._totalSupply += amount;
  }

  burn(from: Address, amount: bigint): void {
    this._assertNonNegative(amount);
    this._assertBalance(from, amount);

    this._balances.set(from, this.balanceOf(from) - amount);
    this._totalSupply -= amount;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _assertNonNegative(amount: bigint): void {
    if (amount < 0n) {
      throw new AssetError(
        "INVALID_AMOUNT",
        this.symbol,
        `${this.symbol}: amount must be non-negative, got ${amount.toString()}`,
      );
    }
  }

  private _assertBalance(address: Address, amount: bigint): void {
    const balance = this.balanceOf(address);
    if (balance < amount) {
      throw new AssetError(
        "INSUFFICIENT_BALANCE",
        this.symbol,
        `${this.symbol}: balance ${balance.toString()} of "${address}" is below ${amount.toString()}`,
      );
    }
  }
}
