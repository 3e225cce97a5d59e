/**
 * @stakewell/ledger — Asset ports.
 *
 * The ledger never holds balances itself. Custody of the base asset and
 * issuance of the reward asset live in external fungible-asset ledgers,
 * reached through these interfaces.
 *
 * Contract:
 * - Every call is synchronous and atomic
 * - A failed call throws and moves nothing
 * - `custody` is the address holding assets on the ledger's behalf
 */

import type { Address } from "@stakewell/types";

/**
 * Custody of a fungible asset (the base asset).
 */
export interface AssetPort {
  readonly symbol: string;
  readonly custody: Address;

  balanceOf(address: Address): bigint;

  /** Move `amount` from `from` into custody, consuming `from`'s allowance to custody. */
  pull(from: Address, amount: bigint): void;

  /** Move `amount` from custody to `to`. */
  push(to: Address, amount: bigint): void;
}

/**
 * Custody plus privileged issuance (the reward asset).
 * Only the ledger holds a reference with these capabilities.
 */
export interface RewardAssetPort extends AssetPort {
  mint(to: Address, amount: bigint): void;
  burn(from: Address, amount: bigint): void;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type AssetErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_AMOUNT";

/**
 * Thrown by asset implementations. The ledger translates balance and
 * allowance failures into INSUFFICIENT_ASSET_BALANCE.
 */
export class AssetError extends Error {
  public readonly code: AssetErrorCode;
  public readonly symbol: string;

  constructor(code: AssetErrorCode, symbol: string, message: string) {
    super(message);
    this.name = "AssetError";
    this.code = code;
    this.symbol = symbol;
  }
}
