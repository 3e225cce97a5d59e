/**
 * @stakewell/ledger — Fixed-point conversion.
 *
 * Converts between human-readable decimal strings ("12.5") and
 * bigint base units. Both assets use the same 18-decimal scale.
 *
 * Rules:
 * - No floating-point operations
 * - Excess precision is rejected, never rounded
 */

import { DECIMALS, StakeLedgerError } from "./types.js";

/**
 * Parse a non-negative decimal string into base units.
 *
 * "1" → 1000000000000000000n
 * "0.5" → 500000000000000000n
 * "12.000000000000000001" → 12000000000000000001n
 */
export function parseUnits(amount: string, decimals: number = DECIMALS): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new StakeLedgerError("INVALID_AMOUNT", `Invalid amount format: "${amount}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new StakeLedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Render base units as a decimal string, trimming trailing fractional zeros.
 *
 * 1500000000000000000n → "1.5"
 * 100000000000000000000n → "100"
 * 1n → "0.000000000000000001"
 */
export function formatUnits(value: bigint, decimals: number = DECIMALS): string {
  const negative = value < 0n;
  const abs = negative ? -value : value;

  if (decimals === 0) {
    return value.toString();
  }

  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals).replace(/0+$/, "");
  const result = fracPart === "" ? intPart : `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}
