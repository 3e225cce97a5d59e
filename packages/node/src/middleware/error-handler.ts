/**
 * Global error handler, registered as Hono's onError handler.
 *
 * Domain errors (StakeLedgerError, AssetError, EventStoreError) map to
 * an HTTP status by their `code`. Anything else is a 500 whose message
 * is not echoed back.
 */

import type { Context } from "hono";
import { createErrorEnvelope } from "../types/error.js";
import type { DomainErrorCode } from "../types/error.js";

type DomainErrorStatus = 400 | 403 | 409 | 422;

const STATUS_BY_CODE = {
  // Input
  INVALID_AMOUNT: 400,
  INVALID_ADDRESS: 400,
  INVALID_SNAPSHOT: 400,
  INVALID_STREAM_ID: 400,
  EMPTY_APPEND: 400,
  INVALID_VERSION: 400,

  NOT_AUTHORIZED: 403,

  // Lock state and reentrancy
  LOCK_ALREADY_ACTIVE: 409,
  NO_LOCK_ACTIVE: 409,
  REENTRANT_CALL: 409,

  // Funds
  INSUFFICIENT_STAKE: 422,
  INSUFFICIENT_RESERVE: 422,
  INSUFFICIENT_ASSET_BALANCE: 422,
  NO_REWARD: 422,
  INSUFFICIENT_BALANCE: 422,
  INSUFFICIENT_ALLOWANCE: 422,
} as const satisfies Record<DomainErrorCode, DomainErrorStatus>;

function isDomainErrorCode(code: string): code is DomainErrorCode {
  return Object.hasOwn(STATUS_BY_CODE, code);
}

function domainCodeOf(err: Error): DomainErrorCode | undefined {
  if ("code" in err && typeof err.code === "string" && isDomainErrorCode(err.code)) {
    return err.code;
  }
  return undefined;
}

export function handleError(err: Error, c: Context): Response {
  const code = domainCodeOf(err);
  if (code === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(code, err.message), STATUS_BY_CODE[code]);
}
