/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code, message, details? } }
 */

import type { AssetErrorCode, StakeLedgerErrorCode } from "@stakewell/ledger";
import type { EventStoreErrorCode } from "@stakewell/event-store";

// =============================================================================
// Error Codes
// =============================================================================

/** Codes raised by the HTTP layer itself. */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

/** Codes carried by errors thrown from the domain packages. */
export type DomainErrorCode = StakeLedgerErrorCode | AssetErrorCode | EventStoreErrorCode;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details !== undefined
    ? { error: { code, message, details } }
    : { error: { code, message } };
}
