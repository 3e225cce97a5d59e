/**
 * Runtime Type Guards
 *
 * Narrowing functions for Stakewell domain types, used where values
 * cross a boundary (snapshots, deserialized events, API inputs).
 */

import type { Address, StakingEventType } from "./staking.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Staking guards
// =============================================================================

const STAKING_EVENT_TYPES = new Set<string>([
  "staked",
  "unstaked",
  "reward.claimed",
  "tokens.locked",
  "tokens.unlocked",
  "reserve.deposited",
]);

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.trim().length > 0;
}

export function isUnixSeconds(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

/** A non-negative integer written in base-10 digits, e.g. "1000000000000000000". */
export function isBaseUnitString(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

export function isStakingEventType(value: unknown): value is StakingEventType {
  return typeof value === "string" && STAKING_EVENT_TYPES.has(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "node"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
