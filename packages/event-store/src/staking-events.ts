/**
 * @stakewell/event-store — Staking domain event definitions.
 *
 * Converts the ledger's in-process StakingEvent values into the
 * JSON-safe DomainEvent envelope that the store persists.
 *
 * Naming convention: `stake.<event>`
 * - stake.staked
 * - stake.tokens.unlocked
 * - stake.reserve.deposited
 *
 * Streams are keyed by account: every event lands on the stream of the
 * address that caused it, including the administrator's reserve deposits.
 */

import type { DomainEvent, StakingEvent, StakingEventType } from "@stakewell/types";

// =============================================================================
// Event Types
// =============================================================================

export const STAKING_EVENTS = {
  staked: "stake.staked",
  unstaked: "stake.unstaked",
  "reward.claimed": "stake.reward.claimed",
  "tokens.locked": "stake.tokens.locked",
  "tokens.unlocked": "stake.tokens.unlocked",
  "reserve.deposited": "stake.reserve.deposited",
} as const satisfies Record<StakingEventType, string>;

export type StakingDomainEventType = (typeof STAKING_EVENTS)[StakingEventType];

// =============================================================================
// Payloads
// =============================================================================

/** Payload of every single-amount event. Amounts are base-unit strings. */
export type AmountPayload = {
  readonly account: string;
  readonly amount: string;
  /** Ledger time of the operation, unix seconds */
  readonly at: number;
};

export type TokensUnlockedPayload = {
  readonly account: string;
  readonly payout: string;
  readonly penalty: string;
  readonly at: number;
};

// =============================================================================
// Conversion
// =============================================================================

export interface ToDomainEventOptions {
  readonly eventId: string;
  readonly correlationId: string;
  readonly causationId?: string;
}

/** Stream that holds the events of one account. */
export function accountStreamId(account: string): string {
  return `account-${account}`;
}

/**
 * Wrap a ledger event in the persisted envelope.
 */
export function toDomainEvent(event: StakingEvent, options: ToDomainEventOptions): DomainEvent {
  return {
    type: STAKING_EVENTS[event.type],
    metadata: {
      eventId: options.eventId,
      timestamp: new Date(event.timestamp * 1000).toISOString(),
      actor: event.account,
      correlationId: options.correlationId,
      ...(options.causationId !== undefined ? { causationId: options.causationId } : {}),
      source: "ledger",
    },
    payload: toPayload(event),
  };
}

function toPayload(event: StakingEvent): AmountPayload | TokensUnlockedPayload {
  if (event.type === "tokens.unlocked") {
    return {
      account: event.account,
      payout: event.payout.toString(),
      penalty: event.penalty.toString(),
      at: event.timestamp,
    };
  }
  return {
    account: event.account,
    amount: event.amount.toString(),
    at: event.timestamp,
  };
}
