/**
 * Event Types
 *
 * Envelope used when staking events leave the ledger for audit
 * and monitoring collaborators.
 *
 * Rules:
 * - Events are immutable after creation
 * - Payloads are JSON-safe (amounts as decimal strings, never bigint)
 * - No UPDATE, no DELETE; only new events
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address whose call produced this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID for grouping related events (e.g. one HTTP request) */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "ledger" | "node";
}

/**
 * A domain event, discriminated by `type`
 * (e.g. "stake.staked", "stake.tokens.unlocked").
 */
export interface DomainEvent {
  readonly type: string;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<Record<string, unknown>>;
}
