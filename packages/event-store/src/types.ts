/**
 * @stakewell/event-store — Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by hash
 * - Subscriptions enable reactive consumers
 */

import type { DomainEvent, EventMetadata } from "@stakewell/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store, before hash linking.
 *
 * Wraps a DomainEvent with store-level metadata:
 * - streamId: which stream this event belongs to
 * - version: monotonically increasing position within the stream
 * - globalPosition: monotonically increasing position across all streams
 */
export interface StoredEvent {
  /** The domain event */
  readonly event: Readonly<{
    readonly type: string;
    readonly metadata: EventMetadata;
    readonly payload: Readonly<Record<string, unknown>>;
  }>;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, monotonically increasing) */
  readonly version: number;

  /** Position across all streams (1-based, monotonically increasing) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A stored event linked into the hash chain.
 */
export interface HashedStoredEvent extends StoredEvent {
  /** SHA-256 over the canonical event content and previousHash */
  readonly hash: string;

  /** Hash of the preceding event, or GENESIS_HASH */
  readonly previousHash: string;
}

/**
 * Result of an append operation.
 */
export interface AppendResult {
  readonly streamId: string;

  /** Version of the first event appended */
  readonly fromVersion: number;

  /** Version of the last event appended (current stream head) */
  readonly toVersion: number;

  readonly count: number;
}

// =============================================================================
// Read Options
// =============================================================================

export type ReadDirection = "forward" | "backward";

/**
 * Options for reading events from a stream.
 */
export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Reading direction. Default: "forward" */
  readonly direction?: ReadDirection;
}

/**
 * Options for reading events across all streams.
 */
export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Reading direction. Default: "forward" */
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: HashedStoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  /** Global position of the offending event */
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose hash was checked */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - Subscribers see events in global order
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError on an empty stream ID or an empty batch
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /**
   * Read events from a single stream.
   * Returns an empty array if the stream does not exist.
   */
  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[];

  /** Read events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[];

  /** Subscribe to every new event on any stream. */
  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event in the stream, or 0. */
  streamVersion(streamId: string): number;

  /** Position of the last event in the store, or 0. */
  globalPosition(): number;

  /** Recompute and check every link of the hash chain. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
