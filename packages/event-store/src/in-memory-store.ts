/**
 * @stakewell/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - The development node
 *
 * Not suitable for long-term audit (all state lost on process exit).
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events in the stream or store)
 * - Synchronous subscription dispatch
 */

import type { DomainEvent } from "@stakewell/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

/**
 * In-memory event store.
 *
 * All events are stored in two data structures:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - Global array for readAll, integrity checks and subscriptions
 */
export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, HashedStoredEvent[]>();
  private readonly _globalLog: HashedStoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);

    const fromVersion = stream.length + 1;
    const appendedAt = new Date().toISOString();
    const stored: HashedStoredEvent[] = [];

    events.forEach((event, i) => {
      const base: StoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };

      const previousHash = this._lastHash;
      const hashed: HashedStoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = hashed.hash;

      stream.push(hashed);
      this._globalLog.push(hashed);
      stored.push(hashed);
    });

    this._dispatch(stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    this._validateStreamId(streamId);

    const requested = options?.fromVersion;
    if (requested !== undefined && (!Number.isInteger(requested) || requested < 1)) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be an integer >= 1, got ${requested}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    const backward = options?.direction === "backward";
    // Backward reads start from the newest event unless told otherwise.
    const fromVersion = requested ?? (backward ? stream.length : 1);
    const result = backward
      ? stream.filter((e) => e.version <= fromVersion).reverse()
      : stream.filter((e) => e.version >= fromVersion);

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    const backward = options?.direction === "backward";
    // Backward reads start from the newest event unless told otherwise.
    const fromPosition = options?.fromPosition ?? (backward ? this._globalLog.length : 1);

    const result = backward
      ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
      : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);

    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  /** Stream IDs in order of first append. */
  streamIds(): readonly string[] {
    return [...this._streams.keys()];
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.trim().length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _dispatch(events: readonly HashedStoredEvent[]): void {
    for (const handler of this._subscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}

function limit<T>(events: T[], maxCount: number | undefined): T[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
