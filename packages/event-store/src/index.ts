/**
 * @stakewell/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore for tests and the development node
 * - Hash chain helpers for tamper evidence
 * - Staking domain event definitions
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";

// Staking domain events
export { STAKING_EVENTS, accountStreamId, toDomainEvent } from "./staking-events.js";
export type {
  StakingDomainEventType,
  AmountPayload,
  TokensUnlockedPayload,
  ToDomainEventOptions,
} from "./staking-events.js";
