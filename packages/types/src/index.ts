/**
 * @stakewell/types — Shared domain types for the Stakewell stack.
 *
 * Used across all Stakewell packages:
 * - Stake positions and vesting locks
 * - Staking events emitted by the ledger
 * - Domain event envelope for the event store
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Staking types
export type {
  Address,
  UnixSeconds,
  StakeAccount,
  VestingLock,
  UnlockQuote,
  StakingEventType,
  StakedEvent,
  UnstakedEvent,
  RewardClaimedEvent,
  TokensLockedEvent,
  TokensUnlockedEvent,
  ReserveDepositedEvent,
  StakingEvent,
} from "./staking.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isAddress,
  isUnixSeconds,
  isBaseUnitString,
  isStakingEventType,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
