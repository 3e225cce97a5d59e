/**
 * @stakewell/ledger — Time-weighted staking ledger with vesting exits.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces the staking invariants:
 * - Accrual is checkpointed before every stake mutation
 * - totalStaked always equals the sum of every stake
 * - At most one vesting lock per address; no partial unlocks
 * - Unlock payouts never exceed the administrator-funded reserve
 * - All arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: a thrown error means nothing was committed
 * - Asset custody lives behind AssetPort, never in the ledger
 */

// Core engine
export { StakeLedger } from "./stake-ledger.js";
export type { StakeLedgerDeps } from "./stake-ledger.js";

// Accrual
export { accruedSince, checkpoint, pendingRewardOf } from "./accrual.js";

// Tables
export { StakeAccountTable, EMPTY_STAKE_ACCOUNT } from "./accounts.js";
export { VestingLockTable, computeUnlock } from "./vesting.js";
export { ReserveManager } from "./reserve.js";
export { ReentrancyGuard } from "./guard.js";

// Assets
export type { AssetPort, RewardAssetPort, AssetErrorCode } from "./asset-port.js";
export { AssetError } from "./asset-port.js";
export { InMemoryAsset } from "./in-memory-asset.js";
export type { InMemoryAssetOptions } from "./in-memory-asset.js";

// Time
export { systemClock, ManualClock } from "./clock.js";

// Fixed point
export { parseUnits, formatUnits } from "./fixed-point.js";

// Types
export type {
  Clock,
  StakeLedgerErrorCode,
  StakingEventHandler,
  SubscriberErrorHandler,
  Subscription,
  ReserveStats,
  ConservationReport,
  StakeAccountRecord,
  VestingLockRecord,
  StakeLedgerSnapshot,
} from "./types.js";

export {
  StakeLedgerError,
  DECIMALS,
  ONE,
  REWARD_RATE,
  SECONDS_PER_DAY,
  LOCK_DURATION,
} from "./types.js";
