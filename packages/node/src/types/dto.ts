/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each request DTO has a Zod schema and a derived TypeScript type.
 * Amounts travel as decimal strings in whole-token units ("12.5").
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Non-negative decimal string; precision is checked against the asset scale. */
export const AmountSchema = z
  .string()
  .trim()
  .regex(/^\d+(\.\d+)?$/, "Amount must be a non-negative decimal string");

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Staking DTOs
// =============================================================================

export const AmountBodySchema = z.object({
  amount: AmountSchema,
});

export type AmountBodyDto = z.infer<typeof AmountBodySchema>;

// =============================================================================
// Asset DTOs
// =============================================================================

export const AssetKindSchema = z.enum(["base", "reward"]);

export type AssetKind = z.infer<typeof AssetKindSchema>;

export const MintBodySchema = z.object({
  to: z.string().trim().min(1),
  amount: AmountSchema,
});

export type MintBodyDto = z.infer<typeof MintBodySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.infer<typeof ListStreamEventsQuerySchema>;

// =============================================================================
// Response Views
// =============================================================================

export interface PositionView {
  readonly address: string;
  readonly stakedAmount: string;
  readonly unclaimedRewards: string;
  /** Unclaimed plus accrued since the last checkpoint */
  readonly pendingReward: string;
  readonly lastUpdateTime: number;
  /** stakedAmount / totalStaked, scaled by the reward rate */
  readonly share: string;
}

export interface LockView {
  readonly amount: string;
  readonly startTime: number;
  readonly maturesAt: number;
}

export interface UnlockView {
  readonly payout: string;
  readonly penalty: string;
  readonly elapsed: number;
  readonly matured: boolean;
}

export interface ReserveView {
  readonly balance: string;
  readonly totalDeposited: string;
  readonly totalPaidOut: string;
}

export interface BalancesView {
  readonly base: string;
  readonly reward: string;
}

export interface AccountView {
  readonly position: PositionView;
  readonly lock: (LockView & { readonly preview: UnlockView }) | null;
  readonly balances: BalancesView;
  readonly allowances: BalancesView;
}

export interface LedgerView {
  readonly administrator: string;
  readonly custody: string;
  readonly assets: { readonly base: string; readonly reward: string };
  readonly totalStaked: string;
  readonly totalLocked: string;
  readonly reserve: ReserveView;
  readonly accounts: number;
  readonly balanced: boolean;
}

export interface AllowanceView {
  readonly asset: string;
  readonly owner: string;
  readonly spender: string;
  readonly allowance: string;
}
