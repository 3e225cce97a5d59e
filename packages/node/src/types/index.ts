/**
 * Type barrel — re-exports all public types from @stakewell/node.
 */

// DTOs
export {
  AmountSchema,
  PaginationQuerySchema,
  AmountBodySchema,
  AssetKindSchema,
  MintBodySchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  AmountBodyDto,
  AssetKind,
  MintBodyDto,
  ListEventsQuery,
  ListStreamEventsQuery,
  PositionView,
  LockView,
  UnlockView,
  ReserveView,
  BalancesView,
  AccountView,
  LedgerView,
  AllowanceView,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, DomainErrorCode, ErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv, CallerEnv, ValidatedEnv, ValidatedQueryEnv } from "./api-contract.js";
