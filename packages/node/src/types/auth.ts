/**
 * Authentication and authorization types.
 *
 * API keys arrive in the X-Api-Key header. Each key is bound to one
 * ledger address, which becomes the caller of every staking operation.
 *
 * Role hierarchy: admin > staker > viewer
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "staker" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  staker: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function isRole(value: string): value is Role {
  return value === "admin" || value === "staker" || value === "viewer";
}

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context.
 *
 * "unsecured" is used when no API keys are configured (tests, dev):
 * the caller is taken from the X-Account header with full permissions.
 */
export interface AuthContext {
  readonly type: "api-key" | "unsecured";
  readonly identity: string;
  readonly role: Role;
  /** Ledger address acting on this request, if any */
  readonly address: string | undefined;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly address: string;
}
