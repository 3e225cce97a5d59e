/**
 * Authentication middleware.
 *
 * API keys arrive in the X-Api-Key header and are looked up in the
 * configured key registry. Each key acts as one ledger address.
 *
 * With no keys configured the node runs unsecured: every request is
 * treated as admin and the acting address comes from X-Account.
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv, CallerEnv } from "../types/api-contract.js";
import type { AuthContext, Permission, ApiKeyRecord } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACCOUNT_HEADER = "X-Account";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create authentication middleware.
 *
 * Returns 401 if the key is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    const auth: AuthContext = {
      type: "api-key",
      identity: record.key,
      role: record.role,
      address: record.address,
    };
    c.set("auth", auth);
    return next();
  };
}

/**
 * Development/test mode: full permissions, caller from X-Account.
 */
export function unsecuredAuthMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const account = c.req.header(ACCOUNT_HEADER)?.trim();
    c.set("auth", {
      type: "unsecured",
      identity: "anonymous",
      role: "admin",
      address: account === undefined || account === "" ? undefined : account,
    });
    return next();
  };
}

// =============================================================================
// Guards
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER the auth middleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

/**
 * Resolve the ledger address acting on this request.
 * Returns 401 when the request carries none.
 */
export function requireCaller(): MiddlewareHandler<CallerEnv> {
  return async (c, next) => {
    const { address } = c.get("auth");
    if (address === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `No caller address; set ${ACCOUNT_HEADER} or use an API key`),
        401,
      );
    }
    c.set("caller", address);
    return next();
  };
}
