/**
 * Hono application environment types.
 *
 * Define the typed context variables available in route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@stakewell/types";
import type { StakingService } from "../services/staking-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the Stakewell app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The staking service (set at app creation) */
    service: StakingService;

    /** Authentication context (set by auth middleware) */
    auth: AuthContext;
  };
}

/** Environment after requireCaller() has resolved the acting address. */
export interface CallerEnv extends AppEnv {
  Variables: AppEnv["Variables"] & {
    caller: Address;
  };
}

/** Environment after validateBody() has parsed the request body. */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

/** Environment after validateQuery() has parsed the query string. */
export interface ValidatedQueryEnv<T> {
  Variables: {
    validatedQuery: T;
  };
}
