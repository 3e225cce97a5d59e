/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { StakingService } from "./services/staking-service.js";
import type { StakingServiceConfig } from "./services/staking-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, unsecuredAuthMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createStakingRoutes } from "./routes/staking.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createAssetRoutes } from "./routes/assets.js";
import { createLedgerRoutes } from "./routes/ledger.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: StakingServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Auth configuration. When provided, API key auth is enforced. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: StakingService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new StakingService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): caller from X-Account
    app.use("/api/*", unsecuredAuthMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1", createStakingRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/assets", createAssetRoutes());
  app.route("/api/v1/ledger", createLedgerRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
