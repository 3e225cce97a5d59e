/**
 * Ledger routes.
 *
 * GET /api/v1/ledger           — Totals, reserve statistics, conservation
 * GET /api/v1/ledger/snapshot  — Serializable ledger snapshot
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";

export function createLedgerRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    return c.json({ data: c.get("service").getLedger() });
  });

  routes.get("/snapshot", requirePermission("read"), (c) => {
    return c.json({ data: c.get("service").snapshot() });
  });

  return routes;
}
