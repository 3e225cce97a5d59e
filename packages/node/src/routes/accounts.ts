/**
 * Account routes.
 *
 * GET /api/v1/accounts/:address — Position, lock, balances and allowances
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:address", requirePermission("read"), (c) => {
    const account = c.get("service").getAccount(c.req.param("address"));
    return c.json({ data: account });
  });

  return routes;
}
