/**
 * Staking routes. Every operation acts as the request's caller.
 *
 * POST /api/v1/stake            — Stake base asset
 * POST /api/v1/unstake          — Withdraw staked base asset
 * POST /api/v1/claim            — Mint accrued rewards
 * POST /api/v1/lock             — Start a 30-day vesting lock
 * POST /api/v1/unlock           — Convert the lock into base asset
 * POST /api/v1/reserve/deposit  — Fund the reserve (administrator)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AmountBodySchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller, requirePermission } from "../middleware/auth.js";

export function createStakingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/stake",
    requirePermission("write"),
    requireCaller(),
    validateBody(AmountBodySchema),
    (c) => {
      const position = c.get("service").stake(
        c.get("caller"),
        c.get("validatedBody").amount,
        c.get("requestId"),
      );
      return c.json({ data: position });
    },
  );

  routes.post(
    "/unstake",
    requirePermission("write"),
    requireCaller(),
    validateBody(AmountBodySchema),
    (c) => {
      const position = c.get("service").unstake(
        c.get("caller"),
        c.get("validatedBody").amount,
        c.get("requestId"),
      );
      return c.json({ data: position });
    },
  );

  routes.post("/claim", requirePermission("write"), requireCaller(), (c) => {
    const claimed = c.get("service").claim(c.get("caller"), c.get("requestId"));
    return c.json({ data: claimed });
  });

  routes.post(
    "/lock",
    requirePermission("write"),
    requireCaller(),
    validateBody(AmountBodySchema),
    (c) => {
      const lock = c.get("service").lock(
        c.get("caller"),
        c.get("validatedBody").amount,
        c.get("requestId"),
      );
      return c.json({ data: lock }, 201);
    },
  );

  routes.post("/unlock", requirePermission("write"), requireCaller(), (c) => {
    const quote = c.get("service").unlock(c.get("caller"), c.get("requestId"));
    return c.json({ data: quote });
  });

  // Administrator check happens in the ledger (NOT_AUTHORIZED → 403)
  routes.post(
    "/reserve/deposit",
    requirePermission("write"),
    requireCaller(),
    validateBody(AmountBodySchema),
    (c) => {
      const reserve = c.get("service").depositReserve(
        c.get("caller"),
        c.get("validatedBody").amount,
        c.get("requestId"),
      );
      return c.json({ data: reserve });
    },
  );

  return routes;
}
