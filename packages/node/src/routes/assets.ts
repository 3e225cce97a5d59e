/**
 * Asset routes for the in-memory base and reward assets.
 *
 * POST /api/v1/assets/base/mint       — Faucet (admin role)
 * POST /api/v1/assets/:asset/approve  — Caller approves the ledger custody
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AmountBodySchema, AssetKindSchema, MintBodySchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller, requirePermission } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post(
    "/base/mint",
    requirePermission("admin"),
    validateBody(MintBodySchema),
    (c) => {
      const body = c.get("validatedBody");
      const minted = c.get("service").mintBase(body.to, body.amount);
      return c.json({ data: minted });
    },
  );

  routes.post(
    "/:asset/approve",
    requirePermission("write"),
    requireCaller(),
    validateBody(AmountBodySchema),
    (c) => {
      const asset = AssetKindSchema.safeParse(c.req.param("asset"));
      if (!asset.success) {
        return c.json(
          createErrorEnvelope("NOT_FOUND", `Unknown asset '${c.req.param("asset")}'`),
          404,
        );
      }

      const allowance = c.get("service").approve(
        asset.data,
        c.get("caller"),
        c.get("validatedBody").amount,
      );
      return c.json({ data: allowance });
    },
  );

  return routes;
}
