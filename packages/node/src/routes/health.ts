/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event store hash chain + ledger conservation)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { StakingService } from "../services/staking-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: StakingService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { integrity, conservation, ready } = service.checkReadiness();

    const subsystems: Record<string, SubsystemStatus> = {
      eventStore: integrity.valid
        ? { status: "ok" }
        : {
            status: "down",
            detail: `chainValid=false, errors=${String(integrity.errors.length)}`,
          },
      ledger: conservation.balanced
        ? { status: "ok" }
        : {
            status: "down",
            detail: `totalStaked=${conservation.totalStaked.toString()}, sumOfStakes=${conservation.sumOfStakes.toString()}`,
          },
    };

    const body = {
      status: ready ? "ready" : "not_ready",
      subsystems,
      timestamp: new Date().toISOString(),
    };

    return ready ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
