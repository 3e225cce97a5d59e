/**
 * Event query routes.
 *
 * GET /api/v1/events           — List all events (cursor pagination)
 * GET /api/v1/events/:address  — List events for one account
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, ListStreamEventsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events — All events
  routes.get(
    "/",
    requirePermission("read"),
    validateQuery(ListEventsQuerySchema),
    (c) => {
      const query = c.get("validatedQuery");
      const events = c.get("service").readAllEvents(
        query.afterPosition !== undefined
          ? { fromPosition: query.afterPosition + 1 }
          : undefined,
      );

      return c.json(
        paginate(
          events,
          { cursor: query.cursor, limit: query.limit },
          (e) => e.globalPosition,
          "globalPosition",
        ),
      );
    },
  );

  // GET /api/v1/events/:address
  routes.get(
    "/:address",
    requirePermission("read"),
    validateQuery(ListStreamEventsQuerySchema),
    (c) => {
      const query = c.get("validatedQuery");
      const events = c.get("service").readAccountEvents(
        c.req.param("address"),
        query.afterVersion !== undefined
          ? { fromVersion: query.afterVersion + 1 }
          : undefined,
      );

      return c.json(
        paginate(
          events,
          { cursor: query.cursor, limit: query.limit },
          (e) => e.version,
          "version",
        ),
      );
    },
  );

  return routes;
}
