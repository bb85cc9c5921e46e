/**
 * Audit log routes.
 *
 * GET /api/v1/events  The vault's audit stream (cursor pagination)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, toEventDto } from "../types/dto.js";
import { readValidatedQuery } from "../middleware/validate.js";
import type { VaultService } from "../services/vault-service.js";

export function createEventRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = readValidatedQuery(c, ListEventsQuerySchema);
    const events = service.readEvents(query.afterPosition);

    const page = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.globalPosition,
      "globalPosition",
    );

    return c.json({ data: page.data.map(toEventDto), pagination: page.pagination });
  });

  return routes;
}
