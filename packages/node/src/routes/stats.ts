/**
 * Vault-wide views.
 *
 * GET /api/v1/stats  Totals, counters, ceilings, oracle reference
 * GET /api/v1/holdings  What the vault holds, valued at a fresh price
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { toHoldingsDto, toParametersDto, toTotalsDto } from "../types/dto.js";
import type { VaultService } from "../services/vault-service.js";

export function createStatsRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/stats", (c) => {
    const stats = service.stats();
    return c.json({
      data: {
        ...toTotalsDto(stats.totals),
        parameters: toParametersDto(stats.parameters),
        oracleReference: stats.oracleReference,
      },
    });
  });

  routes.get("/holdings", async (c) => {
    const held = await service.holdings();
    return c.json({ data: toHoldingsDto(held) });
  });

  return routes;
}
