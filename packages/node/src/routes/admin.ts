/**
 * Administrative routes.
 *
 * PUT /api/v1/admin/oracle  { address }
 * PUT /api/v1/admin/ceilings/bank-capital  { value }
 * PUT /api/v1/admin/ceilings/global-deposit  { value }
 *
 * The caller is named by the X-Caller header; the vault decides
 * whether that caller is the administrator.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { CeilingName } from "@strongroom/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { SetCeilingSchema, SetOracleSchema, toParametersDto } from "../types/dto.js";
import { readValidatedBody } from "../middleware/validate.js";
import { readCaller } from "../middleware/caller.js";
import type { VaultService } from "../services/vault-service.js";

export function createAdminRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.put("/oracle", async (c) => {
    const caller = readCaller(c);
    const body = await readValidatedBody(c, SetOracleSchema);
    const reference = await service.setOracleReference(caller, body.address, c.get("requestId"));
    return c.json({ data: { oracleReference: reference } });
  });

  const setCeiling = (ceiling: CeilingName) => async (c: Context<AppEnv>) => {
    const caller = readCaller(c);
    const body = await readValidatedBody(c, SetCeilingSchema);
    const params = await service.setCeiling(caller, ceiling, body.value, c.get("requestId"));
    return c.json({ data: toParametersDto(params) });
  };

  routes.put("/ceilings/bank-capital", setCeiling("bankCapital"));
  routes.put("/ceilings/global-deposit", setCeiling("globalDeposit"));

  return routes;
}
