/**
 * Balance routes.
 *
 * GET /api/v1/balances/:user  Every non-zero balance of a user
 * GET /api/v1/balances/:user/:asset  One balance (native | stable)
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { Address } from "@strongroom/types";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, AssetNameSchema, toBalanceDto } from "../types/dto.js";
import { ApiError } from "../types/error.js";
import type { VaultService } from "../services/vault-service.js";

function userParam(c: Context<AppEnv>): Address {
  const result = AddressSchema.safeParse(c.req.param("user"));
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "User must be an address", {
      user: c.req.param("user"),
    });
  }
  return result.data;
}

export function createBalanceRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:user", (c) => {
    const user = userParam(c);
    const data = service.balancesOf(user).map((b) => toBalanceDto(user, b));
    return c.json({ data });
  });

  routes.get("/:user/:asset", (c) => {
    const user = userParam(c);
    const asset = AssetNameSchema.safeParse(c.req.param("asset"));
    if (!asset.success) {
      throw new ApiError("NOT_FOUND", 404, `Unknown asset "${c.req.param("asset")}"`);
    }
    return c.json({ data: toBalanceDto(user, service.balanceOf(user, asset.data)) });
  });

  return routes;
}
