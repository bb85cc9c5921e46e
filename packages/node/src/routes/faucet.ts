/**
 * Faucet route for nodes running on in-process rails.
 *
 * POST /api/v1/faucet  { asset, amount }
 *
 * Funds the X-Caller account; stable tokens arrive already approved for
 * the vault. Answers 404 when the node has no faucet.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { FaucetSchema } from "../types/dto.js";
import { readValidatedBody } from "../middleware/validate.js";
import { readCaller } from "../middleware/caller.js";
import type { VaultService } from "../services/vault-service.js";

export function createFaucetRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/faucet", async (c) => {
    const caller = readCaller(c);
    const body = await readValidatedBody(c, FaucetSchema);
    await service.fund(caller, body.asset, body.amount);

    return c.json(
      { data: { user: caller, asset: body.asset, amount: body.amount.toString() } },
      201,
    );
  });

  return routes;
}
