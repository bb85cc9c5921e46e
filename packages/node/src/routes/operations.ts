/**
 * Deposit and withdrawal routes.
 *
 * POST /api/v1/deposits  { asset, amount, user? }
 * POST /api/v1/withdrawals  { asset, amount, user? }
 *
 * The acting user is the X-Caller account. A body `user` naming anyone
 * else is refused. Amounts are decimal strings in the asset's smallest
 * unit; the request id becomes the correlation id of the recorded event.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { sameAddress } from "@strongroom/types";
import type { Address } from "@strongroom/types";
import type { AppEnv } from "../types/api-contract.js";
import { OperationSchema, toBalanceDto } from "../types/dto.js";
import type { OperationDto } from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { readValidatedBody } from "../middleware/validate.js";
import { readCaller } from "../middleware/caller.js";
import type { VaultService } from "../services/vault-service.js";

async function readOperation(
  c: Context<AppEnv>,
): Promise<{ user: Address; body: OperationDto }> {
  const caller = readCaller(c);
  const body = await readValidatedBody(c, OperationSchema);
  if (body.user !== undefined && !sameAddress(body.user, caller)) {
    throw new ApiError("UNAUTHORIZED", 403, "Callers may only operate on their own balance", {
      caller,
      user: body.user,
    });
  }
  return { user: caller, body };
}

export function createOperationRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposits", async (c) => {
    const { user, body } = await readOperation(c);
    const balance = await service.deposit(user, body.asset, body.amount, c.get("requestId"));

    return c.json(
      {
        data: {
          operation: "deposit",
          amount: body.amount.toString(),
          balance: toBalanceDto(user, balance),
        },
      },
      201,
    );
  });

  routes.post("/withdrawals", async (c) => {
    const { user, body } = await readOperation(c);
    const balance = await service.withdraw(user, body.asset, body.amount, c.get("requestId"));

    return c.json(
      {
        data: {
          operation: "withdrawal",
          amount: body.amount.toString(),
          balance: toBalanceDto(user, balance),
        },
      },
      201,
    );
  });

  return routes;
}
