/**
 * Caller identity for user and administrative routes.
 *
 * The caller's address arrives in the X-Caller header. Authorization
 * itself is the vault's job: this only parses the header.
 */

import type { Context } from "hono";
import { isAddress } from "@strongroom/types";
import type { Address } from "@strongroom/types";
import { ApiError } from "../types/error.js";

export const CALLER_HEADER = "X-Caller";

/**
 * @throws {ApiError} 403 when the header is missing, 400 when malformed
 */
export function readCaller(c: Context): Address {
  const caller = c.req.header(CALLER_HEADER);
  if (caller === undefined || caller === "") {
    throw new ApiError("UNAUTHORIZED", 403, `Missing ${CALLER_HEADER} header`);
  }
  if (!isAddress(caller)) {
    throw new ApiError("VALIDATION_ERROR", 400, `${CALLER_HEADER} is not an address`, {
      caller,
    });
  }
  return caller;
}
