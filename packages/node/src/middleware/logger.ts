/**
 * Structured request logging middleware.
 *
 * Hands one entry per request to a log function; main.ts binds it to
 * pino. Entries carry the request id and, when present, the X-Caller account.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CALLER_HEADER } from "./caller.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly caller?: string | undefined;
}

/**
 * Logs method, path, status and duration once the response is ready.
 */
export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      caller: c.req.header(CALLER_HEADER),
    });
  };
}
