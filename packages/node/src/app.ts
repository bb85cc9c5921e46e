/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability; tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import type { VaultService } from "./services/vault-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  createAdminRoutes,
  createBalanceRoutes,
  createEventRoutes,
  createFaucetRoutes,
  createHealthRoutes,
  createOperationRoutes,
  createStatsRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: VaultService;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VaultService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/v1/balances", createBalanceRoutes(service));
  app.route("/api/v1", createOperationRoutes(service));
  app.route("/api/v1", createStatsRoutes(service));
  app.route("/api/v1", createFaucetRoutes(service));
  app.route("/api/v1/events", createEventRoutes(service));
  app.route("/api/v1/admin", createAdminRoutes(service));

  return { app, service };
}
