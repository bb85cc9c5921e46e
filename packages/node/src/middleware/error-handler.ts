/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (VaultError, OracleError, LedgerError,
 * EventStoreError) to HTTP status codes by their `code`.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { errorCode } from "@strongroom/vault";
import { ApiError, createErrorEnvelope } from "../types/error.js";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Input
  ZERO_AMOUNT: 400,
  UNSUPPORTED_ASSET: 400,
  INVALID_AMOUNT: 400,

  // Authorization
  UNAUTHORIZED: 403,

  // Policy
  INSUFFICIENT_BALANCE: 422,
  PER_TRANSACTION_LIMIT_EXCEEDED: 422,
  GLOBAL_LIMIT_EXCEEDED: 422,
  BANK_CAPITAL_EXCEEDED: 422,

  // Concurrency
  REENTRANT_CALL: 409,
  CONCURRENCY_CONFLICT: 409,

  // Upstream (oracle, settlement rails)
  SETTLEMENT_FAILED: 503,
  ORACLE_STALE: 503,
  ORACLE_COMPROMISED: 503,
  ORACLE_UNAVAILABLE: 503,
};

export function statusFor(err: unknown): ContentfulStatusCode {
  if (err instanceof ApiError) {
    return err.status;
  }
  const code = errorCode(err);
  if (code !== undefined) {
    return STATUS_MAP[code] ?? 500;
  }
  return 500;
}

function detailsOf(err: Error): Readonly<Record<string, unknown>> | undefined {
  if ("details" in err && typeof err.details === "object" && err.details !== null) {
    return { ...err.details };
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  const status = statusFor(err);

  // Don't leak internal details
  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const code = errorCode(err) ?? "INTERNAL_ERROR";
  return c.json(createErrorEnvelope(code, err.message, detailsOf(err)), status);
}
