/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import { ADMIN, createTestApp, jsonRequest } from "../setup.js";
import type { RequestLogEntry } from "../../src/middleware/logger.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "log-req-1" }),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "log-req-1",
      caller: undefined,
    });
    expect(entries[0]?.durationMs).toBeGreaterThanOrEqual(0);
  });

  it("logs the status of a failed request", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest(
        "/api/v1/deposits",
        "POST",
        { user: ADMIN, asset: "stable", amount: "0" },
        { "X-Caller": ADMIN },
      ),
    );

    expect(entries).toHaveLength(1);
    expect(entries[0]?.method).toBe("POST");
    expect(entries[0]?.status).toBe(400);
  });

  it("records the caller of admin requests", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(
      jsonRequest("/api/v1/admin/ceilings/bank-capital", "PUT", { value: "1" }, { "X-Caller": ADMIN }),
    );

    expect(entries[0]?.caller).toBe(ADMIN);
    expect(entries[0]?.status).toBe(200);
  });
});
