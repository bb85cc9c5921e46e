/**
 * Tests for ReentrancyGuard.
 */

import { describe, it, expect } from "vitest";
import { ReentrancyGuard } from "../src/reentrancy-guard.js";

describe("ReentrancyGuard", () => {
  it("returns the wrapped result and releases the flag", async () => {
    const guard = new ReentrancyGuard();

    await expect(guard.run(async () => 42)).resolves.toBe(42);
    expect(guard.entered).toBe(false);
  });

  it("rejects a nested entry immediately", async () => {
    const guard = new ReentrancyGuard();

    const outcome = await guard.run(async () => {
      expect(guard.entered).toBe(true);
      await expect(guard.run(async () => "inner")).rejects.toMatchObject({
        code: "REENTRANT_CALL",
      });
      return "outer";
    });

    expect(outcome).toBe("outer");
  });

  it("rejects an overlapping call from elsewhere", async () => {
    const guard = new ReentrancyGuard();
    let release: () => void = () => {};
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = guard.run(() => blocked);
    await expect(guard.run(async () => undefined)).rejects.toThrow(
      "Vault operation already in progress",
    );

    release();
    await first;
    expect(guard.entered).toBe(false);
  });

  it("releases the flag when the body throws", async () => {
    const guard = new ReentrancyGuard();

    await expect(
      guard.run(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(guard.entered).toBe(false);
    await expect(guard.run(async () => "again")).resolves.toBe("again");
  });
});
