/**
 * Tests for the event store hash chain: tamper-evident audit log.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@strongroom/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import {
  computeEventHash,
  linkEvent,
  verifyHashChain,
  GENESIS_HASH,
} from "../src/hash-chain.js";
import type { HashedStoredEvent, StoredEvent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2025-01-01T00:00:00Z",
      actor: "0x00000000000000000000000000000000000000aa",
      correlationId: "test",
      source: "vault",
    },
    payload,
  };
}

const base: StoredEvent = {
  event: makeEvent("vault.deposit.recorded", { amount: "100" }),
  streamId: "vault",
  version: 1,
  globalPosition: 1,
  appendedAt: "2025-01-01T00:00:00Z",
};

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(base, GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    expect(computeEventHash(base, GENESIS_HASH)).toBe(
      computeEventHash(base, GENESIS_HASH),
    );
  });

  it("changes when the payload changes", () => {
    const other: StoredEvent = {
      ...base,
      event: makeEvent("vault.deposit.recorded", { amount: "101" }),
    };
    expect(computeEventHash(other, GENESIS_HASH)).not.toBe(
      computeEventHash(base, GENESIS_HASH),
    );
  });

  it("changes when the predecessor changes", () => {
    expect(computeEventHash(base, "abc")).not.toBe(
      computeEventHash(base, GENESIS_HASH),
    );
  });

  it("ignores key order in the payload", () => {
    const a: StoredEvent = { ...base, event: makeEvent("t", { x: "1", y: "2" }) };
    const b: StoredEvent = { ...base, event: makeEvent("t", { y: "2", x: "1" }) };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an empty chain", () => {
    expect(verifyHashChain([])).toEqual({
      valid: true,
      lastVerifiedPosition: 0,
      errors: [],
    });
  });

  it("accepts a chain built by the store", () => {
    const store = new InMemoryEventStore();
    store.append("vault", [makeEvent("a"), makeEvent("b")]);
    store.append("admin", [makeEvent("c")]);

    const result = store.verifyIntegrity();

    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(3);
  });

  it("detects a tampered payload", () => {
    const first = linkEvent(base, GENESIS_HASH);
    const second = linkEvent({ ...base, version: 2, globalPosition: 2 }, first.hash);
    const tampered: HashedStoredEvent = {
      ...second,
      event: makeEvent("vault.deposit.recorded", { amount: "999" }),
    };

    const result = verifyHashChain([first, tampered]);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]!.position).toBe(2);
    expect(result.errors[0]!.reason).toContain("Hash mismatch at position 2");
  });

  it("detects a broken link", () => {
    const first = linkEvent(base, GENESIS_HASH);
    const orphan = linkEvent({ ...base, version: 2, globalPosition: 2 }, "not-the-head");

    const result = verifyHashChain([first, orphan]);

    expect(result.valid).toBe(false);
    expect(result.errors[0]!.reason).toBe(
      `previousHash mismatch at position 2: expected "${first.hash}", got "not-the-head"`,
    );
  });
});
