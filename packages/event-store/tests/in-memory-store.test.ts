/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position
 * - Concurrency: expected version, no_stream, any
 * - Read: forward, backward, from version, max count
 * - ReadAll: global ordering, from position, max count
 * - Subscriptions: stream-specific, global, unsubscribe
 * - Errors: empty append, invalid stream ID, concurrency conflicts
 */

import { describe, it, expect, vi } from "vitest";
import type { DomainEvent } from "@strongroom/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";
import { VAULT_EVENTS, isVaultEventType } from "../src/vault-events.js";

// =============================================================================
// Helpers
// =============================================================================

let seq = 0;

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  seq++;
  return {
    type,
    metadata: {
      eventId: `evt-${seq}`,
      timestamp: "2025-01-01T00:00:00Z",
      actor: "0x00000000000000000000000000000000000000aa",
      correlationId: `corr-${seq}`,
      source: "vault",
    },
    payload: { type, ...payload },
  };
}

function makeEvents(count: number, prefix = "event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}.${i + 1}`));
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();

    const result = store.append("vault", [makeEvent(VAULT_EVENTS.DEPOSIT_RECORDED)]);

    expect(result).toEqual({ streamId: "vault", fromVersion: 1, toVersion: 1, count: 1 });
  });

  it("appends a batch with contiguous versions", () => {
    const store = new InMemoryEventStore();

    store.append("vault", makeEvents(2));
    const result = store.append("vault", makeEvents(3));

    expect(result.fromVersion).toBe(3);
    expect(result.toVersion).toBe(5);
    expect(store.read("vault").map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns global positions across streams", () => {
    const store = new InMemoryEventStore();

    store.append("vault", makeEvents(2));
    store.append("admin", makeEvents(2));
    store.append("vault", [makeEvent("late")]);

    expect(store.readAll().map((e) => e.globalPosition)).toEqual([1, 2, 3, 4, 5]);
    expect(store.globalPosition()).toBe(5);
  });

  it("stores the event body and links it to genesis", () => {
    const store = new InMemoryEventStore();
    store.append("vault", [makeEvent(VAULT_EVENTS.WITHDRAWAL_RECORDED, { amount: "10" })]);

    const [stored] = store.read("vault");

    expect(stored!.event.type).toBe("vault.withdrawal.recorded");
    expect(stored!.event.payload).toEqual({
      type: "vault.withdrawal.recorded",
      amount: "10",
    });
    expect(stored!.previousHash).toBe("genesis");
    expect(stored!.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore();

    expect(() => store.append("vault", [])).toThrow("Cannot append zero events");
  });

  it("rejects an empty stream ID", () => {
    const store = new InMemoryEventStore();

    expect(() => store.append("", [makeEvent("x")])).toThrow(EventStoreError);
  });
});

// =============================================================================
// Concurrency Control
// =============================================================================

describe("concurrency control", () => {
  it("succeeds with the current expectedVersion", () => {
    const store = new InMemoryEventStore();
    store.append("vault", makeEvents(3));

    const result = store.append("vault", [makeEvent("next")], { expectedVersion: 3 });

    expect(result.fromVersion).toBe(4);
  });

  it("fails with a stale expectedVersion", () => {
    const store = new InMemoryEventStore();
    store.append("vault", makeEvents(3));

    expect(() =>
      store.append("vault", [makeEvent("next")], { expectedVersion: 2 }),
    ).toThrow('Stream "vault" is at version 3, expected 2');
  });

  it("honours no_stream", () => {
    const store = new InMemoryEventStore();
    store.append("vault", [makeEvent("first")], { expectedVersion: "no_stream" });

    try {
      store.append("vault", [makeEvent("second")], { expectedVersion: "no_stream" });
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      const storeErr = err as EventStoreError;
      expect(storeErr.code).toBe("CONCURRENCY_CONFLICT");
      expect(storeErr.streamId).toBe("vault");
    }
  });

  it("skips the check with 'any'", () => {
    const store = new InMemoryEventStore();
    store.append("vault", makeEvents(5));

    expect(
      store.append("vault", [makeEvent("x")], { expectedVersion: "any" }).fromVersion,
    ).toBe(6);
  });
});

// =============================================================================
// Read
// =============================================================================

describe("read", () => {
  it("returns an empty array for an unknown stream", () => {
    expect(new InMemoryEventStore().read("nothing")).toEqual([]);
  });

  it("reads from a version with a limit", () => {
    const store = new InMemoryEventStore();
    store.append("vault", makeEvents(10));

    const events = store.read("vault", { fromVersion: 3, maxCount: 2 });

    expect(events.map((e) => e.version)).toEqual([3, 4]);
  });

  it("reads backward from the head by default", () => {
    const store = new InMemoryEventStore();
    store.append("vault", makeEvents(4));

    const events = store.read("vault", { direction: "backward" });

    expect(events.map((e) => e.version)).toEqual([4, 3, 2, 1]);
  });

  it("reads backward from a given version", () => {
    const store = new InMemoryEventStore();
    store.append("vault", makeEvents(5));

    const events = store.read("vault", { fromVersion: 3, direction: "backward" });

    expect(events.map((e) => e.version)).toEqual([3, 2, 1]);
  });

  it("rejects fromVersion below 1", () => {
    const store = new InMemoryEventStore();
    store.append("vault", makeEvents(1));

    expect(() => store.read("vault", { fromVersion: 0 })).toThrow(
      "fromVersion must be >= 1, got 0",
    );
  });
});

describe("readAll", () => {
  it("reads from a global position", () => {
    const store = new InMemoryEventStore();
    store.append("vault", makeEvents(2));
    store.append("admin", makeEvents(2));

    const events = store.readAll({ fromPosition: 2, maxCount: 2 });

    expect(events.map((e) => e.globalPosition)).toEqual([2, 3]);
    expect(events.map((e) => e.streamId)).toEqual(["vault", "admin"]);
  });

  it("reads backward across streams", () => {
    const store = new InMemoryEventStore();
    store.append("vault", makeEvents(2));
    store.append("admin", makeEvents(1));

    expect(
      store.readAll({ direction: "backward" }).map((e) => e.globalPosition),
    ).toEqual([3, 2, 1]);
  });
});

// =============================================================================
// Subscriptions
// =============================================================================

describe("subscriptions", () => {
  it("delivers stream events in order", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribe("vault", handler);

    store.append("vault", makeEvents(2, "dep"));
    store.append("admin", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler.mock.calls.map((c) => c[0].event.type)).toEqual(["dep.1", "dep.2"]);
  });

  it("delivers every stream to global subscribers", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    store.subscribeAll(handler);

    store.append("vault", makeEvents(1));
    store.append("admin", makeEvents(1));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("stops delivery after unsubscribe", () => {
    const store = new InMemoryEventStore();
    const handler = vi.fn();
    const global = vi.fn();
    const sub = store.subscribe("vault", handler);
    const globalSub = store.subscribeAll(global);

    sub.unsubscribe();
    globalSub.unsubscribe();
    store.append("vault", makeEvents(1));

    expect(handler).not.toHaveBeenCalled();
    expect(global).not.toHaveBeenCalled();
  });

  it("reports a failing subscriber without failing the append", () => {
    const onSubscriberError = vi.fn();
    const store = new InMemoryEventStore({ onSubscriberError });
    const later = vi.fn();
    store.subscribeAll(() => {
      throw new Error("sink down");
    });
    store.subscribeAll(later);

    const result = store.append("vault", makeEvents(1));

    expect(result.toVersion).toBe(1);
    expect(later).toHaveBeenCalledTimes(1);
    expect(onSubscriberError).toHaveBeenCalledTimes(1);
    expect(onSubscriberError.mock.calls[0]?.[0]).toEqual(new Error("sink down"));
    expect(onSubscriberError.mock.calls[0]?.[1].globalPosition).toBe(1);
  });

  it("throws SUBSCRIBER_FAILED after storing when no error handler is set", () => {
    const store = new InMemoryEventStore();
    const later = vi.fn();
    store.subscribe("vault", () => {
      throw new Error("sink down");
    });
    store.subscribeAll(later);

    try {
      store.append("vault", makeEvents(1));
      expect.fail("Should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      expect((err as EventStoreError).code).toBe("SUBSCRIBER_FAILED");
      expect((err as EventStoreError).message).toBe(
        "Subscriber failed on event at position 1: sink down",
      );
    }

    expect(later).toHaveBeenCalledTimes(1);
    expect(store.streamVersion("vault")).toBe(1);
    expect(store.verifyIntegrity().valid).toBe(true);
  });
});

// =============================================================================
// Query
// =============================================================================

describe("query", () => {
  it("reports stream existence and version", () => {
    const store = new InMemoryEventStore();
    store.append("vault", makeEvents(2));

    expect(store.streamExists("vault")).toBe(true);
    expect(store.streamExists("admin")).toBe(false);
    expect(store.streamVersion("vault")).toBe(2);
    expect(store.streamVersion("admin")).toBe(0);
  });

  it("starts at global position 0", () => {
    expect(new InMemoryEventStore().globalPosition()).toBe(0);
  });
});

describe("isVaultEventType", () => {
  it("recognises catalogued types", () => {
    expect(isVaultEventType("vault.deposit.recorded")).toBe(true);
    expect(isVaultEventType("vault.ceiling.changed")).toBe(true);
  });

  it("rejects unknown types", () => {
    expect(isVaultEventType("vault.deposit.cancelled")).toBe(false);
  });
});
