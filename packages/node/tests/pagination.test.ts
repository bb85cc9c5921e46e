/**
 * Tests for pagination utilities: encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import {
  encodeCursor,
  decodeCursor,
  paginate,
} from "../src/types/pagination.js";

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("decodes what encodeCursor produced", () => {
    expect(decodeCursor(encodeCursor("globalPosition", 42))).toEqual({
      field: "globalPosition",
      value: 42,
    });
  });

  it("returns undefined for invalid base64", () => {
    expect(decodeCursor("!!!not-base64!!!")).toBeUndefined();
  });

  it("returns undefined for valid base64 but invalid JSON", () => {
    const notJson = Buffer.from("not json at all").toString("base64url");
    expect(decodeCursor(notJson)).toBeUndefined();
  });

  it("returns undefined when decoded JSON lacks required fields", () => {
    const missingV = Buffer.from(JSON.stringify({ f: "ok" })).toString("base64url");
    expect(decodeCursor(missingV)).toBeUndefined();

    const missingF = Buffer.from(JSON.stringify({ v: 1 })).toString("base64url");
    expect(decodeCursor(missingF)).toBeUndefined();
  });

  it("returns undefined for a non-integer position", () => {
    const text = Buffer.from(JSON.stringify({ f: "id", v: "3" })).toString("base64url");
    expect(decodeCursor(text)).toBeUndefined();

    const fractional = Buffer.from(JSON.stringify({ f: "id", v: 1.5 })).toString("base64url");
    expect(decodeCursor(fractional)).toBeUndefined();
  });

  it("returns undefined for non-object JSON", () => {
    const num = Buffer.from(JSON.stringify(42)).toString("base64url");
    expect(decodeCursor(num)).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

interface Item {
  position: number;
}

const items: Item[] = [1, 2, 3, 4, 5].map((position) => ({ position }));

const getPosition = (item: Item) => item.position;

describe("paginate", () => {
  it("returns first page with hasMore when items exceed limit", () => {
    const result = paginate(items, { limit: 2 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 1 }, { position: 2 }]);
    expect(result.pagination.hasMore).toBe(true);
    expect(result.pagination.cursor).toBe(encodeCursor("position", 2));
  });

  it("returns all items when limit exceeds array length", () => {
    const result = paginate(items, { limit: 10 }, getPosition, "position");

    expect(result.data).toEqual(items);
    expect(result.pagination.hasMore).toBe(false);
    expect(result.pagination.cursor).toBeNull();
  });

  it("continues after the cursor", () => {
    const cursor = encodeCursor("position", 2);
    const result = paginate(items, { cursor, limit: 2 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 3 }, { position: 4 }]);
    expect(result.pagination.hasMore).toBe(true);
  });

  it("compares positions numerically", () => {
    const many = Array.from({ length: 12 }, (_, i) => ({ position: i + 1 }));
    const cursor = encodeCursor("position", 9);
    const result = paginate(many, { cursor, limit: 5 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 10 }, { position: 11 }, { position: 12 }]);
  });

  it("ignores a cursor for another field", () => {
    const cursor = encodeCursor("version", 4);
    const result = paginate(items, { cursor, limit: 2 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 1 }, { position: 2 }]);
  });

  it("ignores invalid cursor and returns from start", () => {
    const result = paginate(items, { cursor: "garbage", limit: 3 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 1 }, { position: 2 }, { position: 3 }]);
  });

  it("returns empty result for empty items", () => {
    const result = paginate([], { limit: 5 }, getPosition, "position");

    expect(result.data).toEqual([]);
    expect(result.pagination.hasMore).toBe(false);
    expect(result.pagination.cursor).toBeNull();
  });
});
