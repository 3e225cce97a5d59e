/**
 * Tests for pagination utilities — encodeCursor, decodeCursor, paginate.
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
  it("reads what encodeCursor wrote", () => {
    const cursor = encodeCursor("globalPosition", 42);

    expect(decodeCursor(cursor)).toEqual({ field: "globalPosition", value: 42 });
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
    const text = Buffer.from(JSON.stringify({ f: "version", v: "3" })).toString("base64url");
    expect(decodeCursor(text)).toBeUndefined();

    const fraction = Buffer.from(JSON.stringify({ f: "version", v: 1.5 })).toString("base64url");
    expect(decodeCursor(fraction)).toBeUndefined();
  });

  it("returns undefined for non-object JSON", () => {
    const arr = Buffer.from(JSON.stringify([1, 2])).toString("base64url");
    expect(decodeCursor(arr)).toBeUndefined();

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

const items: Item[] = [2, 3, 5, 9, 10].map((position) => ({ position }));

const getPosition = (item: Item) => item.position;

describe("paginate", () => {
  it("returns first page with hasMore when items exceed limit", () => {
    const result = paginate(items, { limit: 2 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 2 }, { position: 3 }]);
    expect(result.pagination.hasMore).toBe(true);
    expect(result.pagination.cursor).toBe(encodeCursor("position", 3));
  });

  it("returns all items when limit exceeds array length", () => {
    const result = paginate(items, { limit: 10 }, getPosition, "position");

    expect(result.data).toEqual(items);
    expect(result.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("compares positions numerically", () => {
    const cursor = encodeCursor("position", 5);
    const result = paginate(items, { cursor, limit: 10 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 9 }, { position: 10 }]);
  });

  it("applies cursor to skip past items", () => {
    const cursor = encodeCursor("position", 3);
    const result = paginate(items, { cursor, limit: 2 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 5 }, { position: 9 }]);
    expect(result.pagination.hasMore).toBe(true);
  });

  it("ignores a cursor issued for another field", () => {
    const cursor = encodeCursor("version", 9);
    const result = paginate(items, { cursor, limit: 1 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 2 }]);
  });

  it("ignores invalid cursor and returns from start", () => {
    const result = paginate(items, { cursor: "garbage", limit: 3 }, getPosition, "position");

    expect(result.data).toEqual([{ position: 2 }, { position: 3 }, { position: 5 }]);
  });

  it("returns empty result for empty items", () => {
    const result = paginate([], { limit: 5 }, getPosition, "position");

    expect(result.data).toEqual([]);
    expect(result.pagination).toEqual({ cursor: null, hasMore: false });
  });
});
