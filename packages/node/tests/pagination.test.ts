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
  it("round-trips a string value", () => {
    const cursor = encodeCursor("objectId", "reports/q1");
    expect(decodeCursor(cursor)).toEqual({ field: "objectId", value: "reports/q1" });
  });

  it("round-trips a numeric value", () => {
    const cursor = encodeCursor("sequence", 42);
    expect(decodeCursor(cursor)).toEqual({ field: "sequence", value: 42 });
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

    const missingF = Buffer.from(JSON.stringify({ v: "ok" })).toString("base64url");
    expect(decodeCursor(missingF)).toBeUndefined();
  });

  it("returns undefined for a value that is neither string nor number", () => {
    const bool = Buffer.from(JSON.stringify({ f: "x", v: true })).toString("base64url");
    expect(decodeCursor(bool)).toBeUndefined();
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

const ids = ["a", "b", "c", "d", "e"];
const identity = (id: string) => id;

describe("paginate (string keys)", () => {
  it("returns first page with hasMore when items exceed limit", () => {
    const result = paginate(ids, { limit: 2 }, identity, "objectId");

    expect(result.data).toEqual(["a", "b"]);
    expect(result.pagination.hasMore).toBe(true);
    expect(result.pagination.cursor).toBe(encodeCursor("objectId", "b"));
  });

  it("returns all items when limit exceeds array length", () => {
    const result = paginate(ids, { limit: 10 }, identity, "objectId");

    expect(result.data).toEqual(ids);
    expect(result.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("applies cursor to skip past items", () => {
    const cursor = encodeCursor("objectId", "b");
    const result = paginate(ids, { cursor, limit: 2 }, identity, "objectId");

    expect(result.data).toEqual(["c", "d"]);
    expect(result.pagination.hasMore).toBe(true);
  });

  it("ignores invalid cursor and returns from start", () => {
    const result = paginate(ids, { cursor: "garbage", limit: 3 }, identity, "objectId");
    expect(result.data).toEqual(["a", "b", "c"]);
  });

  it("ignores a cursor issued for another field", () => {
    const cursor = encodeCursor("sequence", 3);
    const result = paginate(ids, { cursor, limit: 2 }, identity, "objectId");
    expect(result.data).toEqual(["a", "b"]);
  });

  it("returns empty result for empty items", () => {
    const result = paginate([], { limit: 5 }, identity, "objectId");

    expect(result.data).toEqual([]);
    expect(result.pagination).toEqual({ cursor: null, hasMore: false });
  });
});

describe("paginate (numeric keys)", () => {
  const records = [1, 2, 3, 9, 10, 11].map((sequence) => ({ sequence }));
  const bySequence = (r: { sequence: number }) => r.sequence;

  it("compares numerically, not as text", () => {
    // As strings "10" < "9"; numerically 10 comes after 9.
    const cursor = encodeCursor("sequence", 9);
    const result = paginate(records, { cursor, limit: 10 }, bySequence, "sequence");

    expect(result.data).toEqual([{ sequence: 10 }, { sequence: 11 }]);
  });

  it("walks every page exactly once", () => {
    const seen: number[] = [];
    let cursor: string | undefined;

    for (;;) {
      const page = paginate(records, { cursor, limit: 4 }, bySequence, "sequence");
      seen.push(...page.data.map(bySequence));
      if (page.pagination.cursor === null) break;
      cursor = page.pagination.cursor;
    }

    expect(seen).toEqual([1, 2, 3, 9, 10, 11]);
  });
});
