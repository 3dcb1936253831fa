/**
 * Tests for pagination utilities — encodeCursor, decodeCursor, paginate.
 */

import { describe, it, expect } from "vitest";
import { decodeCursor, encodeCursor, paginate } from "../src/types/pagination.js";

// =============================================================================
// decodeCursor
// =============================================================================

describe("decodeCursor", () => {
  it("reads back what encodeCursor wrote", () => {
    expect(decodeCursor(encodeCursor("version", 42))).toEqual({ field: "version", position: 42 });
  });

  it("returns undefined for invalid JSON", () => {
    expect(decodeCursor(Buffer.from("not json").toString("base64url"))).toBeUndefined();
  });

  it("returns undefined for a non-numeric position", () => {
    const cursor = Buffer.from(JSON.stringify({ f: "version", p: "42" })).toString("base64url");
    expect(decodeCursor(cursor)).toBeUndefined();
  });

  it("returns undefined for JSON that is not an object", () => {
    expect(decodeCursor(Buffer.from("null").toString("base64url"))).toBeUndefined();
  });
});

// =============================================================================
// paginate
// =============================================================================

describe("paginate", () => {
  const items = Array.from({ length: 12 }, (_, i) => ({ position: i + 1 }));
  const positionOf = (item: { position: number }): number => item.position;

  it("returns the first page and a cursor", () => {
    const page = paginate(items, { limit: 5 }, positionOf, "position");

    expect(page.data.map(positionOf)).toEqual([1, 2, 3, 4, 5]);
    expect(page.pagination.hasMore).toBe(true);
    expect(decodeCursor(page.pagination.cursor ?? "")).toEqual({ field: "position", position: 5 });
  });

  it("orders positions numerically past 9", () => {
    const page = paginate(
      items,
      { cursor: encodeCursor("position", 9), limit: 5 },
      positionOf,
      "position",
    );

    expect(page.data.map(positionOf)).toEqual([10, 11, 12]);
    expect(page.pagination).toEqual({ cursor: null, hasMore: false });
  });

  it("ignores a cursor for another field", () => {
    const page = paginate(
      items,
      { cursor: encodeCursor("version", 9), limit: 2 },
      positionOf,
      "position",
    );
    expect(page.data.map(positionOf)).toEqual([1, 2]);
  });

  it("handles an empty list", () => {
    expect(paginate([], { limit: 5 }, positionOf, "position")).toEqual({
      data: [],
      pagination: { cursor: null, hasMore: false },
    });
  });
});
