/**
 * Cursor-based pagination over position-ordered lists.
 *
 * Cursors are base64url-encoded JSON objects `{ f, p }`: the field the
 * list is ordered by and the last position returned.
 * List endpoints return { data, pagination: { cursor, hasMore } }.
 */

// =============================================================================
// Types
// =============================================================================

export interface PaginationQuery {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginationMeta {
  readonly cursor: string | null;
  readonly hasMore: boolean;
}

export interface PaginatedResponse<T> {
  readonly data: readonly T[];
  readonly pagination: PaginationMeta;
}

export interface DecodedCursor {
  readonly field: string;
  readonly position: number;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

export function encodeCursor(field: string, position: number): string {
  return Buffer.from(JSON.stringify({ f: field, p: position })).toString("base64url");
}

/**
 * @returns the decoded cursor, or undefined if it is malformed
 */
export function decodeCursor(cursor: string): DecodedCursor | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null) return undefined;
  const f = "f" in data ? data.f : undefined;
  const p = "p" in data ? data.p : undefined;
  if (typeof f !== "string" || typeof p !== "number" || !Number.isSafeInteger(p)) {
    return undefined;
  }
  return { field: f, position: p };
}

/**
 * Page through items sorted by ascending position.
 *
 * A cursor for a different field is ignored, and so is a malformed one.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  positionOf: (item: T) => number,
  field: string,
): PaginatedResponse<T> {
  const decoded = query.cursor === undefined ? undefined : decodeCursor(query.cursor);
  const after = decoded !== undefined && decoded.field === field ? decoded.position : undefined;
  const remaining = after === undefined ? items : items.filter((item) => positionOf(item) > after);

  // One extra item tells whether another page exists.
  const page = remaining.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data[data.length - 1];

  return {
    data,
    pagination: {
      cursor: hasMore && last !== undefined ? encodeCursor(field, positionOf(last)) : null,
      hasMore,
    },
  };
}
