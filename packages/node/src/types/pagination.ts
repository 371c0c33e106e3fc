/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { field, value }.
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

/** Sort keys are strings (object ids) or numbers (ledger sequences). */
export type CursorValue = string | number;

// =============================================================================
// Cursor Encoding
// =============================================================================

interface CursorData {
  readonly f: string; // field name (compact key)
  readonly v: CursorValue; // last seen value
}

/**
 * Encode a cursor from field name and last seen value.
 */
export function encodeCursor(field: string, value: CursorValue): string {
  const data: CursorData = { f: field, v: value };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen value.
 *
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: CursorValue } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return undefined;
  }
  const f = "f" in data ? data.f : undefined;
  const v = "v" in data ? data.v : undefined;
  if (typeof f !== "string") {
    return undefined;
  }
  if (typeof v === "string" || (typeof v === "number" && Number.isFinite(v))) {
    return { field: f, value: v };
  }
  return undefined;
}

function isAfter(value: CursorValue, cursor: CursorValue): boolean {
  if (typeof value === "number" && typeof cursor === "number") {
    return value > cursor;
  }
  return String(value) > String(cursor);
}

/**
 * Apply cursor-based pagination to a sorted array.
 *
 * Items must be sorted by the cursor field in ascending order.
 * A cursor for a different field is ignored.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getField: (item: T) => CursorValue,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const cursorValue = decoded.value;
      filtered = filtered.filter((item) => isAfter(getField(item), cursorValue));
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data[data.length - 1];
  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getField(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
