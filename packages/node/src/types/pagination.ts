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

// =============================================================================
// Cursor Encoding
// =============================================================================

interface CursorData {
  readonly f: string; // field name (compact key)
  readonly v: number; // last seen value
}

/**
 * Encode a cursor from field name and last seen position.
 */
export function encodeCursor(field: string, value: number): string {
  const data: CursorData = { f: field, v: value };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * Decode a cursor into field name and last seen position.
 *
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: number } | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }

  if (
    typeof data === "object" &&
    data !== null &&
    "f" in data &&
    "v" in data &&
    typeof data.f === "string" &&
    typeof data.v === "number" &&
    Number.isSafeInteger(data.v)
  ) {
    return { field: data.f, value: data.v };
  }
  return undefined;
}

/**
 * Apply cursor-based pagination to an array sorted by an integer key.
 *
 * Items must be sorted by the key in ascending order.
 * Returns the page items, next cursor, and hasMore flag.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getKey: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const after = decoded.value;
      filtered = filtered.filter((item) => getKey(item) > after);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data[data.length - 1];
  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getKey(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
