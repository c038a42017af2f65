/**
 * Cursor-based pagination types.
 *
 * Cursors are base64url-encoded JSON objects: { f, v } naming the sort
 * field and the last value seen. Lists are ordered by a numeric key
 * (id, version or global position).
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

export function encodeCursor(field: string, value: number): string {
  const data: CursorData = { f: field, v: value };
  return Buffer.from(JSON.stringify(data)).toString("base64url");
}

/**
 * @returns Decoded cursor, or undefined if the cursor is invalid.
 */
export function decodeCursor(
  cursor: string,
): { field: string; value: number } | undefined {
  try {
    const json = Buffer.from(cursor, "base64url").toString("utf-8");
    const data: unknown = JSON.parse(json);
    if (
      typeof data === "object" &&
      data !== null &&
      "f" in data &&
      "v" in data &&
      typeof data.f === "string" &&
      typeof data.v === "number"
    ) {
      return { field: data.f, value: data.v };
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Apply cursor-based pagination to an array sorted ascending by `getField`.
 * A cursor for another field is ignored.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getField: (item: T) => number,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const cursorValue = decoded.value;
      filtered = filtered.filter((item) => getField(item) > cursorValue);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;

  const last = data.at(-1);
  const cursor =
    hasMore && last !== undefined ? encodeCursor(fieldName, getField(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
