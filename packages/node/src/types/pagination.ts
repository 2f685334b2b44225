/**
 * Cursor-based pagination.
 *
 * Cursors are base64url-encoded JSON objects: { f: field, v: value }.
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
  readonly value: string;
}

// =============================================================================
// Cursor Encoding
// =============================================================================

export function encodeCursor(field: string, value: string): string {
  return Buffer.from(JSON.stringify({ f: field, v: value })).toString("base64url");
}

/**
 * @returns Decoded cursor, or undefined if the cursor is malformed.
 */
export function decodeCursor(cursor: string): DecodedCursor | undefined {
  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(cursor, "base64url").toString("utf-8"));
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null || !("f" in data) || !("v" in data)) {
    return undefined;
  }
  const { f, v } = data;
  if (typeof f !== "string" || typeof v !== "string") {
    return undefined;
  }
  return { field: f, value: v };
}

/**
 * Apply cursor-based pagination to a sorted array.
 *
 * Items must be sorted ascending by `getField`. A cursor minted for a
 * different field is ignored, so the first page is returned.
 */
export function paginate<T>(
  items: readonly T[],
  query: PaginationQuery,
  getField: (item: T) => string,
  fieldName: string,
): PaginatedResponse<T> {
  let filtered = items;

  if (query.cursor !== undefined) {
    const decoded = decodeCursor(query.cursor);
    if (decoded !== undefined && decoded.field === fieldName) {
      const after = decoded.value;
      filtered = filtered.filter((item) => getField(item) > after);
    }
  }

  // Fetch one extra to detect hasMore
  const page = filtered.slice(0, query.limit + 1);
  const hasMore = page.length > query.limit;
  const data = hasMore ? page.slice(0, query.limit) : page;
  const last = data.at(-1);

  const cursor = hasMore && last !== undefined ? encodeCursor(fieldName, getField(last)) : null;

  return { data, pagination: { cursor, hasMore } };
}
