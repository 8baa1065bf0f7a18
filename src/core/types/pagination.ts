/**
 * Cursor-based pagination for the operator list views.
 * The cursor is an opaque base64url string wrapping `<createdAt>:<id>` of the
 * last item on the previous page; lists are ordered newest first.
 */

export interface CursorParams {
  readonly cursor?: string | undefined;
  readonly limit: number;
}

export interface PaginatedResult<T> {
  readonly items: readonly T[];
  readonly nextCursor: string | null;
}

export interface CursorPosition {
  readonly createdAt: number;
  readonly id: string;
}

export const encodeCursor = (pos: CursorPosition): string =>
  Buffer.from(`${pos.createdAt}:${pos.id}`, "utf8").toString("base64url");

/** Decode an opaque cursor; null when it was not produced by encodeCursor */
export const decodeCursor = (cursor: string): CursorPosition | null => {
  const raw = Buffer.from(cursor, "base64url").toString("utf8");
  const sep = raw.indexOf(":");
  if (sep <= 0) return null;
  const createdAt = Number(raw.substring(0, sep));
  const id = raw.substring(sep + 1);
  if (!Number.isSafeInteger(createdAt) || id.length === 0) return null;
  return { createdAt, id };
};

/**
 * Build a page from `limit + 1` rows fetched by an adapter: the extra row only
 * signals that another page exists.
 */
export const toPage = <T>(
  rows: readonly T[],
  limit: number,
  position: (row: T) => CursorPosition,
): PaginatedResult<T> => {
  const items = rows.slice(0, limit);
  const last = items[items.length - 1];
  return {
    items,
    nextCursor: rows.length > limit && last !== undefined ? encodeCursor(position(last)) : null,
  };
};
