import { z } from "zod";
import { invalidParams } from "../protocol/errors";

const CursorSchema = z.object({
  offset: z.number().int().nonnegative(),
});

export interface Page<T> {
  items: T[];
  nextCursor?: string;
}

export function encodeCursor(offset: number): string {
  return Buffer.from(JSON.stringify({ offset }), "utf8").toString("base64url");
}

/**
 * Reads an opaque cursor back into an offset.
 * @throws McpError InvalidParams when the cursor was not issued by this server
 */
export function decodeCursor(cursor: string): number {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(cursor, "base64url").toString("utf8"));
  } catch {
    throw invalidParams(`Invalid cursor: ${cursor}`);
  }
  const parsed = CursorSchema.safeParse(decoded);
  if (!parsed.success) {
    throw invalidParams(`Invalid cursor: ${cursor}`);
  }
  return parsed.data.offset;
}

export function paginate<T>(
  items: readonly T[],
  cursor: string | undefined,
  pageSize: number
): Page<T> {
  const offset = cursor === undefined ? 0 : decodeCursor(cursor);
  const end = offset + pageSize;
  const page: Page<T> = { items: items.slice(offset, end) };
  if (end < items.length) {
    page.nextCursor = encodeCursor(end);
  }
  return page;
}
