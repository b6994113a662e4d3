import type { CallToolResult } from "../mcp/types";

/**
 * Plain text tool result
 */
export function textResult(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

/**
 * Tool result carrying a human-readable summary plus the same data as
 * `structuredContent`.
 */
export function structuredResult(
  summary: string,
  data: Record<string, unknown>
): CallToolResult {
  return {
    content: [{ type: "text", text: summary }],
    structuredContent: data,
  };
}
