import type { CompleteResult } from "../mcp/types";
import type { Completer, CompletionContext } from "../types/mcp";

/** Most values one `completion/complete` answer may carry. */
export const MAX_COMPLETION_VALUES = 100;

export const EMPTY_COMPLETION: CompleteResult["completion"] = {
  values: [],
  total: 0,
  hasMore: false,
};

/**
 * Candidates that start with `prefix`, in their original order.
 */
export function matchPrefix(candidates: Iterable<string>, prefix: string): string[] {
  return [...candidates].filter((candidate) => candidate.startsWith(prefix));
}

/**
 * Runs the completer registered for `argument`, if any, and caps the answer.
 */
export async function runCompleter(
  completers: Record<string, Completer> | undefined,
  argument: string,
  value: string,
  context: CompletionContext
): Promise<CompleteResult["completion"]> {
  if (!completers || !Object.hasOwn(completers, argument)) {
    return EMPTY_COMPLETION;
  }
  const values = await completers[argument](value, context);
  return {
    values: values.slice(0, MAX_COMPLETION_VALUES),
    total: values.length,
    hasMore: values.length > MAX_COMPLETION_VALUES,
  };
}
