import {
  CompleteParamsSchema,
  Methods,
  type CompleteResult,
} from "../mcp/types";
import { parseParams } from "../protocol/errors";
import type { HandlerDeps, MethodHandlers } from "./types";

/**
 * Handles 'completion/complete' for prompt arguments and URI template variables.
 */
export function createCompletionHandlers({
  registries,
}: HandlerDeps): MethodHandlers {
  const { prompts, resources } = registries;

  return {
    [Methods.CompletionComplete]: async (rawParams): Promise<CompleteResult> => {
      const { ref, argument, context } = parseParams(
        CompleteParamsSchema,
        rawParams,
        Methods.CompletionComplete
      );
      const completion =
        ref.type === "ref/prompt"
          ? await prompts.complete(ref.name, argument.name, argument.value, context)
          : await resources.complete(ref.uri, argument.name, argument.value, context);
      return { completion };
    },
  };
}
