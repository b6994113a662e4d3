import {
  GetPromptParamsSchema,
  ListPromptsParamsSchema,
  Methods,
  type ListPromptsResult,
} from "../mcp/types";
import { parseParams } from "../protocol/errors";
import { paginate } from "../registry";
import type { HandlerDeps, MethodHandlers } from "./types";

export function createPromptHandlers({
  registries,
  pageSize,
}: HandlerDeps): MethodHandlers {
  const { prompts } = registries;

  return {
    [Methods.PromptsList]: async (rawParams) => {
      const params = parseParams(
        ListPromptsParamsSchema,
        rawParams,
        Methods.PromptsList
      );
      const page = paginate(prompts.list(), params.cursor, pageSize);
      const result: ListPromptsResult = { prompts: page.items };
      if (page.nextCursor) result.nextCursor = page.nextCursor;
      return result;
    },

    [Methods.PromptsGet]: async (rawParams, ctx) => {
      const { name, arguments: args } = parseParams(
        GetPromptParamsSchema,
        rawParams,
        Methods.PromptsGet
      );
      return prompts.get(name, args, ctx);
    },
  };
}
