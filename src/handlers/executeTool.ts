import {
  CallToolParamsSchema,
  ListToolsParamsSchema,
  Methods,
  type CallToolResult,
  type ListToolsResult,
} from "../mcp/types";
import {
  methodNotFound,
  parseParams,
  ToolExecutionError,
} from "../protocol/errors";
import { paginate } from "../registry";
import { logger } from "../utils/logger";
import type { HandlerDeps, MethodHandlers } from "./types";

const toolLogger = logger.child({ component: "tool-executor" });

export function createToolHandlers({
  registries,
  pageSize,
}: HandlerDeps): MethodHandlers {
  const { tools } = registries;

  return {
    /**
     * Handles 'tools/list': only the tools visible to the calling session.
     */
    [Methods.ToolsList]: async (rawParams, ctx) => {
      const params = parseParams(
        ListToolsParamsSchema,
        rawParams,
        Methods.ToolsList
      );
      const visible = tools.getVisibleTools({
        session: ctx.session,
        client: ctx.client,
      });
      const page = paginate(visible, params.cursor, pageSize);
      const result: ListToolsResult = { tools: page.items };
      if (page.nextCursor) result.nextCursor = page.nextCursor;
      return result;
    },

    /**
     * Handles 'tools/call'. Tool failures come back inside the result with
     * `isError: true`; everything else propagates to the dispatcher.
     */
    [Methods.ToolsCall]: async (rawParams, ctx): Promise<CallToolResult> => {
      const { name, arguments: args } = parseParams(
        CallToolParamsSchema,
        rawParams,
        Methods.ToolsCall
      );

      const tool = tools.getTool(name, {
        session: ctx.session,
        client: ctx.client,
      });
      if (!tool) {
        throw methodNotFound(`Tool not found: ${name}`, { name });
      }

      toolLogger.info(`Executing tool: ${name}`, {
        sessionId: ctx.session.id,
        requestId: ctx.requestId,
      });

      try {
        return await tool.invoke(args, ctx);
      } catch (error) {
        if (error instanceof ToolExecutionError) {
          toolLogger.warn(`Tool reported an error: ${name}`, {
            message: error.message,
            details: error.details,
          });
          return { content: error.content, isError: true };
        }
        throw error;
      }
    },
  };
}
