import {
  ListResourcesParamsSchema,
  Methods,
  ReadResourceParamsSchema,
  SubscribeParamsSchema,
  type ListResourcesResult,
  type ListResourceTemplatesResult,
  type ReadResourceResult,
} from "../mcp/types";
import { parseParams, resourceNotFound } from "../protocol/errors";
import { paginate } from "../registry";
import { logger } from "../utils/logger";
import type { HandlerDeps, MethodHandlers } from "./types";

const resourceLogger = logger.child({ component: "resource-handlers" });

export function createResourceHandlers({
  registries,
  pageSize,
}: HandlerDeps): MethodHandlers {
  const { resources } = registries;

  return {
    /**
     * Handles 'resources/list': fixed-URI resources, optionally by scheme.
     */
    [Methods.ResourcesList]: async (rawParams) => {
      const params = parseParams(
        ListResourcesParamsSchema,
        rawParams,
        Methods.ResourcesList
      );
      const page = paginate(resources.list(params.scheme), params.cursor, pageSize);
      const result: ListResourcesResult = { resources: page.items };
      if (page.nextCursor) result.nextCursor = page.nextCursor;
      return result;
    },

    [Methods.ResourceTemplatesList]: async (rawParams) => {
      const params = parseParams(
        ListResourcesParamsSchema,
        rawParams,
        Methods.ResourceTemplatesList
      );
      const page = paginate(
        resources.listTemplates(params.scheme),
        params.cursor,
        pageSize
      );
      const result: ListResourceTemplatesResult = {
        resourceTemplates: page.items,
      };
      if (page.nextCursor) result.nextCursor = page.nextCursor;
      return result;
    },

    /**
     * Handles 'resources/read'. Dynamic and templated resources run their
     * reader on every call.
     */
    [Methods.ResourcesRead]: async (rawParams, ctx) => {
      const { uri } = parseParams(
        ReadResourceParamsSchema,
        rawParams,
        Methods.ResourcesRead
      );
      resourceLogger.debug("Reading resource", {
        uri,
        sessionId: ctx.session.id,
      });
      const content = await resources.read(uri, ctx);
      const result: ReadResourceResult = { contents: [content] };
      return result;
    },

    [Methods.ResourcesSubscribe]: async (rawParams, ctx) => {
      const { uri } = parseParams(
        SubscribeParamsSchema,
        rawParams,
        Methods.ResourcesSubscribe
      );
      if (!resources.resolve(uri)) {
        throw resourceNotFound(uri);
      }
      ctx.session.resourceSubscriptions.add(uri);
      resourceLogger.debug("Resource subscribed", {
        uri,
        sessionId: ctx.session.id,
      });
      return {};
    },

    [Methods.ResourcesUnsubscribe]: async (rawParams, ctx) => {
      const { uri } = parseParams(
        SubscribeParamsSchema,
        rawParams,
        Methods.ResourcesUnsubscribe
      );
      ctx.session.resourceSubscriptions.delete(uri);
      return {};
    },
  };
}
