import type { Context } from "hono";
import { logger } from "../utils/logger";

const notFoundLogger = logger.child({ component: "not-found-handler" });

/**
 * JSON 404 for every route other than the MCP endpoint and the ambient ones.
 */
export const notFound = (c: Context) => {
  const path = c.req.path;
  notFoundLogger.debug(`Not found: ${c.req.method} ${path}`);

  return c.json(
    {
      error: `Not found: ${path}`,
      message: "The requested route does not exist on this server",
      timestamp: new Date().toISOString(),
    },
    404
  );
};
