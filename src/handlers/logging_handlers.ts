import { Methods, SetLevelParamsSchema } from "../mcp/types";
import { parseParams } from "../protocol/errors";
import { logger } from "../utils/logger";
import type { MethodHandlers } from "./types";

const loggingLogger = logger.child({ component: "logging-handlers" });

/**
 * Handles 'logging/setLevel'. Takes effect for the next notification sent.
 */
export function createLoggingHandlers(): MethodHandlers {
  return {
    [Methods.LoggingSetLevel]: async (rawParams, ctx) => {
      const { level } = parseParams(
        SetLevelParamsSchema,
        rawParams,
        Methods.LoggingSetLevel
      );
      loggingLogger.debug("Client log level changed", {
        sessionId: ctx.session.id,
        from: ctx.session.logLevel,
        to: level,
      });
      ctx.session.logLevel = level;
      return {};
    },
  };
}
