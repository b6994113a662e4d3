import type { Context, MiddlewareHandler } from "hono";
import { logger } from "../utils/logger";
import type { MetricsCollector } from "../utils/metrics";

const metricsLogger = logger.child({ component: "metrics-middleware" });

/**
 * Middleware to track request performance
 */
export function requestMetrics(metrics: MetricsCollector): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const endTracker = metrics.trackRequest();

    try {
      await next();

      metricsLogger.debug("Request completed", {
        path: c.req.path,
        method: c.req.method,
        status: c.res.status,
        duration: `${Date.now() - start}ms`,
      });
    } catch (error) {
      const errorType = error instanceof Error ? error.name : "UnknownError";
      metrics.trackError(errorType);
      metricsLogger.error("Request error", error, {
        path: c.req.path,
        method: c.req.method,
        errorType,
      });
      throw error;
    } finally {
      endTracker();
    }
  };
}

/**
 * Handler for exposing metrics data via API
 */
export const metricsHandler = (metrics: MetricsCollector) => (c: Context) =>
  c.json(metrics.getMetrics());
