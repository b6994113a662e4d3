import { zValidator } from "@hono/zod-validator";
import { Hono } from "hono";
import { cors } from "hono/cors";
import { prettyJSON } from "hono/pretty-json";
import { registerDemoCatalog } from "./src/catalog";
import { McpEngine } from "./src/engine/engine";
import { notFound } from "./src/handlers/notFound";
import { authentication } from "./src/middleware/auth";
import { metricsHandler, requestMetrics } from "./src/middleware/metrics";
import { ErrorCode } from "./src/protocol/errors";
import { SERVER_CAPABILITIES } from "./src/session/negotiator";
import {
  McpHeadersSchema,
  SESSION_HEADER,
  StreamableHttpTransport,
  type AppEnv,
} from "./src/transport/streamableHttp";
import { createAuthService, type AuthService } from "./src/utils/auth";
import { config as defaultConfig, type Config } from "./src/utils/config";
import { createJsonRpcErrorResponse } from "./src/utils/jsonrpc_helpers";
import { logger as serverLogger } from "./src/utils/logger";
import { MetricsCollector } from "./src/utils/metrics";

export type { AppEnv };

export interface AppOptions {
  config?: Config;
  metrics?: MetricsCollector;
  authService?: AuthService;
  /** Register the bundled resources, tools and prompts. Defaults to true. */
  catalog?: boolean;
}

export interface McpApp {
  app: Hono<AppEnv>;
  engine: McpEngine;
  metrics: MetricsCollector;
  shutdown(): void;
}

export function createApp(options: AppOptions = {}): McpApp {
  const config = options.config ?? defaultConfig;
  serverLogger.setMinLevel(config.server.logLevel);
  const metrics = options.metrics ?? new MetricsCollector();
  const authService =
    options.authService ??
    createAuthService({
      enabled: config.auth.enabled,
      apiKeys: config.auth.apiKeys,
    });

  const engine = new McpEngine({
    serverInfo: { name: config.server.name, version: config.server.version },
    supportedVersions: config.protocol.supportedVersions,
    instructions: config.protocol.instructions,
    defaultClientLogLevel: config.protocol.defaultClientLogLevel,
    pageSize: config.protocol.pageSize,
    sessionIdleMs: config.protocol.sessionIdleMs,
    metrics,
  });
  if (options.catalog !== false) {
    registerDemoCatalog(engine.registries);
  }
  engine.start();

  const transport = new StreamableHttpTransport(engine, {
    keepAliveMs: config.protocol.keepAliveMs,
  });

  const app = new Hono<AppEnv>();

  app.use("*", async (c, next) => {
    await next();
    serverLogger.debug(`${c.req.method} ${c.req.path} - ${c.res.status}`);
  });

  app.use("*", prettyJSON());

  app.use(
    "*",
    cors({
      origin: "*",
      allowHeaders: [
        "Content-Type",
        "Accept",
        "Authorization",
        "X-Client-ID",
        "Prefer",
        SESSION_HEADER,
      ],
      allowMethods: ["POST", "GET", "DELETE", "OPTIONS"],
      exposeHeaders: ["Content-Type", SESSION_HEADER],
      maxAge: 600,
    })
  );

  app.use("*", requestMetrics(metrics));

  app.use("*", (c, next) => {
    const start = Date.now();
    const requestId = crypto.randomUUID();
    c.set("requestStartTime", start);
    c.set("requestId", requestId);
    serverLogger.debug("Request started", {
      requestId,
      method: c.req.method,
      path: c.req.path,
    });
    return next();
  });

  app.get("/", (c) => {
    serverLogger.debug("Server info requested");
    const { resources, tools, prompts } = engine.registries;
    return c.json({
      name: config.server.name,
      version: config.server.version,
      description:
        "Session-scoped Model Context Protocol server over streamable HTTP, built with Node.js and Hono",
      endpoint: config.protocol.endpoint,
      protocolVersions: config.protocol.supportedVersions,
      capabilities: SERVER_CAPABILITIES,
      catalog: {
        resources: resources.list().length,
        resourceTemplates: resources.listTemplates().length,
        tools: tools.size,
        prompts: prompts.size,
      },
    });
  });

  app.get("/health", (c) => {
    serverLogger.debug("Health check requested");
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      sessions: engine.sessions.size,
    });
  });

  app.get("/metrics", metricsHandler(metrics));

  const endpoint = config.protocol.endpoint;
  if (authService.enabled) {
    app.use(endpoint, authentication(authService));
  }

  const headers = zValidator("header", McpHeadersSchema, (result, c) => {
    if (!result.success) {
      return c.json(
        createJsonRpcErrorResponse(
          null,
          ErrorCode.InvalidRequest,
          "Invalid MCP headers"
        ),
        400
      );
    }
  });

  app.post(endpoint, headers, (c) =>
    transport.handlePost(c, c.req.valid("header"))
  );
  app.get(endpoint, headers, (c) =>
    transport.handleGet(c, c.req.valid("header"))
  );
  app.delete(endpoint, headers, (c) =>
    transport.handleDelete(c, c.req.valid("header"))
  );

  app.notFound(notFound);

  app.onError((error, c) => {
    serverLogger.error("Unhandled error", error, {
      path: c.req.path,
      method: c.req.method,
    });
    return c.json(
      createJsonRpcErrorResponse(
        null,
        ErrorCode.InternalError,
        "Internal server error"
      ),
      500
    );
  });

  return {
    app,
    engine,
    metrics,
    shutdown: () => engine.shutdown(),
  };
}
