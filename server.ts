import { serve } from "@hono/node-server";
import { createApp } from "./index";
import { config } from "./src/utils/config";
import { logger } from "./src/utils/logger";

const serverLogger = logger.child({ component: "server" });

const { app, shutdown } = createApp({ config });

const server = serve({ fetch: app.fetch, port: config.server.port }, (info) => {
  serverLogger.info(
    `${config.server.name} listening on http://localhost:${info.port}${config.protocol.endpoint}`,
    { environment: config.server.environment }
  );
});

const stop = (signal: string) => {
  serverLogger.info(`Received ${signal}, shutting down`);
  shutdown();
  server.close((error) => {
    if (error) {
      serverLogger.error("Error while closing HTTP server", error);
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGINT", () => stop("SIGINT"));
process.on("SIGTERM", () => stop("SIGTERM"));
