/**
 * Configuration utility for conduit-mcp
 * Provides structured access to environment variables with defaults
 */

import {
  isClientLogLevel,
  type ClientLogLevel,
} from "../notifications/logLevels";
import { isLogLevel, logger, type LogLevel } from "./logger";

const configLogger = logger.child({ component: "config" });

export type Environment = "development" | "production" | "test";

export interface ServerConfig {
  name: string;
  version: string;
  port: number;
  environment: Environment;
  logLevel: LogLevel;
}

export interface AuthConfig {
  enabled: boolean;
  apiKeys: string[];
}

export interface ProtocolConfig {
  endpoint: string;
  /** Supported protocol revisions, latest first. */
  supportedVersions: string[];
  defaultClientLogLevel: ClientLogLevel;
  pageSize: number;
  /** Interval of SSE keep-alive comments in ms; 0 disables them. */
  keepAliveMs: number;
  /** Sessions with no traffic and no open stream for this long are closed; 0 disables. */
  sessionIdleMs: number;
  instructions?: string;
}

export interface Config {
  server: ServerConfig;
  auth: AuthConfig;
  protocol: ProtocolConfig;
}

export const DEFAULT_PROTOCOL_VERSIONS = [
  "2025-06-18",
  "2025-03-26",
  "2024-11-05",
];

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseBoolean(
  value: string | undefined,
  defaultValue: boolean
): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === "true" || value === "1";
}

function parseList(value: string | undefined): string[] {
  return value
    ? value
        .split(",")
        .map((p) => p.trim())
        .filter((p) => p)
    : [];
}

function parseEnvironment(value: string | undefined): Environment {
  if (value === undefined) return "development";
  if (value === "development" || value === "production" || value === "test") {
    return value;
  }
  configLogger.warn(`Invalid NODE_ENV: ${value}, using 'development' instead`);
  return "development";
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const environment = parseEnvironment(env.NODE_ENV);

  let logLevel: LogLevel = "info";
  if (isLogLevel(env.LOG_LEVEL)) {
    logLevel = env.LOG_LEVEL;
  } else if (env.LOG_LEVEL) {
    configLogger.warn(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}, using 'info' instead`);
  }

  let defaultClientLogLevel: ClientLogLevel = "info";
  if (isClientLogLevel(env.MCP_DEFAULT_CLIENT_LOG_LEVEL)) {
    defaultClientLogLevel = env.MCP_DEFAULT_CLIENT_LOG_LEVEL;
  } else if (env.MCP_DEFAULT_CLIENT_LOG_LEVEL) {
    configLogger.warn(
      `Invalid MCP_DEFAULT_CLIENT_LOG_LEVEL: ${env.MCP_DEFAULT_CLIENT_LOG_LEVEL}, using 'info' instead`
    );
  }

  const supportedVersions = parseList(env.MCP_PROTOCOL_VERSIONS);

  const apiKeys: string[] = [];
  if (env.API_KEY) {
    apiKeys.push(env.API_KEY);
    configLogger.debug("API_KEY loaded from environment");
  }
  if (env.MCP_API_KEY) {
    apiKeys.push(env.MCP_API_KEY);
    configLogger.debug("MCP_API_KEY loaded from environment");
  }

  const authEnabled = parseBoolean(
    env.ENABLE_AUTH,
    environment === "production"
  );
  if (authEnabled && apiKeys.length === 0) {
    configLogger.warn(
      "ENABLE_AUTH is set but no API_KEY or MCP_API_KEY was provided; every request will be rejected"
    );
  }

  const config: Config = {
    server: {
      name: env.MCP_SERVER_NAME || "conduit-mcp",
      version: env.MCP_SERVER_VERSION || "0.1.0",
      port: parseNumber(env.PORT, 3333),
      environment,
      logLevel,
    },
    auth: {
      enabled: authEnabled,
      apiKeys,
    },
    protocol: {
      endpoint: env.MCP_ENDPOINT || "/mcp",
      supportedVersions:
        supportedVersions.length > 0
          ? supportedVersions
          : DEFAULT_PROTOCOL_VERSIONS,
      defaultClientLogLevel,
      pageSize: Math.max(1, parseNumber(env.MCP_PAGE_SIZE, 50)),
      keepAliveMs: Math.max(0, parseNumber(env.MCP_SSE_KEEPALIVE_MS, 15000)),
      sessionIdleMs: Math.max(
        0,
        parseNumber(env.MCP_SESSION_IDLE_MS, 30 * 60 * 1000)
      ),
      instructions: env.MCP_INSTRUCTIONS,
    },
  };

  configLogger.debug("Configuration loaded");
  return config;
}

export const config = createConfig();
