// Types for the MCP HTTP Client SDK

/**
 * Configuration options for the McpHttpClient.
 */
export interface McpClientOptions {
  /** The base URL of the server, e.g. http://localhost:3333 */
  baseUrl: string;
  /** Path of the MCP endpoint. Defaults to /mcp */
  endpoint?: string;
  /** Optional API key, sent as a Bearer token. */
  apiKey?: string;
  /** Client ID sent as X-Client-ID alongside the API key. */
  clientId?: string;
  /** Optional fetch implementation to use. Defaults to global fetch. */
  fetch?: typeof fetch;
  /** Sent in `initialize`. */
  clientInfo?: { name: string; version: string };
  /** Protocol revision requested in `initialize`. */
  protocolVersion?: string;
}

export type RequestId = string | number;

export type LogLevel =
  | "debug"
  | "info"
  | "notice"
  | "warning"
  | "error"
  | "critical"
  | "alert"
  | "emergency";

export interface CallToolOptions {
  /** Request id to use, so the call can be cancelled by id. */
  id?: RequestId;
  /** Ask the server for `notifications/progress` tagged with this token. */
  progressToken?: RequestId;
}

export interface PageOptions {
  cursor?: string;
}

export interface ListResourcesOptions extends PageOptions {
  scheme?: string;
}

/** What `completion/complete` is asked about: a prompt or a resource template. */
export type CompletionRef =
  | { type: "ref/prompt"; name: string }
  | { type: "ref/resource"; uri: string };
