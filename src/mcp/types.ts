/**
 * Model Context Protocol message shapes served by the engine.
 * Based on: https://modelcontextprotocol.io/specification
 */
import { z } from "zod";
import { ClientLogLevelSchema } from "../notifications/logLevels";
import type { RequestId } from "../types/json-rpc";

export const Methods = {
  Initialize: "initialize",
  Ping: "ping",
  Initialized: "notifications/initialized",
  Cancelled: "notifications/cancelled",
  CancelRequest: "$/cancelRequest",
  ResourcesList: "resources/list",
  ResourceTemplatesList: "resources/templates/list",
  ResourcesRead: "resources/read",
  ResourcesSubscribe: "resources/subscribe",
  ResourcesUnsubscribe: "resources/unsubscribe",
  ToolsList: "tools/list",
  ToolsCall: "tools/call",
  PromptsList: "prompts/list",
  PromptsGet: "prompts/get",
  LoggingSetLevel: "logging/setLevel",
  CompletionComplete: "completion/complete",
} as const;

export const Notifications = {
  Message: "notifications/message",
  Progress: "notifications/progress",
  ResourceUpdated: "notifications/resources/updated",
  ResourceListChanged: "notifications/resources/list_changed",
  ToolListChanged: "notifications/tools/list_changed",
  PromptListChanged: "notifications/prompts/list_changed",
} as const;

// --- Entities ---

export interface Implementation {
  name: string;
  version: string;
  title?: string;
}

export interface McpResource {
  uri: string; // Unique identifier for the resource (e.g., file:///path/to/file)
  name: string;
  title?: string;
  description?: string;
  mimeType?: string;
}

export interface McpResourceTemplate {
  uriTemplate: string; // e.g. users://{user_id}/profile
  name: string;
  title?: string;
  description?: string;
  mimeType?: string;
}

/**
 * Content of a resource read. Exactly one of `text` (UTF-8) or `blob` (base64) is set.
 */
export type McpResourceContent =
  | { uri: string; mimeType?: string; text: string }
  | { uri: string; mimeType?: string; blob: string };

export interface JsonSchemaProperty {
  type: string;
  description?: string;
  [keyword: string]: unknown;
}

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
}

export interface McpTool {
  name: string;
  title?: string;
  description: string;
  inputSchema: ToolInputSchema;
  annotations?: {
    category?: string;
    tags?: string[];
  };
}

export type McpToolResultContent =
  | { type: "text"; text: string }
  | { type: "image"; data: string; mimeType: string }
  | { type: "resource"; resource: McpResourceContent };

export interface CallToolResult {
  content: McpToolResultContent[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

export interface McpPromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

export interface McpPrompt {
  name: string;
  title?: string;
  description?: string;
  arguments?: McpPromptArgument[];
}

export interface McpPromptMessage {
  role: "user" | "assistant";
  content: McpToolResultContent;
}

export interface GetPromptResult {
  description?: string;
  messages: McpPromptMessage[];
}

export interface ServerCapabilities {
  logging?: Record<string, never>;
  tools?: { listChanged?: boolean };
  resources?: { subscribe?: boolean; listChanged?: boolean };
  prompts?: { listChanged?: boolean };
  completions?: Record<string, never>;
}

export type ClientCapabilities = Record<string, unknown>;

// --- Request params ---

const RequestMetaSchema = z
  .object({
    progressToken: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

const PaginatedParamsSchema = z.object({
  cursor: z.string().optional(),
});

export const InitializeParamsSchema = z
  .object({
    protocolVersion: z.string({
      required_error: "protocolVersion is required",
    }),
    capabilities: z.record(z.unknown()).optional().default({}),
    clientInfo: z
      .object({ name: z.string(), version: z.string() })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type InitializeParams = z.infer<typeof InitializeParamsSchema>;

export interface InitializeResult {
  protocolVersion: string;
  capabilities: ServerCapabilities;
  serverInfo: Implementation;
  instructions?: string;
}

export const ListResourcesParamsSchema = PaginatedParamsSchema.extend({
  scheme: z.string().min(1).optional(),
});
export type ListResourcesParams = z.infer<typeof ListResourcesParamsSchema>;

export interface ListResourcesResult {
  resources: McpResource[];
  nextCursor?: string;
}

export interface ListResourceTemplatesResult {
  resourceTemplates: McpResourceTemplate[];
  nextCursor?: string;
}

export const ReadResourceParamsSchema = z.object({
  uri: z.string().min(1, "uri is required"),
});
export type ReadResourceParams = z.infer<typeof ReadResourceParamsSchema>;

export interface ReadResourceResult {
  contents: McpResourceContent[];
}

export const SubscribeParamsSchema = ReadResourceParamsSchema;

export const ListToolsParamsSchema = PaginatedParamsSchema;

export interface ListToolsResult {
  tools: McpTool[];
  nextCursor?: string;
}

export const CallToolParamsSchema = z.object({
  name: z.string().min(1, "name is required"),
  arguments: z.record(z.unknown()).optional().default({}),
  _meta: RequestMetaSchema.optional(),
});
export type CallToolParams = z.infer<typeof CallToolParamsSchema>;

export const ListPromptsParamsSchema = PaginatedParamsSchema;

export interface ListPromptsResult {
  prompts: McpPrompt[];
  nextCursor?: string;
}

export const GetPromptParamsSchema = z.object({
  name: z.string().min(1, "name is required"),
  arguments: z.record(z.string()).optional().default({}),
});

export const CompleteParamsSchema = z.object({
  ref: z.discriminatedUnion("type", [
    z.object({
      type: z.literal("ref/prompt"),
      name: z.string().min(1, "name is required"),
    }),
    z.object({
      type: z.literal("ref/resource"),
      uri: z.string().min(1, "uri is required"),
    }),
  ]),
  argument: z.object({
    name: z.string().min(1, "name is required"),
    value: z.string(),
  }),
  context: z
    .object({ arguments: z.record(z.string()).optional().default({}) })
    .optional()
    .default({}),
});
export type CompleteParams = z.infer<typeof CompleteParamsSchema>;

export interface CompleteResult {
  completion: { values: string[]; total?: number; hasMore?: boolean };
}

export const SetLevelParamsSchema = z.object({
  level: ClientLogLevelSchema,
});

export const CancelledParamsSchema = z.object({
  requestId: z.union([z.string(), z.number()]),
  reason: z.string().optional(),
});

export const CancelRequestParamsSchema = z.object({
  id: z.union([z.string(), z.number()]),
});

/**
 * Pulls `_meta.progressToken` out of any request params.
 */
export function readProgressToken(params: unknown): RequestId | undefined {
  const parsed = z
    .object({ _meta: RequestMetaSchema.optional() })
    .passthrough()
    .safeParse(params);
  return parsed.success ? parsed.data._meta?.progressToken : undefined;
}
