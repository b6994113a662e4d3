/**
 * Handler and registration types shared by the registries, the dispatcher and
 * the application catalog.
 */
import type { z } from "zod";
import type { CancellationToken } from "../engine/cancellation";
import type {
  CallToolResult,
  GetPromptResult,
  McpPromptArgument,
  ToolInputSchema,
} from "../mcp/types";
import type { ClientLogLevel } from "../notifications/logLevels";
import type { Session } from "../session/session";
import type { RequestId } from "./json-rpc";
import type { AuthenticatedClient, PermissionLevel } from "../utils/auth";

/**
 * Everything a handler may touch while serving one request.
 */
export interface HandlerContext {
  session: Session;
  client: AuthenticatedClient | null;
  requestId: RequestId;
  method: string;
  cancellation: CancellationToken;
  /** Aborts together with `cancellation`. */
  signal: AbortSignal;

  /** `notifications/message` to the calling session, subject to its log level. */
  log(level: ClientLogLevel, data: unknown, loggerName?: string): void;
  /** `notifications/progress`; a no-op when the request carried no progress token. */
  progress(progress: number, total?: number, message?: string): void;
  notify(method: string, params?: Record<string, unknown>): void;
  /** @returns Number of sessions the notification was queued for */
  broadcast(method: string, params?: Record<string, unknown>): number;
  notifyResourceUpdated(uri: string): number;
}

// --- Resources ---

export type ResourceBody = { text: string } | { blob: string };

export interface ResourceReadRequest {
  uri: string;
  /** Variables extracted from a URI template; empty for fixed URIs. */
  params: Record<string, string>;
}

export type ResourceReadHandler = (
  request: ResourceReadRequest,
  ctx: HandlerContext
) => Promise<ResourceBody | string> | ResourceBody | string;

interface ResourceMetadata {
  name: string;
  title?: string;
  description?: string;
  mimeType?: string;
}

export interface StaticResourceOptions extends ResourceMetadata {
  uri: string;
  content: ResourceBody;
}

export interface DynamicResourceOptions extends ResourceMetadata {
  uri: string;
  read: ResourceReadHandler;
}

export interface TemplateResourceOptions extends ResourceMetadata {
  uriTemplate: string;
  read: ResourceReadHandler;
  /** Value suggestions per template variable, served by `completion/complete`. */
  complete?: Record<string, Completer>;
}

// --- Tools ---

export interface ToolVisibilityScope {
  session: Session;
  client: AuthenticatedClient | null;
}

export type ToolHandler<Args> = (
  args: Args,
  ctx: HandlerContext
) => Promise<CallToolResult> | CallToolResult;

/**
 * Tool registration options. `argsSchema` validates the raw arguments before
 * the handler runs; `inputSchema` is what `tools/list` advertises.
 */
export interface ToolRegistrationOptions<Args> {
  name: string;
  title?: string;
  description: string;
  inputSchema: ToolInputSchema;
  argsSchema: z.ZodType<Args, z.ZodTypeDef, unknown>;
  permissionLevel?: PermissionLevel;
  enabled?: boolean | ((scope: ToolVisibilityScope) => boolean);
  category?: string;
  tags?: string[];
  handler: ToolHandler<Args>;
}

// --- Prompts ---

export type PromptHandler = (
  args: Record<string, string>,
  ctx: HandlerContext
) => Promise<GetPromptResult> | GetPromptResult;

export interface PromptRegistrationOptions {
  name: string;
  title?: string;
  description?: string;
  arguments?: McpPromptArgument[];
  handler: PromptHandler;
  /** Value suggestions per argument, served by `completion/complete`. */
  complete?: Record<string, Completer>;
}

// --- Completions ---

export interface CompletionContext {
  /** Arguments the client has already filled in. */
  arguments: Record<string, string>;
}

/**
 * Suggests values for one argument given what has been typed so far.
 */
export type Completer = (
  value: string,
  context: CompletionContext
) => Promise<string[]> | string[];
