import { z } from "zod";
import {
  CallToolResultSchema,
  CompleteResultSchema,
  EmptyResultSchema,
  EnvelopeSchema,
  GetPromptResultSchema,
  InitializeResultSchema,
  ListPromptsResultSchema,
  ListResourcesResultSchema,
  ListResourceTemplatesResultSchema,
  ListToolsResultSchema,
  ReadResourceResultSchema,
  type CallToolResult,
  type CompleteResult,
  type Envelope,
  type GetPromptResult,
  type InitializeResult,
  type ListPromptsResult,
  type ListResourcesResult,
  type ListResourceTemplatesResult,
  type ListToolsResult,
  type ReadResourceResult,
} from "./schemas";
import type {
  CallToolOptions,
  CompletionRef,
  ListResourcesOptions,
  LogLevel,
  McpClientOptions,
  PageOptions,
  RequestId,
} from "./types";

export const SESSION_HEADER = "Mcp-Session-Id";
const DEFAULT_PROTOCOL_VERSION = "2025-06-18";

/**
 * A JSON-RPC error returned by the server, or a transport failure mapped onto one.
 */
export class McpClientError extends Error {
  constructor(
    public readonly code: number,
    message: string,
    public readonly data?: unknown,
    public readonly status?: number
  ) {
    super(message);
    this.name = "McpClientError";
    Object.setPrototypeOf(this, McpClientError.prototype);
  }
}

function withoutUndefined(
  params: Record<string, unknown>
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(params).filter(([, value]) => value !== undefined)
  );
}

/**
 * MCP HTTP Client
 *
 * Talks to a streamable HTTP MCP endpoint: JSON-RPC over POST, notifications
 * over a server-sent event stream, DELETE to end the session.
 */
export class McpHttpClient {
  private readonly url: string;
  private readonly options: McpClientOptions;
  private readonly fetchImplementation: typeof fetch;
  private nextId = 1;
  private _sessionId?: string;

  /**
   * Creates an instance of McpHttpClient.
   * @param options - Configuration options for the client.
   */
  constructor(options: McpClientOptions) {
    if (!options.baseUrl) {
      throw new Error("baseUrl is required");
    }
    this.options = options;
    this.url = `${options.baseUrl.replace(/\/$/, "")}${options.endpoint ?? "/mcp"}`;
    this.fetchImplementation = options.fetch || globalThis.fetch;

    if (!this.fetchImplementation) {
      throw new Error(
        "Fetch API is not available. Please provide a fetch implementation."
      );
    }
  }

  get sessionId(): string | undefined {
    return this._sessionId;
  }

  /**
   * Creates the headers for a request, including authentication and session.
   */
  private getHeaders(extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json, text/event-stream",
      ...extra,
    };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }
    if (this.options.clientId) {
      headers["X-Client-ID"] = this.options.clientId;
    }
    if (this._sessionId) {
      headers[SESSION_HEADER] = this._sessionId;
    }
    return headers;
  }

  private async post(body: unknown): Promise<Response> {
    const response = await this.fetchImplementation(this.url, {
      method: "POST",
      headers: this.getHeaders(),
      body: JSON.stringify(body),
    });
    const sessionId = response.headers.get(SESSION_HEADER);
    if (sessionId) {
      this._sessionId = sessionId;
    }
    return response;
  }

  private async readEnvelope(response: Response): Promise<Envelope> {
    let raw: unknown;
    try {
      raw = await response.json();
    } catch {
      throw new McpClientError(
        -32700,
        `Invalid JSON received (HTTP ${response.status})`,
        undefined,
        response.status
      );
    }
    const parsed = EnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new McpClientError(
        -32600,
        `Invalid JSON-RPC envelope received: ${parsed.error.message}`,
        undefined,
        response.status
      );
    }
    return parsed.data;
  }

  /**
   * Sends a request and validates its result.
   * @throws McpClientError for JSON-RPC errors and malformed responses
   */
  async request<T>(
    method: string,
    params: Record<string, unknown> | undefined,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    id: RequestId = this.nextId++
  ): Promise<T> {
    const response = await this.post({
      jsonrpc: "2.0",
      id,
      method,
      ...(params ? { params } : {}),
    });
    const envelope = await this.readEnvelope(response);

    if (envelope.error) {
      throw new McpClientError(
        envelope.error.code,
        envelope.error.message,
        envelope.error.data,
        response.status
      );
    }
    if (!response.ok) {
      throw new McpClientError(
        -32603,
        `Request failed: HTTP ${response.status}`,
        undefined,
        response.status
      );
    }

    const result = schema.safeParse(envelope.result);
    if (!result.success) {
      throw new McpClientError(
        -32603,
        `Invalid result for ${method}: ${result.error.message}`,
        result.error.flatten(),
        response.status
      );
    }
    return result.data;
  }

  /**
   * Sends a notification. The server acknowledges with 202 and no body.
   */
  async notify(method: string, params?: Record<string, unknown>): Promise<void> {
    const response = await this.post({
      jsonrpc: "2.0",
      method,
      ...(params ? { params } : {}),
    });
    if (response.status !== 202) {
      const envelope = await this.readEnvelope(response);
      throw new McpClientError(
        envelope.error?.code ?? -32603,
        envelope.error?.message ?? `Notification failed: HTTP ${response.status}`,
        envelope.error?.data,
        response.status
      );
    }
  }

  initialize(): Promise<InitializeResult> {
    return this.request(
      "initialize",
      {
        protocolVersion: this.options.protocolVersion ?? DEFAULT_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: this.options.clientInfo ?? {
          name: "mcp-http-client",
          version: "0.1.0",
        },
      },
      InitializeResultSchema
    );
  }

  notifyInitialized(): Promise<void> {
    return this.notify("notifications/initialized");
  }

  /**
   * Full handshake: `initialize` then `notifications/initialized`.
   */
  async connect(): Promise<InitializeResult> {
    const result = await this.initialize();
    await this.notifyInitialized();
    return result;
  }

  async ping(): Promise<void> {
    await this.request("ping", undefined, EmptyResultSchema);
  }

  listResources(options: ListResourcesOptions = {}): Promise<ListResourcesResult> {
    return this.request(
      "resources/list",
      withoutUndefined({ cursor: options.cursor, scheme: options.scheme }),
      ListResourcesResultSchema
    );
  }

  listResourceTemplates(
    options: ListResourcesOptions = {}
  ): Promise<ListResourceTemplatesResult> {
    return this.request(
      "resources/templates/list",
      withoutUndefined({ cursor: options.cursor, scheme: options.scheme }),
      ListResourceTemplatesResultSchema
    );
  }

  readResource(uri: string): Promise<ReadResourceResult> {
    return this.request("resources/read", { uri }, ReadResourceResultSchema);
  }

  async subscribeResource(uri: string): Promise<void> {
    await this.request("resources/subscribe", { uri }, EmptyResultSchema);
  }

  async unsubscribeResource(uri: string): Promise<void> {
    await this.request("resources/unsubscribe", { uri }, EmptyResultSchema);
  }

  listTools(options: PageOptions = {}): Promise<ListToolsResult> {
    return this.request(
      "tools/list",
      withoutUndefined({ cursor: options.cursor }),
      ListToolsResultSchema
    );
  }

  callTool(
    name: string,
    args: Record<string, unknown> = {},
    options: CallToolOptions = {}
  ): Promise<CallToolResult> {
    const params: Record<string, unknown> = { name, arguments: args };
    if (options.progressToken !== undefined) {
      params._meta = { progressToken: options.progressToken };
    }
    return this.request("tools/call", params, CallToolResultSchema, options.id);
  }

  listPrompts(options: PageOptions = {}): Promise<ListPromptsResult> {
    return this.request(
      "prompts/list",
      withoutUndefined({ cursor: options.cursor }),
      ListPromptsResultSchema
    );
  }

  getPrompt(
    name: string,
    args: Record<string, string> = {}
  ): Promise<GetPromptResult> {
    return this.request(
      "prompts/get",
      { name, arguments: args },
      GetPromptResultSchema
    );
  }

  /**
   * Asks for values of one prompt argument or template variable.
   * `context` carries arguments already chosen.
   */
  complete(
    ref: CompletionRef,
    argument: { name: string; value: string },
    context: Record<string, string> = {}
  ): Promise<CompleteResult> {
    return this.request(
      "completion/complete",
      { ref, argument, context: { arguments: context } },
      CompleteResultSchema
    );
  }

  async setLogLevel(level: LogLevel): Promise<void> {
    await this.request("logging/setLevel", { level }, EmptyResultSchema);
  }

  cancelRequest(requestId: RequestId, reason?: string): Promise<void> {
    return this.notify(
      "notifications/cancelled",
      withoutUndefined({ requestId, reason })
    );
  }

  /**
   * Opens the session's event stream and yields every envelope pushed on it.
   * Breaking out of the loop (or aborting `signal`) closes the stream.
   */
  async *openStream(signal?: AbortSignal): AsyncGenerator<Envelope> {
    const headers = this.getHeaders({ Accept: "text/event-stream" });
    delete headers["Content-Type"];
    const response = await this.fetchImplementation(this.url, {
      method: "GET",
      headers,
      signal,
    });

    if (!response.ok || !response.body) {
      const envelope = await this.readEnvelope(response);
      throw new McpClientError(
        envelope.error?.code ?? -32603,
        envelope.error?.message ?? `Stream failed: HTTP ${response.status}`,
        envelope.error?.data,
        response.status
      );
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) {
          return;
        }
        buffer += decoder.decode(value, { stream: true });

        let boundary = buffer.indexOf("\n\n");
        while (boundary !== -1) {
          const event = buffer.slice(0, boundary);
          buffer = buffer.slice(boundary + 2);
          const envelope = parseSseEvent(event);
          if (envelope) {
            yield envelope;
          }
          boundary = buffer.indexOf("\n\n");
        }
      }
    } finally {
      await reader.cancel();
    }
  }

  /**
   * Ends the session on the server (DELETE) and forgets its id.
   */
  async close(): Promise<void> {
    if (!this._sessionId) {
      return;
    }
    const response = await this.fetchImplementation(this.url, {
      method: "DELETE",
      headers: this.getHeaders(),
    });
    this._sessionId = undefined;
    if (response.status !== 204 && response.status !== 404) {
      throw new McpClientError(
        -32603,
        `Failed to close session: HTTP ${response.status}`,
        undefined,
        response.status
      );
    }
  }
}

/**
 * Joins the `data:` lines of one SSE event and decodes the envelope.
 * Comment-only events (keep-alives) yield null.
 */
export function parseSseEvent(event: string): Envelope | null {
  const data = event
    .split("\n")
    .filter((line) => line.startsWith("data:"))
    .map((line) => line.slice(5).replace(/^ /, ""))
    .join("\n");
  if (!data) {
    return null;
  }
  const parsed = EnvelopeSchema.safeParse(JSON.parse(data));
  if (!parsed.success) {
    throw new McpClientError(
      -32600,
      `Invalid envelope on event stream: ${parsed.error.message}`
    );
  }
  return parsed.data;
}
