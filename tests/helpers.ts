import type { Hono } from "hono";
import { createApp, type AppEnv, type AppOptions, type McpApp } from "../index";
import { parseSseEvent } from "../sdk/src/client";
import { EnvelopeSchema, type Envelope } from "../sdk/src/schemas";
import type { CancellationToken } from "../src/engine/cancellation";
import { createHandlerContext } from "../src/engine/context";
import type { ClientLogLevel } from "../src/notifications/logLevels";
import { NotificationBroadcaster } from "../src/notifications/broadcaster";
import type { Session } from "../src/session/session";
import { SessionStore } from "../src/session/sessionStore";
import { SESSION_HEADER } from "../src/transport/streamableHttp";
import { Subscription, type SseSink } from "../src/transport/subscription";
import type { JsonRpcRequest, RequestId } from "../src/types/json-rpc";
import type { HandlerContext } from "../src/types/mcp";
import type { AuthenticatedClient } from "../src/utils/auth";
import { createConfig } from "../src/utils/config";
import { MetricsCollector } from "../src/utils/metrics";

export const PROTOCOL_VERSION = "2025-06-18";

/**
 * Sink that keeps every frame in memory.
 */
export class RecordingSink implements SseSink {
  readonly frames: string[] = [];
  closed = false;

  async write(frame: string): Promise<void> {
    this.frames.push(frame);
  }

  close(): void {
    this.closed = true;
  }

  get envelopes(): Envelope[] {
    return this.frames.flatMap((frame) => {
      const envelope = parseSseEvent(frame.trimEnd());
      return envelope ? [envelope] : [];
    });
  }
}

export function createReadySession(
  sessions: SessionStore,
  client: AuthenticatedClient | null = null
): Session {
  const session = sessions.create(client);
  session.transition("initializing");
  session.transition("ready");
  return session;
}

export function attachRecorder(session: Session): {
  sink: RecordingSink;
  subscription: Subscription;
} {
  const sink = new RecordingSink();
  const subscription = new Subscription(session.id, sink, {
    onClose: () => session.detachSubscription(subscription),
  });
  session.attachSubscription(subscription);
  return { sink, subscription };
}

export interface TestContext {
  ctx: HandlerContext;
  session: Session;
  sessions: SessionStore;
  broadcaster: NotificationBroadcaster;
  metrics: MetricsCollector;
  sink: RecordingSink;
  token: CancellationToken;
  /** Envelopes written to the session's stream so far. */
  sent(): Promise<Envelope[]>;
}

/**
 * A handler context bound to a ready session whose stream is recorded.
 */
export function createTestContext(
  options: {
    params?: Record<string, unknown>;
    client?: AuthenticatedClient | null;
    logLevel?: ClientLogLevel;
    requestId?: RequestId;
  } = {}
): TestContext {
  const metrics = new MetricsCollector();
  const sessions = new SessionStore(options.logLevel ?? "debug");
  const broadcaster = new NotificationBroadcaster(sessions, metrics);
  const session = createReadySession(sessions, options.client ?? null);
  const { sink, subscription } = attachRecorder(session);

  const request: JsonRpcRequest = {
    jsonrpc: "2.0",
    id: options.requestId ?? 1,
    method: "tools/call",
    params: options.params,
  };
  const token = session.requests.begin(request.id);
  const ctx = createHandlerContext(session, request, token, broadcaster);

  return {
    ctx,
    session,
    sessions,
    broadcaster,
    metrics,
    sink,
    token,
    sent: async () => {
      await subscription.flush();
      return sink.envelopes;
    },
  };
}

/**
 * An app configured for tests: no keep-alive frames, quiet logs.
 */
export function createTestApp(
  env: Record<string, string> = {},
  options: Omit<AppOptions, "config"> = {}
): McpApp {
  return createApp({
    config: createConfig({
      NODE_ENV: "test",
      LOG_LEVEL: "error",
      MCP_SSE_KEEPALIVE_MS: "0",
      ...env,
    }),
    ...options,
  });
}

export async function readEnvelope(response: Response): Promise<Envelope> {
  return EnvelopeSchema.parse(await response.json());
}

/**
 * Reads SSE frames off a response body one envelope at a time.
 */
export class SseReader {
  private buffer = "";
  private readonly decoder = new TextDecoder();

  constructor(private readonly reader: ReadableStreamDefaultReader<Uint8Array>) {}

  static from(response: Response): SseReader {
    if (!response.body) {
      throw new Error("Response has no body");
    }
    return new SseReader(response.body.getReader());
  }

  async next(): Promise<Envelope> {
    while (true) {
      let boundary = this.buffer.indexOf("\n\n");
      while (boundary !== -1) {
        const event = this.buffer.slice(0, boundary);
        this.buffer = this.buffer.slice(boundary + 2);
        const envelope = parseSseEvent(event);
        if (envelope) {
          return envelope;
        }
        boundary = this.buffer.indexOf("\n\n");
      }
      const { done, value } = await this.reader.read();
      if (done) {
        throw new Error("Event stream ended");
      }
      this.buffer += this.decoder.decode(value, { stream: true });
    }
  }

  async close(): Promise<void> {
    await this.reader.cancel();
  }
}

/**
 * Raw HTTP client for the MCP endpoint of an in-process app.
 */
export class McpTestClient {
  sessionId?: string;
  private nextId = 1;

  constructor(
    private readonly app: Hono<AppEnv>,
    private readonly baseHeaders: Record<string, string> = {}
  ) {}

  headers(extra: Record<string, string> = {}): Record<string, string> {
    return {
      "Content-Type": "application/json",
      Accept: "application/json, text/event-stream",
      ...this.baseHeaders,
      ...(this.sessionId ? { [SESSION_HEADER]: this.sessionId } : {}),
      ...extra,
    };
  }

  async post(body: unknown, extra: Record<string, string> = {}): Promise<Response> {
    return this.app.request("/mcp", {
      method: "POST",
      headers: this.headers(extra),
      body: typeof body === "string" ? body : JSON.stringify(body),
    });
  }

  async rpc(
    method: string,
    params?: Record<string, unknown>,
    id: RequestId = this.nextId++
  ): Promise<Envelope> {
    const response = await this.post({
      jsonrpc: "2.0",
      id,
      method,
      ...(params ? { params } : {}),
    });
    return readEnvelope(response);
  }

  async notify(method: string, params?: Record<string, unknown>): Promise<Response> {
    return this.post({ jsonrpc: "2.0", method, ...(params ? { params } : {}) });
  }

  async initialize(): Promise<Response> {
    return this.post({
      jsonrpc: "2.0",
      id: this.nextId++,
      method: "initialize",
      params: {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: { name: "test-client", version: "1.0.0" },
      },
    });
  }

  /**
   * initialize, keep the session id, then notifications/initialized.
   */
  async handshake(): Promise<string> {
    const response = await this.initialize();
    const sessionId = response.headers.get(SESSION_HEADER);
    if (!sessionId) {
      throw new Error(`initialize returned no session id (${response.status})`);
    }
    this.sessionId = sessionId;
    const ack = await this.notify("notifications/initialized");
    if (ack.status !== 202) {
      throw new Error(`initialized was answered with ${ack.status}`);
    }
    return sessionId;
  }

  async get(extra: Record<string, string> = {}): Promise<Response> {
    const headers = this.headers({ Accept: "text/event-stream", ...extra });
    delete headers["Content-Type"];
    return this.app.request("/mcp", { method: "GET", headers });
  }

  async openStream(): Promise<SseReader> {
    const response = await this.get();
    if (response.status !== 200) {
      throw new Error(`GET /mcp failed with ${response.status}`);
    }
    return SseReader.from(response);
  }

  async delete(): Promise<Response> {
    return this.app.request("/mcp", { method: "DELETE", headers: this.headers() });
  }
}

export function deferred<T>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
