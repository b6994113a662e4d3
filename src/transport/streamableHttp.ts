import type { Context, Input } from "hono";
import { streamSSE } from "hono/streaming";
import { z } from "zod";
import type { McpEngine } from "../engine/engine";
import type { AuthContext } from "../middleware/auth";
import { Methods } from "../mcp/types";
import { decodeEnvelope, type ParsedEnvelope } from "../protocol/codec";
import { ErrorCode } from "../protocol/errors";
import type { Session } from "../session/session";
import {
  isErrorResponse,
  type JsonRpcId,
  type JsonRpcResponse,
} from "../types/json-rpc";
import { createJsonRpcErrorResponse } from "../utils/jsonrpc_helpers";
import { logger } from "../utils/logger";
import { Subscription } from "./subscription";

const transportLogger = logger.child({ component: "http-transport" });

export const SESSION_HEADER = "Mcp-Session-Id";

/** Keys are lower-case: that is how Hono hands headers to the validator. */
export const McpHeadersSchema = z.object({
  "mcp-session-id": z.string().min(1).optional(),
  accept: z.string().optional(),
  prefer: z.string().optional(),
});
export type McpHeaders = z.infer<typeof McpHeadersSchema>;

export type AppVariables = {
  requestStartTime?: number;
  requestId?: string;
} & AuthContext;

export type AppEnv = { Variables: AppVariables };
type AppContext<P extends string, I extends Input> = Context<AppEnv, P, I>;

export interface TransportOptions {
  keepAliveMs: number;
}

function envelopeId(envelope: ParsedEnvelope): JsonRpcId {
  return envelope.kind === "notification" ? null : envelope.message.id;
}

function isCancelled(response: JsonRpcResponse): boolean {
  return (
    isErrorResponse(response) &&
    response.error.code === ErrorCode.RequestCancelled
  );
}

function wantsAsync(prefer: string | undefined): boolean {
  return (prefer ?? "")
    .split(",")
    .some((token) => token.trim().toLowerCase() === "respond-async");
}

/**
 * POST, GET and DELETE on the single MCP endpoint.
 */
export class StreamableHttpTransport {
  constructor(
    private readonly engine: McpEngine,
    private readonly options: TransportOptions
  ) {}

  /**
   * Looks the session up and checks it belongs to the authenticated client.
   */
  private findSession<P extends string, I extends Input>(
    id: string,
    c: AppContext<P, I>
  ): Session | undefined {
    const session = this.engine.sessions.get(id);
    if (!session) {
      return undefined;
    }
    const client = c.get("auth");
    if (session.client && client && session.client.id !== client.id) {
      transportLogger.warn("Session used by a different client", {
        sessionId: id,
        clientId: client.id,
      });
      return undefined;
    }
    return session;
  }

  private sessionNotFound<P extends string, I extends Input>(
    c: AppContext<P, I>,
    id: JsonRpcId,
    sessionId: string
  ): Response {
    return c.json(
      createJsonRpcErrorResponse(
        id,
        ErrorCode.SessionNotFound,
        `Session not found: ${sessionId}`
      ),
      404
    );
  }

  async handlePost<P extends string, I extends Input>(
    c: AppContext<P, I>,
    headers: McpHeaders
  ): Promise<Response> {
    const decoded = decodeEnvelope(await c.req.text());
    if (!decoded.ok) {
      transportLogger.debug("Rejected malformed envelope", {
        code: decoded.error.error.code,
        message: decoded.error.error.message,
      });
      return c.json(decoded.error, 400);
    }

    const { envelope } = decoded;
    const client = c.get("auth") ?? null;
    const sessionId = headers["mcp-session-id"];
    let session: Session;
    let created = false;

    if (sessionId) {
      const found = this.findSession(sessionId, c);
      if (!found) {
        return this.sessionNotFound(c, envelopeId(envelope), sessionId);
      }
      found.touch();
      session = found;
    } else if (
      envelope.kind === "request" &&
      envelope.message.method === Methods.Initialize
    ) {
      session = this.engine.sessions.create(client);
      this.engine.metrics?.trackSessionOpened();
      created = true;
    } else {
      session = this.engine.sessions.transient(client);
    }

    if (envelope.kind !== "request") {
      await this.engine.dispatcher.dispatch(session, envelope);
      return c.body(null, 202);
    }

    const request = envelope.message;
    const pending = this.engine.dispatcher.dispatchRequest(session, request);

    if (
      wantsAsync(headers.prefer) &&
      session.subscription &&
      request.method !== Methods.Initialize
    ) {
      pending
        .then((response) => {
          if (isCancelled(response)) {
            return;
          }
          this.engine.broadcaster.deliver(session, response);
        })
        .catch((error: unknown) => {
          transportLogger.error("Async response delivery failed", error, {
            sessionId: session.id,
            requestId: request.id,
          });
        });
      return c.body(null, 202);
    }

    const response = await pending;

    if (created) {
      if (isErrorResponse(response)) {
        // Failed handshake: the session never existed for the client.
        this.engine.sessions.close(session.id);
        this.engine.metrics?.trackSessionClosed();
      } else {
        c.header(SESSION_HEADER, session.id);
      }
    }

    return c.json(response, 200);
  }

  handleGet<P extends string, I extends Input>(
    c: AppContext<P, I>,
    headers: McpHeaders
  ): Response {
    if (!(headers.accept ?? "").includes("text/event-stream")) {
      return c.json(
        createJsonRpcErrorResponse(
          null,
          ErrorCode.InvalidRequest,
          "Not Acceptable: client must accept text/event-stream"
        ),
        406
      );
    }

    const sessionId = headers["mcp-session-id"];
    if (!sessionId) {
      return c.json(
        createJsonRpcErrorResponse(
          null,
          ErrorCode.InvalidRequest,
          `Bad Request: ${SESSION_HEADER} header is required`
        ),
        400
      );
    }

    const session = this.findSession(sessionId, c);
    if (!session) {
      return this.sessionNotFound(c, null, sessionId);
    }
    if (!session.isReady) {
      return c.json(
        createJsonRpcErrorResponse(
          null,
          ErrorCode.ServerNotInitialized,
          "Server not initialized"
        ),
        400
      );
    }
    if (session.subscription) {
      return c.json(
        createJsonRpcErrorResponse(
          null,
          ErrorCode.InvalidRequest,
          "Conflict: only one stream is allowed per session"
        ),
        409
      );
    }

    session.touch();
    c.header(SESSION_HEADER, session.id);

    return streamSSE(c, async (stream) => {
      // Attach before the first await so nothing emitted meanwhile is lost.
      const subscription = new Subscription(
        session.id,
        {
          write: async (frame) => {
            await stream.write(frame);
          },
          close: () => stream.close(),
        },
        {
          keepAliveMs: this.options.keepAliveMs,
          onClose: (reason) => {
            session.detachSubscription(subscription);
            session.touch();
            transportLogger.info("Stream closed", {
              sessionId: session.id,
              reason,
            });
          },
        }
      );

      if (!session.attachSubscription(subscription)) {
        subscription.close("session-closed");
        return;
      }

      stream.onAbort(() => {
        subscription.close("client-disconnected");
      });

      transportLogger.info("Stream opened", { sessionId: session.id });
      await subscription.closed;
    });
  }

  handleDelete<P extends string, I extends Input>(
    c: AppContext<P, I>,
    headers: McpHeaders
  ): Response {
    const sessionId = headers["mcp-session-id"];
    if (!sessionId) {
      return c.json(
        createJsonRpcErrorResponse(
          null,
          ErrorCode.InvalidRequest,
          `Bad Request: ${SESSION_HEADER} header is required`
        ),
        400
      );
    }
    if (!this.findSession(sessionId, c)) {
      return this.sessionNotFound(c, null, sessionId);
    }

    this.engine.sessions.close(sessionId);
    this.engine.metrics?.trackSessionClosed();
    return c.body(null, 204);
  }
}
