import { z } from "zod";
import { createCompletionHandlers } from "../handlers/completion_handlers";
import { createLoggingHandlers } from "../handlers/logging_handlers";
import { createPromptHandlers } from "../handlers/prompt_handlers";
import { createResourceHandlers } from "../handlers/resource_handlers";
import { createToolHandlers } from "../handlers/executeTool";
import type { MethodHandler } from "../handlers/types";
import {
  CancelledParamsSchema,
  CancelRequestParamsSchema,
  Methods,
} from "../mcp/types";
import type { NotificationBroadcaster } from "../notifications/broadcaster";
import type { ParsedEnvelope } from "../protocol/codec";
import {
  ErrorCode,
  formatZodIssues,
  McpError,
  RequestCancelledError,
} from "../protocol/errors";
import type { Registries } from "../registry";
import type { CapabilityNegotiator } from "../session/negotiator";
import type { Session } from "../session/session";
import type {
  JsonRpcErrorResponse,
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  RequestId,
} from "../types/json-rpc";
import {
  createJsonRpcErrorResponse,
  createJsonRpcResponse,
} from "../utils/jsonrpc_helpers";
import { logger } from "../utils/logger";
import type { MetricsCollector } from "../utils/metrics";
import { createHandlerContext } from "./context";

const dispatchLogger = logger.child({ component: "dispatcher" });

export interface DispatcherOptions {
  negotiator: CapabilityNegotiator;
  registries: Registries;
  broadcaster: NotificationBroadcaster;
  pageSize: number;
  metrics?: MetricsCollector;
}

/**
 * Converts anything a handler threw into exactly one error response.
 */
export function toErrorResponse(
  id: JsonRpcId,
  error: unknown
): JsonRpcErrorResponse {
  if (error instanceof McpError) {
    return createJsonRpcErrorResponse(id, error.code, error.message, error.data);
  }
  if (error instanceof z.ZodError) {
    return createJsonRpcErrorResponse(
      id,
      ErrorCode.InvalidParams,
      `Invalid params: ${formatZodIssues(error)}`,
      error.flatten()
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return createJsonRpcErrorResponse(
    id,
    ErrorCode.InternalError,
    `Internal error: ${message}`
  );
}

/**
 * Routes decoded envelopes of one session to their handlers.
 *
 * Every request runs on its own promise. The dispatcher alone produces the
 * response for a request id, and produces exactly one.
 */
export class Dispatcher {
  private readonly handlers: Map<string, MethodHandler>;

  constructor(private readonly options: DispatcherOptions) {
    const deps = {
      registries: options.registries,
      pageSize: options.pageSize,
    };
    this.handlers = new Map(
      Object.entries({
        ...createResourceHandlers(deps),
        ...createToolHandlers(deps),
        ...createPromptHandlers(deps),
        ...createLoggingHandlers(),
        ...createCompletionHandlers(deps),
      })
    );
  }

  /**
   * @returns The response for a request; null for notifications and client responses
   */
  async dispatch(
    session: Session,
    envelope: ParsedEnvelope
  ): Promise<JsonRpcResponse | null> {
    switch (envelope.kind) {
      case "request":
        return this.dispatchRequest(session, envelope.message);
      case "notification":
        this.dispatchNotification(session, envelope.message);
        return null;
      case "response":
        dispatchLogger.debug("Ignoring response envelope from client", {
          sessionId: session.id,
          id: envelope.message.id,
        });
        return null;
    }
  }

  /**
   * Registers the request synchronously, before the first await, so a
   * cancellation that arrives right behind it finds the token.
   */
  dispatchRequest(
    session: Session,
    request: JsonRpcRequest
  ): Promise<JsonRpcResponse> {
    const { id, method } = request;

    if (method === Methods.Initialize) {
      return Promise.resolve(this.initialize(session, request));
    }
    if (method === Methods.Ping) {
      return Promise.resolve(createJsonRpcResponse(id, {}));
    }

    if (!session.isReady) {
      dispatchLogger.debug("Rejecting request before initialization", {
        sessionId: session.id,
        method,
        state: session.state,
      });
      return Promise.resolve(
        createJsonRpcErrorResponse(
          id,
          ErrorCode.ServerNotInitialized,
          "Server not initialized"
        )
      );
    }

    if (session.requests.has(id)) {
      return Promise.resolve(
        createJsonRpcErrorResponse(
          id,
          ErrorCode.InvalidRequest,
          `Duplicate request id: ${id}`
        )
      );
    }

    const handler = this.handlers.get(method);
    if (!handler) {
      this.options.metrics?.trackError("MethodNotFound");
      return Promise.resolve(
        createJsonRpcErrorResponse(
          id,
          ErrorCode.MethodNotFound,
          `Method not found: ${method}`
        )
      );
    }

    return this.run(session, request, handler);
  }

  private async run(
    session: Session,
    request: JsonRpcRequest,
    handler: MethodHandler
  ): Promise<JsonRpcResponse> {
    const { id, method } = request;
    const token = session.requests.begin(id);
    const ctx = createHandlerContext(
      session,
      request,
      token,
      this.options.broadcaster
    );
    const endTracker = this.options.metrics?.trackMethod(method);

    let response: JsonRpcResponse;
    try {
      const result = await handler(request.params, ctx);
      response = createJsonRpcResponse(id, result ?? {});
    } catch (error) {
      response = toErrorResponse(id, error);
      if (!(error instanceof McpError)) {
        dispatchLogger.error(`Handler for ${method} failed`, error, {
          sessionId: session.id,
          requestId: id,
        });
      }
    } finally {
      endTracker?.();
    }

    // Whatever the handler produced, a requested cancellation wins.
    const reason = token.reason;
    const previous = session.requests.complete(id);
    if (previous === "cancel-requested") {
      dispatchLogger.info("Request cancelled", {
        sessionId: session.id,
        requestId: id,
        method,
        reason,
      });
      return toErrorResponse(id, new RequestCancelledError(reason));
    }

    if ("error" in response) {
      this.options.metrics?.trackError(String(response.error.code));
    }
    return response;
  }

  private initialize(session: Session, request: JsonRpcRequest): JsonRpcResponse {
    try {
      const result = this.options.negotiator.negotiate(session, request.params);
      return createJsonRpcResponse(request.id, result);
    } catch (error) {
      return toErrorResponse(request.id, error);
    }
  }

  dispatchNotification(
    session: Session,
    notification: JsonRpcNotification
  ): void {
    const { method, params } = notification;

    switch (method) {
      case Methods.Initialized:
        this.options.negotiator.complete(session);
        return;
      case Methods.Cancelled: {
        const parsed = CancelledParamsSchema.safeParse(params);
        if (!parsed.success) {
          dispatchLogger.warn("Malformed cancellation notification", {
            sessionId: session.id,
            issues: formatZodIssues(parsed.error),
          });
          return;
        }
        this.cancel(session, parsed.data.requestId, parsed.data.reason);
        return;
      }
      case Methods.CancelRequest: {
        const parsed = CancelRequestParamsSchema.safeParse(params);
        if (!parsed.success) {
          dispatchLogger.warn("Malformed $/cancelRequest notification", {
            sessionId: session.id,
            issues: formatZodIssues(parsed.error),
          });
          return;
        }
        this.cancel(session, parsed.data.id);
        return;
      }
      default:
        dispatchLogger.debug("Ignoring notification", {
          sessionId: session.id,
          method,
          state: session.state,
        });
    }
  }

  private cancel(session: Session, requestId: RequestId, reason?: string): void {
    if (session.requests.requestCancel(requestId, reason)) {
      this.options.metrics?.trackCancellation();
      dispatchLogger.debug("Cancellation requested", {
        sessionId: session.id,
        requestId,
        reason,
      });
    } else {
      dispatchLogger.debug("Cancellation for unknown or finished request", {
        sessionId: session.id,
        requestId,
      });
    }
  }
}
