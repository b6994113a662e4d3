import { beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { toErrorResponse } from "../../src/engine/dispatcher";
import { McpEngine } from "../../src/engine/engine";
import type { ParsedEnvelope } from "../../src/protocol/codec";
import { ErrorCode, McpError } from "../../src/protocol/errors";
import type { Session } from "../../src/session/session";
import { textResult } from "../../src/tools/utils";
import type { CallToolResult } from "../../src/mcp/types";
import type { JsonRpcResponse, RequestId } from "../../src/types/json-rpc";
import { MetricsCollector } from "../../src/utils/metrics";
import { createReadySession, deferred } from "../helpers";

function request(
  id: RequestId,
  method: string,
  params?: Record<string, unknown>
): ParsedEnvelope {
  return {
    kind: "request",
    message: { jsonrpc: "2.0", id, method, ...(params ? { params } : {}) },
  };
}

function notification(
  method: string,
  params?: Record<string, unknown>
): ParsedEnvelope {
  return {
    kind: "notification",
    message: { jsonrpc: "2.0", method, ...(params ? { params } : {}) },
  };
}

describe("toErrorResponse", () => {
  it("keeps McpError codes and data", () => {
    expect(toErrorResponse(1, new McpError(-32002, "gone", { uri: "x" }))).toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: -32002, message: "gone", data: { uri: "x" } },
    });
  });

  it("maps anything else to InternalError", () => {
    expect(toErrorResponse(2, new Error("boom")).error).toEqual({
      code: ErrorCode.InternalError,
      message: "Internal error: boom",
    });
    expect(toErrorResponse(3, "plain string").error.message).toBe(
      "Internal error: plain string"
    );
  });
});

describe("Dispatcher", () => {
  let engine: McpEngine;
  let metrics: MetricsCollector;
  let session: Session;
  let release: (result: CallToolResult) => void;

  beforeEach(() => {
    metrics = new MetricsCollector();
    engine = new McpEngine({
      serverInfo: { name: "test-server", version: "1.0.0" },
      supportedVersions: ["2025-06-18"],
      defaultClientLogLevel: "info",
      pageSize: 2,
      metrics,
    });
    const { tools } = engine.registries;
    const empty = { type: "object" as const, properties: {} };

    tools.register({
      name: "boom",
      description: "Throws a plain error",
      inputSchema: empty,
      argsSchema: z.object({}),
      handler: () => {
        throw new Error("boom");
      },
    });
    tools.register({
      name: "zod_failure",
      description: "Throws a validation error from inside the handler",
      inputSchema: empty,
      argsSchema: z.object({}),
      handler: () => {
        z.string().parse(1);
        return textResult("unreachable");
      },
    });
    tools.register({
      name: "stubborn",
      description: "Ignores cancellation until released",
      inputSchema: empty,
      argsSchema: z.object({}),
      handler: () => {
        const gate = deferred<CallToolResult>();
        release = gate.resolve;
        return gate.promise;
      },
    });
    engine.start();
    session = createReadySession(engine.sessions);
  });

  it("answers ping and initialize before the session is ready", async () => {
    const fresh = engine.sessions.create();

    await expect(
      engine.dispatcher.dispatch(fresh, request(1, "ping"))
    ).resolves.toEqual({ jsonrpc: "2.0", id: 1, result: {} });

    const response = await engine.dispatcher.dispatch(
      fresh,
      request(2, "initialize", { protocolVersion: "2025-06-18" })
    );
    expect(response && "result" in response).toBe(true);
    expect(fresh.state).toBe("initializing");
  });

  it("gates every other method until the session is ready", async () => {
    const fresh = engine.sessions.create();

    await expect(
      engine.dispatcher.dispatch(fresh, request(1, "tools/list"))
    ).resolves.toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: ErrorCode.ServerNotInitialized, message: "Server not initialized" },
    });
    expect(metrics.getMetrics().methods).toEqual({});
  });

  it("completes the handshake on notifications/initialized", async () => {
    const fresh = engine.sessions.create();
    await engine.dispatcher.dispatch(
      fresh,
      request(1, "initialize", { protocolVersion: "2025-06-18" })
    );

    await expect(
      engine.dispatcher.dispatch(fresh, notification("notifications/initialized"))
    ).resolves.toBeNull();
    expect(fresh.isReady).toBe(true);
  });

  it("reports unknown methods", async () => {
    await expect(
      engine.dispatcher.dispatch(session, request(1, "foo/bar"))
    ).resolves.toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: ErrorCode.MethodNotFound, message: "Method not found: foo/bar" },
    });
  });

  it("does not route to inherited object keys", async () => {
    const response = await engine.dispatcher.dispatch(
      session,
      request(1, "toString")
    );
    expect(response && "error" in response && response.error.code).toBe(
      ErrorCode.MethodNotFound
    );
  });

  it("converts handler errors into one error response", async () => {
    const boom = await engine.dispatcher.dispatch(
      session,
      request(1, "tools/call", { name: "boom" })
    );
    expect(boom).toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: ErrorCode.InternalError, message: "Internal error: boom" },
    });

    const zodFailure = await engine.dispatcher.dispatch(
      session,
      request(2, "tools/call", { name: "zod_failure" })
    );
    expect(zodFailure && "error" in zodFailure && zodFailure.error.message).toBe(
      "Invalid params: Expected string, received number"
    );
    expect(session.requests.size).toBe(0);
  });

  it("rejects malformed params with InvalidParams", async () => {
    const response = await engine.dispatcher.dispatch(
      session,
      request(1, "tools/call", { arguments: {} })
    );
    expect(response && "error" in response && response.error.code).toBe(
      ErrorCode.InvalidParams
    );
  });

  it("rejects a duplicate in-flight id", async () => {
    const first = engine.dispatcher.dispatch(
      session,
      request("dup", "tools/call", { name: "stubborn" })
    );

    await expect(
      engine.dispatcher.dispatch(session, request("dup", "ping"))
    ).resolves.toEqual({ jsonrpc: "2.0", id: "dup", result: {} });
    await expect(
      engine.dispatcher.dispatch(session, request("dup", "tools/list"))
    ).resolves.toEqual({
      jsonrpc: "2.0",
      id: "dup",
      error: { code: ErrorCode.InvalidRequest, message: "Duplicate request id: dup" },
    });

    release(textResult("done"));
    await expect(first).resolves.toEqual({
      jsonrpc: "2.0",
      id: "dup",
      result: { content: [{ type: "text", text: "done" }] },
    });
  });

  it("answers RequestCancelled once cancellation was requested, whatever the handler returns", async () => {
    const pending = engine.dispatcher.dispatch(
      session,
      request(7, "tools/call", { name: "stubborn" })
    );
    await engine.dispatcher.dispatch(
      session,
      notification("notifications/cancelled", { requestId: 7, reason: "stop" })
    );

    release(textResult("finished anyway"));
    const response: JsonRpcResponse | null = await pending;

    expect(response).toEqual({
      jsonrpc: "2.0",
      id: 7,
      error: { code: ErrorCode.RequestCancelled, message: "Request cancelled: stop" },
    });
    expect(session.requests.has(7)).toBe(false);
    expect(metrics.getMetrics().cancellations).toBe(1);
  });

  it("accepts the $/cancelRequest alias", async () => {
    const pending = engine.dispatcher.dispatch(
      session,
      request(8, "tools/call", { name: "stubborn" })
    );
    await engine.dispatcher.dispatch(
      session,
      notification("$/cancelRequest", { id: 8 })
    );
    release(textResult(""));

    const response = await pending;
    expect(response && "error" in response && response.error).toEqual({
      code: ErrorCode.RequestCancelled,
      message: "Request cancelled",
    });
  });

  it("ignores cancellations for unknown ids and other sessions", async () => {
    const other = createReadySession(engine.sessions);
    const pending = engine.dispatcher.dispatch(
      session,
      request(9, "tools/call", { name: "stubborn" })
    );

    await engine.dispatcher.dispatch(
      other,
      notification("notifications/cancelled", { requestId: 9 })
    );
    await engine.dispatcher.dispatch(
      session,
      notification("notifications/cancelled", { requestId: 404 })
    );
    await engine.dispatcher.dispatch(
      session,
      notification("notifications/cancelled", { reason: "no id" })
    );
    release(textResult("ok"));

    await expect(pending).resolves.toEqual({
      jsonrpc: "2.0",
      id: 9,
      result: { content: [{ type: "text", text: "ok" }] },
    });
    expect(metrics.getMetrics().cancellations).toBe(0);
  });

  it("ignores a cancellation that arrives after the response", async () => {
    const pending = engine.dispatcher.dispatch(
      session,
      request(10, "tools/call", { name: "stubborn" })
    );
    release(textResult("done"));
    await expect(pending).resolves.toEqual({
      jsonrpc: "2.0",
      id: 10,
      result: { content: [{ type: "text", text: "done" }] },
    });

    await expect(
      engine.dispatcher.dispatch(
        session,
        notification("notifications/cancelled", { requestId: 10, reason: "late" })
      )
    ).resolves.toBeNull();
    expect(metrics.getMetrics().cancellations).toBe(0);
    expect(session.requests.has(10)).toBe(false);

    const next = await engine.dispatcher.dispatch(session, request(10, "tools/list"));
    expect(next && "result" in next).toBe(true);
  });

  it("ignores responses sent by the client", async () => {
    await expect(
      engine.dispatcher.dispatch(session, {
        kind: "response",
        message: { jsonrpc: "2.0", id: 1, result: {} },
      })
    ).resolves.toBeNull();
  });

  it("counts dispatched methods", async () => {
    await engine.dispatcher.dispatch(session, request(1, "tools/list"));
    await engine.dispatcher.dispatch(session, request(2, "tools/list"));

    expect(metrics.getMetrics().methods["tools/list"].calls).toBe(2);
  });

  it("pages tools/list with the configured page size", async () => {
    const first = await engine.dispatcher.dispatch(session, request(1, "tools/list"));
    const result = z
      .object({
        tools: z.array(z.object({ name: z.string() })),
        nextCursor: z.string(),
      })
      .parse(first && "result" in first ? first.result : undefined);
    expect(result.tools.map((t) => t.name)).toEqual(["boom", "zod_failure"]);

    const second = await engine.dispatcher.dispatch(
      session,
      request(2, "tools/list", { cursor: result.nextCursor })
    );
    expect(second && "result" in second ? second.result : undefined).toEqual({
      tools: [expect.objectContaining({ name: "stubborn" })],
    });

    const invalid = await engine.dispatcher.dispatch(
      session,
      request(3, "tools/list", { cursor: "not-a-cursor" })
    );
    expect(invalid && "error" in invalid && invalid.error).toEqual({
      code: ErrorCode.InvalidParams,
      message: "Invalid cursor: not-a-cursor",
    });
  });
});
