import { describe, expect, it } from "vitest";
import {
  decodeEnvelope,
  formatSseEvent,
  parseEnvelope,
} from "../../src/protocol/codec";
import { ErrorCode } from "../../src/protocol/errors";
import {
  createJsonRpcErrorResponse,
  createJsonRpcNotification,
  createJsonRpcResponse,
} from "../../src/utils/jsonrpc_helpers";

describe("parseEnvelope", () => {
  it("classifies a request", () => {
    const result = parseEnvelope({
      jsonrpc: "2.0",
      id: 1,
      method: "tools/list",
      params: {},
    });
    expect(result).toEqual({
      ok: true,
      envelope: {
        kind: "request",
        message: { jsonrpc: "2.0", id: 1, method: "tools/list", params: {} },
      },
    });
  });

  it("accepts fractional numeric ids", () => {
    const result = parseEnvelope({ jsonrpc: "2.0", id: 1.5, method: "ping" });
    expect(result).toEqual({
      ok: true,
      envelope: {
        kind: "request",
        message: { jsonrpc: "2.0", id: 1.5, method: "ping" },
      },
    });
  });

  it("classifies a notification", () => {
    const result = parseEnvelope({
      jsonrpc: "2.0",
      method: "notifications/initialized",
    });
    expect(result.ok && result.envelope.kind).toBe("notification");
  });

  it("classifies success and error responses", () => {
    const success = parseEnvelope({ jsonrpc: "2.0", id: "a", result: {} });
    expect(success.ok && success.envelope.kind).toBe("response");

    const failure = parseEnvelope({
      jsonrpc: "2.0",
      id: "a",
      error: { code: -32000, message: "nope" },
    });
    expect(failure).toEqual({
      ok: true,
      envelope: {
        kind: "response",
        message: {
          jsonrpc: "2.0",
          id: "a",
          error: { code: -32000, message: "nope" },
        },
      },
    });
  });

  it("accepts array params", () => {
    const result = parseEnvelope({
      jsonrpc: "2.0",
      id: 2,
      method: "ping",
      params: [1, 2],
    });
    expect(result.ok).toBe(true);
  });

  it("rejects a wrong jsonrpc version and echoes the id", () => {
    const result = parseEnvelope({ jsonrpc: "1.0", id: 7, method: "ping" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.id).toBe(7);
      expect(result.error.error.code).toBe(ErrorCode.InvalidRequest);
      expect(result.error.error.message).toContain("Invalid JSON-RPC Request");
    }
  });

  it("rejects a request with a null id", () => {
    const result = parseEnvelope({ jsonrpc: "2.0", id: null, method: "ping" });
    expect(result).toEqual({
      ok: false,
      error: createJsonRpcErrorResponse(
        null,
        ErrorCode.InvalidRequest,
        "Invalid Request: requests require a non-null 'id'"
      ),
    });
  });

  it("rejects scalar params", () => {
    const result = parseEnvelope({
      jsonrpc: "2.0",
      id: 3,
      method: "ping",
      params: "x",
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.error.code).toBe(ErrorCode.InvalidRequest);
    }
  });

  it("rejects batches", () => {
    const result = parseEnvelope([{ jsonrpc: "2.0", id: 1, method: "ping" }]);
    expect(result).toEqual({
      ok: false,
      error: createJsonRpcErrorResponse(
        null,
        ErrorCode.InvalidRequest,
        "Invalid Request: batch messages are not supported"
      ),
    });
  });

  it("rejects non-objects", () => {
    const result = parseEnvelope("ping");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.error.message).toBe(
        "Invalid Request: envelope must be a JSON object"
      );
    }
  });

  it("rejects a response carrying both result and error", () => {
    const result = parseEnvelope({
      jsonrpc: "2.0",
      id: 1,
      result: {},
      error: { code: 1, message: "x" },
    });
    expect(result.ok).toBe(false);
  });
});

describe("decodeEnvelope", () => {
  it("returns a parse error with a null id for invalid JSON", () => {
    expect(decodeEnvelope("{not json")).toEqual({
      ok: false,
      error: {
        jsonrpc: "2.0",
        id: null,
        error: {
          code: ErrorCode.ParseError,
          message: "Parse error: Invalid JSON received.",
        },
      },
    });
  });

  it("decodes valid text", () => {
    const result = decodeEnvelope('{"jsonrpc":"2.0","id":"x","method":"ping"}');
    expect(result.ok && result.envelope.kind).toBe("request");
  });
});

describe("builders and SSE framing", () => {
  it("builds responses and notifications", () => {
    expect(createJsonRpcResponse(1, { ok: true })).toEqual({
      jsonrpc: "2.0",
      id: 1,
      result: { ok: true },
    });
    expect(createJsonRpcErrorResponse(1, -32601, "Method not found: x")).toEqual(
      {
        jsonrpc: "2.0",
        id: 1,
        error: { code: -32601, message: "Method not found: x" },
      }
    );
    expect(createJsonRpcNotification("notifications/tools/list_changed")).toEqual(
      { jsonrpc: "2.0", method: "notifications/tools/list_changed" }
    );
  });

  it("renders one data frame per envelope", () => {
    const frame = formatSseEvent(
      createJsonRpcNotification("notifications/message", { level: "info" })
    );
    expect(frame).toBe(
      'data: {"jsonrpc":"2.0","method":"notifications/message","params":{"level":"info"}}\n\n'
    );
  });
});
