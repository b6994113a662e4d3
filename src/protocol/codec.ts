import { z } from "zod";
import {
  JSONRPC_VERSION,
  type JsonRpcErrorResponse,
  type JsonRpcId,
  type JsonRpcMessage,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from "../types/json-rpc";
import { createJsonRpcErrorResponse } from "../utils/jsonrpc_helpers";
import { ErrorCode, formatZodIssues } from "./errors";

const RequestIdSchema = z.union([z.string(), z.number()]);
const ParamsSchema = z.union([z.record(z.unknown()), z.array(z.unknown())]);

const RequestSchema = z
  .object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: RequestIdSchema,
    method: z.string().min(1, "Method is required"),
    params: ParamsSchema.optional(),
  })
  .strict();

const NotificationSchema = z
  .object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    method: z.string().min(1, "Method is required"),
    params: ParamsSchema.optional(),
  })
  .strict();

const ErrorObjectSchema = z.object({
  code: z.number().int(),
  message: z.string(),
  data: z.unknown().optional(),
});

const ResponseSchema = z.union([
  z
    .object({
      jsonrpc: z.literal(JSONRPC_VERSION),
      id: RequestIdSchema.nullable(),
      result: z.unknown(),
    })
    .strict(),
  z
    .object({
      jsonrpc: z.literal(JSONRPC_VERSION),
      id: RequestIdSchema.nullable(),
      error: ErrorObjectSchema,
    })
    .strict(),
]);

export type ParsedEnvelope =
  | { kind: "request"; message: JsonRpcRequest }
  | { kind: "notification"; message: JsonRpcNotification }
  | { kind: "response"; message: JsonRpcResponse };

export type DecodeResult =
  | { ok: true; envelope: ParsedEnvelope }
  | { ok: false; error: JsonRpcErrorResponse };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Best-effort recovery of the id of a malformed envelope, so the error can echo it.
 */
function recoverId(body: Record<string, unknown>): JsonRpcId {
  const { id } = body;
  return typeof id === "string" || typeof id === "number" ? id : null;
}

function invalid(id: JsonRpcId, message: string, data?: unknown): DecodeResult {
  return {
    ok: false,
    error: createJsonRpcErrorResponse(id, ErrorCode.InvalidRequest, message, data),
  };
}

/**
 * Classifies an already-decoded JSON body as a request, notification or response.
 */
export function parseEnvelope(body: unknown): DecodeResult {
  if (Array.isArray(body)) {
    return invalid(null, "Invalid Request: batch messages are not supported");
  }
  if (!isRecord(body)) {
    return invalid(null, "Invalid Request: envelope must be a JSON object");
  }

  const id = recoverId(body);

  if ("id" in body && body.id === null && "method" in body) {
    return invalid(null, "Invalid Request: requests require a non-null 'id'");
  }

  if ("result" in body || "error" in body) {
    const parsed = ResponseSchema.safeParse(body);
    if (!parsed.success) {
      return invalid(
        id,
        `Invalid JSON-RPC Response: ${formatZodIssues(parsed.error)}`
      );
    }
    const { data } = parsed;
    const message: JsonRpcResponse =
      "error" in data
        ? { jsonrpc: JSONRPC_VERSION, id: data.id, error: data.error }
        : { jsonrpc: JSONRPC_VERSION, id: data.id, result: data.result };
    return { ok: true, envelope: { kind: "response", message } };
  }

  if ("id" in body) {
    const parsed = RequestSchema.safeParse(body);
    if (!parsed.success) {
      return invalid(
        id,
        `Invalid JSON-RPC Request: ${formatZodIssues(parsed.error)}`,
        parsed.error.flatten()
      );
    }
    return { ok: true, envelope: { kind: "request", message: parsed.data } };
  }

  const parsed = NotificationSchema.safeParse(body);
  if (!parsed.success) {
    return invalid(
      null,
      `Invalid JSON-RPC Notification: ${formatZodIssues(parsed.error)}`,
      parsed.error.flatten()
    );
  }
  return { ok: true, envelope: { kind: "notification", message: parsed.data } };
}

/**
 * Decodes raw request text. Malformed JSON yields a parse error with a null id.
 */
export function decodeEnvelope(text: string): DecodeResult {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return {
      ok: false,
      error: createJsonRpcErrorResponse(
        null,
        ErrorCode.ParseError,
        "Parse error: Invalid JSON received."
      ),
    };
  }
  return parseEnvelope(body);
}

/**
 * Renders one Server-Sent Events frame carrying an envelope.
 */
export function formatSseEvent(message: JsonRpcMessage): string {
  return `data: ${JSON.stringify(message)}\n\n`;
}
