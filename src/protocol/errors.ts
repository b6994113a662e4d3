import { z } from "zod";

export const ErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  // Server-defined range
  SessionNotFound: -32001,
  ResourceNotFound: -32002,
  ServerNotInitialized: -32003,
  RequestCancelled: -32800,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * A protocol or application error that maps onto a JSON-RPC error object as-is.
 */
export class McpError extends Error {
  public readonly code: number;
  public readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = "McpError";
    this.code = code;
    this.data = data;
    Object.setPrototypeOf(this, McpError.prototype);
  }
}

/**
 * Raised from a cancellation checkpoint once the client asked to stop.
 */
export class RequestCancelledError extends McpError {
  constructor(reason?: string) {
    super(
      ErrorCode.RequestCancelled,
      reason ? `Request cancelled: ${reason}` : "Request cancelled"
    );
    this.name = "RequestCancelledError";
    Object.setPrototypeOf(this, RequestCancelledError.prototype);
  }
}

export interface ToolErrorContent {
  type: "text";
  text: string;
}

/**
 * Represents an error that occurred during the execution of a tool's logic,
 * distinct from protocol errors. These are reported within the call result.
 */
export class ToolExecutionError extends Error {
  public readonly content: ToolErrorContent[];
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "ToolExecutionError";
    this.content = [{ type: "text", text: message }];
    this.details = details;
    Object.setPrototypeOf(this, ToolExecutionError.prototype);
  }
}

export const invalidParams = (message: string, data?: unknown) =>
  new McpError(ErrorCode.InvalidParams, message, data);

export const methodNotFound = (message: string, data?: unknown) =>
  new McpError(ErrorCode.MethodNotFound, message, data);

export const resourceNotFound = (uri: string) =>
  new McpError(ErrorCode.ResourceNotFound, `Resource not found: ${uri}`, {
    uri,
  });

export function formatZodIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => (e.path.length > 0 ? `${e.path.join(".")} - ${e.message}` : e.message))
    .join(", ");
}

/**
 * Parses params with a zod schema, turning failures into InvalidParams.
 */
export function parseParams<S extends z.ZodTypeAny>(
  schema: S,
  params: unknown,
  method: string
): z.infer<S> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    throw invalidParams(
      `Invalid parameters for ${method}: ${formatZodIssues(parsed.error)}`,
      parsed.error.flatten()
    );
  }
  return parsed.data;
}
