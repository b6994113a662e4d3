/**
 * Core JSON-RPC 2.0 Type Definitions
 * Based on: https://www.jsonrpc.org/specification
 */

export const JSONRPC_VERSION = "2.0";

/**
 * Identifier of a request. MCP forbids null ids on requests.
 */
export type RequestId = string | number;

/**
 * Identifier echoed in responses. `null` only when the request id could not be read.
 */
export type JsonRpcId = RequestId | null;

/**
 * The `params` member: a structured object or an array.
 */
export type JsonRpcParams = Record<string, unknown> | unknown[];

export interface JsonRpcRequest<Params = JsonRpcParams> {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  method: string;
  params?: Params;
}

export interface JsonRpcNotification<Params = JsonRpcParams> {
  jsonrpc: typeof JSONRPC_VERSION;
  method: string;
  params?: Params;
  // No 'id' field
}

export interface JsonRpcErrorObject<Data = unknown> {
  code: number; // Integer
  message: string;
  data?: Data;
}

export interface JsonRpcSuccessResponse<Result = unknown> {
  jsonrpc: typeof JSONRPC_VERSION;
  result: Result;
  id: JsonRpcId;
}

export interface JsonRpcErrorResponse<ErrorData = unknown> {
  jsonrpc: typeof JSONRPC_VERSION;
  error: JsonRpcErrorObject<ErrorData>;
  id: JsonRpcId;
}

export type JsonRpcResponse<Result = unknown, ErrorData = unknown> =
  | JsonRpcSuccessResponse<Result>
  | JsonRpcErrorResponse<ErrorData>;

/**
 * Anything that may travel over the wire in either direction.
 */
export type JsonRpcMessage =
  | JsonRpcRequest
  | JsonRpcNotification
  | JsonRpcResponse;

export function isErrorResponse(
  response: JsonRpcResponse
): response is JsonRpcErrorResponse {
  return "error" in response;
}
