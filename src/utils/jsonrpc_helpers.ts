import {
  JSONRPC_VERSION,
  type JsonRpcErrorObject,
  type JsonRpcErrorResponse,
  type JsonRpcId,
  type JsonRpcNotification,
  type JsonRpcParams,
  type JsonRpcSuccessResponse,
} from "../types/json-rpc";

/**
 * Creates a successful JSON-RPC response object.
 */
export function createJsonRpcResponse<Result = unknown>(
  id: JsonRpcId,
  result: Result
): JsonRpcSuccessResponse<Result> {
  return {
    jsonrpc: JSONRPC_VERSION,
    result,
    id,
  };
}

/**
 * Creates an error JSON-RPC response object.
 *
 * @param id The request ID (null if parsing failed before the ID was read).
 */
export function createJsonRpcErrorResponse<ErrorData = unknown>(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: ErrorData
): JsonRpcErrorResponse<ErrorData> {
  const error: JsonRpcErrorObject<ErrorData> = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return {
    jsonrpc: JSONRPC_VERSION,
    error,
    id,
  };
}

/**
 * Creates a notification envelope. Notifications never carry an id.
 */
export function createJsonRpcNotification<
  Params extends JsonRpcParams = Record<string, unknown>,
>(method: string, params?: Params): JsonRpcNotification<Params> {
  const notification: JsonRpcNotification<Params> = {
    jsonrpc: JSONRPC_VERSION,
    method,
  };
  if (params !== undefined) {
    notification.params = params;
  }
  return notification;
}
