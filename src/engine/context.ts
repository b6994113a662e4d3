import { Notifications, readProgressToken } from "../mcp/types";
import type { NotificationBroadcaster } from "../notifications/broadcaster";
import type { Session } from "../session/session";
import type { JsonRpcRequest } from "../types/json-rpc";
import type { HandlerContext } from "../types/mcp";
import { createJsonRpcNotification } from "../utils/jsonrpc_helpers";
import type { CancellationToken } from "./cancellation";

/**
 * Binds the notification helpers of a handler to its session and request.
 */
export function createHandlerContext(
  session: Session,
  request: JsonRpcRequest,
  token: CancellationToken,
  broadcaster: NotificationBroadcaster
): HandlerContext {
  const progressToken = readProgressToken(request.params);

  return {
    session,
    client: session.client,
    requestId: request.id,
    method: request.method,
    cancellation: token,
    signal: token.signal,

    log(level, data, loggerName) {
      broadcaster.sendLog(session, level, data, loggerName);
    },

    progress(progress, total, message) {
      if (progressToken === undefined) {
        return;
      }
      const params: Record<string, unknown> = { progressToken, progress };
      if (total !== undefined) params.total = total;
      if (message) params.message = message;
      broadcaster.sendToSession(
        session,
        createJsonRpcNotification(Notifications.Progress, params)
      );
    },

    notify(method, params) {
      broadcaster.sendToSession(
        session,
        createJsonRpcNotification(method, params)
      );
    },

    broadcast(method, params) {
      return broadcaster.broadcast(method, params);
    },

    notifyResourceUpdated(uri) {
      return broadcaster.notifyResourceUpdated(uri);
    },
  };
}
