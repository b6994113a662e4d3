import { z } from "zod";
import { Notifications } from "../mcp/types";
import type { Session } from "../session/session";
import type { SessionStore } from "../session/sessionStore";
import type { JsonRpcMessage, JsonRpcNotification } from "../types/json-rpc";
import { createJsonRpcNotification } from "../utils/jsonrpc_helpers";
import { logger } from "../utils/logger";
import type { MetricsCollector } from "../utils/metrics";
import {
  ClientLogLevelSchema,
  meetsThreshold,
  type ClientLogLevel,
} from "./logLevels";

const broadcastLogger = logger.child({ component: "broadcaster" });

const LogMessageParamsSchema = z
  .object({ level: ClientLogLevelSchema })
  .passthrough();

/**
 * Routes server-initiated envelopes onto session streams.
 *
 * Nothing is buffered: an envelope for a session without an open stream is
 * dropped and counted.
 */
export class NotificationBroadcaster {
  constructor(
    private readonly sessions: SessionStore,
    private readonly metrics?: MetricsCollector
  ) {}

  /**
   * Writes any envelope (notification or late response) to the session's stream.
   * @returns true when the envelope was queued on an open stream
   */
  deliver(session: Session, message: JsonRpcMessage): boolean {
    const subscription = session.subscription;
    const delivered = subscription ? subscription.send(message) : false;
    this.metrics?.trackNotification(delivered);
    if (!delivered) {
      broadcastLogger.debug("No open stream, dropping envelope", {
        sessionId: session.id,
        method: "method" in message ? message.method : undefined,
      });
    }
    return delivered;
  }

  /**
   * Sends a notification to one session. Log messages below the session's
   * level are filtered here, at send time.
   */
  sendToSession(session: Session, notification: JsonRpcNotification): boolean {
    if (notification.method === Notifications.Message) {
      const params = LogMessageParamsSchema.safeParse(notification.params);
      if (
        params.success &&
        !meetsThreshold(params.data.level, session.logLevel)
      ) {
        return false;
      }
    }
    return this.deliver(session, notification);
  }

  sendLog(
    session: Session,
    level: ClientLogLevel,
    data: unknown,
    loggerName?: string
  ): boolean {
    const params: Record<string, unknown> = { level, data };
    if (loggerName) {
      params.logger = loggerName;
    }
    return this.sendToSession(
      session,
      createJsonRpcNotification(Notifications.Message, params)
    );
  }

  /**
   * Sends to every ready session that has an open stream.
   * @returns Number of sessions the notification was queued for
   */
  broadcast(method: string, params?: Record<string, unknown>): number {
    const notification = createJsonRpcNotification(method, params);
    let delivered = 0;
    for (const session of this.sessions.all()) {
      if (!session.isReady || !session.subscription) continue;
      if (this.sendToSession(session, notification)) delivered++;
    }
    broadcastLogger.debug("Broadcast sent", { method, delivered });
    return delivered;
  }

  /**
   * `notifications/resources/updated` to the sessions subscribed to `uri`.
   */
  notifyResourceUpdated(uri: string): number {
    const notification = createJsonRpcNotification(
      Notifications.ResourceUpdated,
      { uri }
    );
    let delivered = 0;
    for (const session of this.sessions.all()) {
      if (!session.isReady || !session.resourceSubscriptions.has(uri)) continue;
      if (this.sendToSession(session, notification)) delivered++;
    }
    return delivered;
  }
}
