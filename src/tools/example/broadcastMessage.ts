import { z } from "zod";
import { Notifications } from "../../mcp/types";
import { ClientLogLevelSchema } from "../../notifications/logLevels";
import type { InMemoryToolRegistry } from "../../registry";
import { structuredResult } from "../utils";

const BroadcastArgsSchema = z.object({
  message: z.string().min(1, "message is required"),
  level: ClientLogLevelSchema.default("info"),
});

export function registerBroadcastMessage(tools: InMemoryToolRegistry): void {
  tools.register({
    name: "broadcast_message",
    description:
      "Send a log message to every session that currently has a stream open",
    inputSchema: {
      type: "object",
      properties: {
        message: {
          type: "string",
          description: "Text to broadcast",
        },
        level: {
          type: "string",
          description: "Log level of the broadcast message",
          enum: [
            "debug",
            "info",
            "notice",
            "warning",
            "error",
            "critical",
            "alert",
            "emergency",
          ],
          default: "info",
        },
      },
      required: ["message"],
    },
    argsSchema: BroadcastArgsSchema,
    handler: ({ message, level }, ctx) => {
      const delivered = ctx.broadcast(Notifications.Message, {
        level,
        logger: "broadcast",
        data: { message, from: ctx.session.id },
      });
      return structuredResult(`Broadcast delivered to ${delivered} session(s)`, {
        delivered,
      });
    },
    category: "demo",
    tags: ["notifications", "example"],
  });
}
