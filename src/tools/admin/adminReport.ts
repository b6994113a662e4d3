import { z } from "zod";
import type { InMemoryToolRegistry } from "../../registry";
import { structuredResult } from "../utils";

/**
 * Admin-only: describes the calling session. Hidden from every other client.
 */
export function registerAdminReport(tools: InMemoryToolRegistry): void {
  tools.register({
    name: "admin_report",
    description: "Report on the calling session (admin only)",
    inputSchema: { type: "object", properties: {} },
    argsSchema: z.object({}),
    permissionLevel: "admin",
    handler: (_args, ctx) => {
      const { session } = ctx;
      const report = {
        sessionId: session.id,
        state: session.state,
        protocolVersion: session.protocolVersion ?? null,
        client: ctx.client?.id ?? null,
        logLevel: session.logLevel,
        inFlightRequests: session.requests.size,
        subscribedResources: [...session.resourceSubscriptions],
        streamOpen: session.subscription !== null,
        createdAt: session.createdAt.toISOString(),
      };
      return structuredResult(`Session ${session.id} report`, report);
    },
    category: "admin",
    tags: ["diagnostics"],
  });
}
