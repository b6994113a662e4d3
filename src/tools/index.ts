import type { InMemoryToolRegistry } from "../registry";
import { registerAdminReport } from "./admin/adminReport";
import { registerBroadcastMessage } from "./example/broadcastMessage";
import { registerCounter } from "./example/counter";
import { registerDoWork } from "./example/doWork";
import { registerEcho } from "./example/echo";
import { registerSlowTask } from "./example/slowTask";

export function registerTools(tools: InMemoryToolRegistry): void {
  registerEcho(tools);
  registerSlowTask(tools);
  registerCounter(tools);
  registerDoWork(tools);
  registerBroadcastMessage(tools);
  registerAdminReport(tools);
}
