import { z } from "zod";
import { sleep } from "../../engine/cancellation";
import { ToolExecutionError } from "../../protocol/errors";
import type { InMemoryToolRegistry } from "../../registry";
import type { HandlerContext } from "../../types/mcp";
import { logger } from "../../utils/logger";
import { structuredResult } from "../utils";

const toolLogger = logger.child({ tool: "slow_task" });

const SlowTaskArgsSchema = z.object({
  items: z.number().int().min(1).max(20).default(5),
  delay: z.number().int().min(10).max(5000).default(1000),
  fail: z.boolean().default(false),
});

type SlowTaskArgs = z.infer<typeof SlowTaskArgsSchema>;

/**
 * Slow task tool implementation - processes items one at a time, reporting
 * progress after each and stopping at the next checkpoint once cancelled.
 */
export async function slowTaskHandler(
  { items, delay, fail }: SlowTaskArgs,
  ctx: HandlerContext
) {
  const results: Array<{ item: number; status: string; timestamp: string }> =
    [];

  ctx.log("info", `Starting slow task with ${items} items`, "slow_task");

  for (let i = 0; i < items; i++) {
    ctx.cancellation.throwIfCancellationRequested();

    if (fail && i === Math.floor(items / 2)) {
      throw new ToolExecutionError("Task failed halfway as requested", {
        processedItems: i,
      });
    }

    await sleep(delay, ctx.signal);

    results.push({
      item: i + 1,
      status: "processed",
      timestamp: new Date().toISOString(),
    });
    ctx.progress(i + 1, items, `Processed item ${i + 1}/${items}`);
    ctx.log("debug", `Processed item ${i + 1}/${items}`, "slow_task");
  }

  toolLogger.debug("Slow task finished", {
    sessionId: ctx.session.id,
    items,
  });

  return structuredResult(`Processed ${items} items`, {
    results,
    summary: {
      total: items,
      processingTimeMs: items * delay,
    },
  });
}

export function registerSlowTask(tools: InMemoryToolRegistry): void {
  tools.register({
    name: "slow_task",
    description:
      "Process items slowly, reporting progress; stops early when cancelled",
    inputSchema: {
      type: "object",
      properties: {
        items: {
          type: "integer",
          description: "Number of items to process",
          minimum: 1,
          maximum: 20,
          default: 5,
        },
        delay: {
          type: "integer",
          description: "Delay in milliseconds between processing items",
          minimum: 10,
          maximum: 5000,
          default: 1000,
        },
        fail: {
          type: "boolean",
          description: "Simulate a failure during processing",
          default: false,
        },
      },
      required: [],
    },
    argsSchema: SlowTaskArgsSchema,
    handler: slowTaskHandler,
    category: "demo",
    tags: ["progress", "cancellation", "example"],
  });
}
