import { z } from "zod";
import type { InMemoryToolRegistry } from "../../registry";
import type { HandlerContext } from "../../types/mcp";
import { textResult } from "../utils";

const DoWorkArgsSchema = z.object({
  task: z.string().min(1, "task is required"),
});

/**
 * Performs some pretend work, narrating it through client log notifications.
 */
export function doWorkHandler(
  { task }: z.infer<typeof DoWorkArgsSchema>,
  ctx: HandlerContext
) {
  ctx.log("info", `Starting to process task: ${task}`, "do_work");
  ctx.log("debug", "Initializing task processor...", "do_work");

  if (task.toLowerCase().includes("data")) {
    ctx.log("debug", "Processing data-related task", "do_work");
    ctx.log("info", "Validating input data...", "do_work");
    ctx.log("notice", "Data validation successful", "do_work");
    return textResult(`Successfully processed data task: ${task}`);
  }

  if (task.toLowerCase().includes("risky")) {
    ctx.log("warning", "Task marked as risky, proceeding carefully", "do_work");
  }

  ctx.log("debug", `Processing general task: ${task}`, "do_work");
  ctx.log("info", "Task completed successfully", "do_work");
  return textResult(`Task '${task}' completed successfully`);
}

export function registerDoWork(tools: InMemoryToolRegistry): void {
  tools.register({
    name: "do_work",
    description: "Perform a task and report its steps as log messages",
    inputSchema: {
      type: "object",
      properties: {
        task: {
          type: "string",
          description: "The task to perform",
        },
      },
      required: ["task"],
    },
    argsSchema: DoWorkArgsSchema,
    handler: doWorkHandler,
    category: "demo",
    tags: ["logging", "example"],
  });
}
