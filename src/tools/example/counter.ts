import { z } from "zod";
import type { InMemoryToolRegistry } from "../../registry";
import { structuredResult } from "../utils";

const CounterArgsSchema = z.object({
  action: z.enum(["increment", "get", "reset"]).default("increment"),
  amount: z.number().int().min(1).max(1000).default(1),
});

/**
 * A counter whose value lives in the registration's closure; every session
 * talking to this server sees the same count.
 */
export function registerCounter(tools: InMemoryToolRegistry): void {
  let count = 0;

  tools.register({
    name: "counter",
    description: "Increment, read or reset a server-side counter",
    inputSchema: {
      type: "object",
      properties: {
        action: {
          type: "string",
          description: "What to do with the counter",
          enum: ["increment", "get", "reset"],
          default: "increment",
        },
        amount: {
          type: "integer",
          description: "Step used by 'increment'",
          minimum: 1,
          default: 1,
        },
      },
    },
    argsSchema: CounterArgsSchema,
    handler: ({ action, amount }) => {
      if (action === "increment") {
        count += amount;
      } else if (action === "reset") {
        count = 0;
      }
      return structuredResult(`Counter is ${count}`, { count });
    },
    category: "demo",
    tags: ["state", "example"],
  });
}
