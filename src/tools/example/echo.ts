import { z } from "zod";
import type { InMemoryToolRegistry } from "../../registry";
import { textResult } from "../utils";

export function registerEcho(tools: InMemoryToolRegistry): void {
  tools.register({
    name: "echo",
    description: "Return the given text unchanged",
    inputSchema: {
      type: "object",
      properties: {
        text: { type: "string", description: "Text to echo back" },
      },
      required: ["text"],
    },
    argsSchema: z.object({ text: z.string() }),
    handler: ({ text }) => textResult(text),
    category: "demo",
    tags: ["example"],
  });
}
