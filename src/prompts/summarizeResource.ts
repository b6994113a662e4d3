import type { McpPromptMessage } from "../mcp/types";
import {
  matchPrefix,
  type PromptRegistry,
  type ResourceRegistry,
} from "../registry";

const STYLES: Record<string, string> = {
  brief: "in one or two sentences",
  bullets: "as a short bulleted list",
  detailed: "in a few detailed paragraphs",
};

/**
 * Embeds a resource's current content in a summarization request.
 */
export function registerSummarizeResource(
  prompts: PromptRegistry,
  resources: ResourceRegistry
): void {
  prompts.register({
    name: "summarize_resource",
    title: "Summarize a resource",
    description: "Ask the model to summarize the content of a resource",
    arguments: [
      { name: "uri", description: "URI of the resource", required: true },
      {
        name: "style",
        description: "One of: brief, bullets, detailed",
        required: false,
      },
    ],
    handler: async (args, ctx) => {
      const { uri } = args;
      const style = STYLES[args.style ?? "brief"] ?? STYLES.brief;
      const content = await resources.read(uri, ctx);

      const messages: McpPromptMessage[] = [
        {
          role: "user",
          content: {
            type: "text",
            text: `Summarize the following resource ${style}.`,
          },
        },
        { role: "user", content: { type: "resource", resource: content } },
      ];
      return { description: `Summary of ${uri}`, messages };
    },
    complete: {
      uri: (value) =>
        matchPrefix(
          resources.list().map((resource) => resource.uri),
          value
        ),
      style: (value) => matchPrefix(Object.keys(STYLES), value),
    },
  });
}
