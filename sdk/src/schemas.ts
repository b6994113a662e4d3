import { z } from "zod";

// --- Zod Schemas for Validation ---

const RequestIdSchema = z.union([z.string(), z.number()]);

export const JsonRpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

/** Any envelope the server may send, on a POST body or the event stream. */
export const EnvelopeSchema = z
  .object({
    jsonrpc: z.literal("2.0"),
    id: RequestIdSchema.nullable().optional(),
    method: z.string().optional(),
    params: z.record(z.unknown()).optional(),
    result: z.unknown().optional(),
    error: JsonRpcErrorSchema.optional(),
  })
  .passthrough();
export type Envelope = z.infer<typeof EnvelopeSchema>;

export const EmptyResultSchema = z.object({}).passthrough();

export const InitializeResultSchema = z
  .object({
    protocolVersion: z.string(),
    capabilities: z.record(z.unknown()),
    serverInfo: z.object({ name: z.string(), version: z.string() }).passthrough(),
    instructions: z.string().optional(),
  })
  .passthrough();
export type InitializeResult = z.infer<typeof InitializeResultSchema>;

const ResourceSchema = z
  .object({
    uri: z.string(),
    name: z.string(),
    title: z.string().optional(),
    description: z.string().optional(),
    mimeType: z.string().optional(),
  })
  .passthrough();
export type ResourceDefinition = z.infer<typeof ResourceSchema>;

const ResourceTemplateSchema = ResourceSchema.omit({ uri: true }).extend({
  uriTemplate: z.string(),
});
export type ResourceTemplateDefinition = z.infer<typeof ResourceTemplateSchema>;

export const ListResourcesResultSchema = z.object({
  resources: z.array(ResourceSchema),
  nextCursor: z.string().optional(),
});
export type ListResourcesResult = z.infer<typeof ListResourcesResultSchema>;

export const ListResourceTemplatesResultSchema = z.object({
  resourceTemplates: z.array(ResourceTemplateSchema),
  nextCursor: z.string().optional(),
});
export type ListResourceTemplatesResult = z.infer<
  typeof ListResourceTemplatesResultSchema
>;

const ResourceContentSchema = z.union([
  z.object({ uri: z.string(), mimeType: z.string().optional(), text: z.string() }),
  z.object({ uri: z.string(), mimeType: z.string().optional(), blob: z.string() }),
]);
export type ResourceContent = z.infer<typeof ResourceContentSchema>;

export const ReadResourceResultSchema = z.object({
  contents: z.array(ResourceContentSchema),
});
export type ReadResourceResult = z.infer<typeof ReadResourceResultSchema>;

const ToolSchema = z
  .object({
    name: z.string(),
    title: z.string().optional(),
    description: z.string(),
    inputSchema: z
      .object({
        type: z.literal("object"),
        properties: z.record(z.object({ type: z.string() }).passthrough()),
        required: z.array(z.string()).optional(),
      })
      .passthrough(),
  })
  .passthrough();
export type ToolDefinition = z.infer<typeof ToolSchema>;

export const ListToolsResultSchema = z.object({
  tools: z.array(ToolSchema),
  nextCursor: z.string().optional(),
});
export type ListToolsResult = z.infer<typeof ListToolsResultSchema>;

const ContentSchema = z.union([
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({ type: z.literal("image"), data: z.string(), mimeType: z.string() }),
  z.object({ type: z.literal("resource"), resource: ResourceContentSchema }),
]);

export const CallToolResultSchema = z.object({
  content: z.array(ContentSchema),
  structuredContent: z.record(z.unknown()).optional(),
  isError: z.boolean().optional(),
});
export type CallToolResult = z.infer<typeof CallToolResultSchema>;

const PromptSchema = z
  .object({
    name: z.string(),
    title: z.string().optional(),
    description: z.string().optional(),
    arguments: z
      .array(
        z.object({
          name: z.string(),
          description: z.string().optional(),
          required: z.boolean().optional(),
        })
      )
      .optional(),
  })
  .passthrough();
export type PromptDefinition = z.infer<typeof PromptSchema>;

export const ListPromptsResultSchema = z.object({
  prompts: z.array(PromptSchema),
  nextCursor: z.string().optional(),
});
export type ListPromptsResult = z.infer<typeof ListPromptsResultSchema>;

export const GetPromptResultSchema = z.object({
  description: z.string().optional(),
  messages: z.array(
    z.object({
      role: z.enum(["user", "assistant"]),
      content: ContentSchema,
    })
  ),
});
export type GetPromptResult = z.infer<typeof GetPromptResultSchema>;

export const CompleteResultSchema = z.object({
  completion: z.object({
    values: z.array(z.string()),
    total: z.number().optional(),
    hasMore: z.boolean().optional(),
  }),
});
export type CompleteResult = z.infer<typeof CompleteResultSchema>;
