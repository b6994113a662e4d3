import type { CallToolResult, McpTool } from "../mcp/types";
import { formatZodIssues, invalidParams } from "../protocol/errors";
import type {
  HandlerContext,
  ToolRegistrationOptions,
  ToolVisibilityScope,
} from "../types/mcp";
import { hasPermission, type PermissionLevel } from "../utils/auth";
import { SnapshotRegistry } from "./snapshotRegistry";

/**
 * A registered tool with its argument type erased behind `invoke`.
 */
export interface RegisteredTool {
  definition: McpTool;
  permissionLevel: PermissionLevel;
  enabled: boolean | ((scope: ToolVisibilityScope) => boolean);
  invoke(
    rawArgs: Record<string, unknown>,
    ctx: HandlerContext
  ): Promise<CallToolResult>;
}

/**
 * In-memory tool registry.
 * Visibility is evaluated per session: the `enabled` flag or predicate, then
 * the client's permission level.
 */
export class InMemoryToolRegistry extends SnapshotRegistry<RegisteredTool> {
  protected readonly kind = "Tool";

  /**
   * Register a new tool with the registry
   * @param options The tool configuration and handler
   */
  register<Args>(options: ToolRegistrationOptions<Args>): void {
    if (!options.name) {
      throw new Error("Tool name is required");
    }

    const { name, argsSchema, handler } = options;
    const definition: McpTool = {
      name,
      description: options.description,
      inputSchema: options.inputSchema,
    };
    if (options.title) {
      definition.title = options.title;
    }
    if (options.category || options.tags) {
      definition.annotations = { category: options.category, tags: options.tags };
    }

    this.insert(name, {
      definition,
      permissionLevel: options.permissionLevel || "public",
      enabled: options.enabled ?? true,
      async invoke(rawArgs, ctx) {
        const parsed = argsSchema.safeParse(rawArgs);
        if (!parsed.success) {
          throw invalidParams(
            `Invalid arguments for tool '${name}': ${formatZodIssues(parsed.error)}`,
            parsed.error.flatten()
          );
        }
        return handler(parsed.data, ctx);
      },
    });
  }

  /**
   * Unregister a tool from the registry
   * @returns true if the tool was unregistered, false if it wasn't found
   */
  unregister(name: string): boolean {
    return this.delete(name);
  }

  isVisible(tool: RegisteredTool, scope: ToolVisibilityScope): boolean {
    const enabled =
      typeof tool.enabled === "function" ? tool.enabled(scope) : tool.enabled;
    return enabled && hasPermission(scope.client, tool.permissionLevel);
  }

  /**
   * Get a tool the given session may see and call
   */
  getTool(name: string, scope: ToolVisibilityScope): RegisteredTool | undefined {
    const tool = this.snapshot().get(name);
    return tool && this.isVisible(tool, scope) ? tool : undefined;
  }

  /**
   * Get the definitions of every tool visible to the session
   */
  getVisibleTools(scope: ToolVisibilityScope): McpTool[] {
    const result: McpTool[] = [];
    for (const tool of this.snapshot().values()) {
      if (this.isVisible(tool, scope)) {
        result.push(tool.definition);
      }
    }
    return result;
  }
}
