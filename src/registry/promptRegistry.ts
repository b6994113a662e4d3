import type { CompleteResult, GetPromptResult, McpPrompt } from "../mcp/types";
import { invalidParams } from "../protocol/errors";
import type {
  Completer,
  CompletionContext,
  HandlerContext,
  PromptHandler,
  PromptRegistrationOptions,
} from "../types/mcp";
import { runCompleter } from "./completion";
import { SnapshotRegistry } from "./snapshotRegistry";

interface RegisteredPrompt {
  definition: McpPrompt;
  handler: PromptHandler;
  completers?: Record<string, Completer>;
}

export class PromptRegistry extends SnapshotRegistry<RegisteredPrompt> {
  protected readonly kind = "Prompt";

  register(options: PromptRegistrationOptions): void {
    const definition: McpPrompt = { name: options.name };
    if (options.title) definition.title = options.title;
    if (options.description) definition.description = options.description;
    if (options.arguments) definition.arguments = options.arguments;

    this.insert(options.name, {
      definition,
      handler: options.handler,
      completers: options.complete,
    });
  }

  unregister(name: string): boolean {
    return this.delete(name);
  }

  list(): McpPrompt[] {
    return [...this.snapshot().values()].map((p) => p.definition);
  }

  /**
   * Renders a prompt after checking its required arguments.
   * @throws McpError InvalidParams for an unknown prompt or a missing argument
   */
  async get(
    name: string,
    args: Record<string, string>,
    ctx: HandlerContext
  ): Promise<GetPromptResult> {
    const prompt = this.snapshot().get(name);
    if (!prompt) {
      throw invalidParams(`Unknown prompt: ${name}`, { name });
    }

    const missing = (prompt.definition.arguments ?? [])
      .filter((arg) => arg.required && !Object.hasOwn(args, arg.name))
      .map((arg) => arg.name);
    if (missing.length > 0) {
      throw invalidParams(
        `Missing required arguments for prompt '${name}': ${missing.join(", ")}`,
        { missing }
      );
    }

    return prompt.handler(args, ctx);
  }

  /**
   * Suggests values for one argument of a prompt.
   * @throws McpError InvalidParams for an unknown prompt
   */
  async complete(
    name: string,
    argument: string,
    value: string,
    context: CompletionContext
  ): Promise<CompleteResult["completion"]> {
    const prompt = this.snapshot().get(name);
    if (!prompt) {
      throw invalidParams(`Unknown prompt: ${name}`, { name });
    }
    return runCompleter(prompt.completers, argument, value, context);
  }
}
