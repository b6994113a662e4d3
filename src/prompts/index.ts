import type { PromptRegistry, ResourceRegistry } from "../registry";
import { registerSummarizeResource } from "./summarizeResource";

export function registerPrompts(
  prompts: PromptRegistry,
  resources: ResourceRegistry
): void {
  registerSummarizeResource(prompts, resources);
}
