import { registerPrompts } from "./prompts";
import type { Registries } from "./registry";
import { registerResources } from "./resources";
import { registerTools } from "./tools";

/**
 * Registers the bundled resources, tools and prompts.
 */
export function registerDemoCatalog(registries: Registries): void {
  registerResources(registries.resources);
  registerTools(registries.tools);
  registerPrompts(registries.prompts, registries.resources);
}
