import { PromptRegistry } from "./promptRegistry";
import { ResourceRegistry } from "./resourceRegistry";
import { InMemoryToolRegistry } from "./toolRegistry";

export { matchPrefix, MAX_COMPLETION_VALUES } from "./completion";
export { paginate, type Page } from "./pagination";
export { PromptRegistry } from "./promptRegistry";
export { ResourceRegistry, type ResourceEntry } from "./resourceRegistry";
export { InMemoryToolRegistry, type RegisteredTool } from "./toolRegistry";
export { compileUriTemplate, schemeOf } from "./uriTemplate";

export interface Registries {
  resources: ResourceRegistry;
  tools: InMemoryToolRegistry;
  prompts: PromptRegistry;
}

export function createRegistries(): Registries {
  return {
    resources: new ResourceRegistry(),
    tools: new InMemoryToolRegistry(),
    prompts: new PromptRegistry(),
  };
}
