import type {
  CompleteResult,
  McpResource,
  McpResourceContent,
  McpResourceTemplate,
} from "../mcp/types";
import { invalidParams, resourceNotFound } from "../protocol/errors";
import type {
  Completer,
  CompletionContext,
  DynamicResourceOptions,
  HandlerContext,
  ResourceBody,
  ResourceReadHandler,
  StaticResourceOptions,
  TemplateResourceOptions,
} from "../types/mcp";
import { EMPTY_COMPLETION, runCompleter } from "./completion";
import { SnapshotRegistry } from "./snapshotRegistry";
import {
  compileUriTemplate,
  isUriTemplate,
  schemeOf,
  type UriTemplateMatcher,
  type UriVariables,
} from "./uriTemplate";

export type ResourceEntry =
  | { kind: "static"; resource: McpResource; content: ResourceBody }
  | { kind: "dynamic"; resource: McpResource; read: ResourceReadHandler }
  | {
      kind: "template";
      template: McpResourceTemplate;
      matcher: UriTemplateMatcher;
      read: ResourceReadHandler;
      completers?: Record<string, Completer>;
    };

export interface ResolvedResource {
  entry: ResourceEntry;
  params: UriVariables;
}

type Metadata = Pick<McpResource, "name" | "title" | "description" | "mimeType">;

function metadataOf(options: Metadata): Metadata {
  return {
    name: options.name,
    ...(options.title ? { title: options.title } : {}),
    ...(options.description ? { description: options.description } : {}),
    ...(options.mimeType ? { mimeType: options.mimeType } : {}),
  };
}

function toContent(
  uri: string,
  mimeType: string | undefined,
  body: ResourceBody | string
): McpResourceContent {
  const normalized = typeof body === "string" ? { text: body } : body;
  const meta = mimeType ? { uri, mimeType } : { uri };
  return "text" in normalized
    ? { ...meta, text: normalized.text }
    : { ...meta, blob: normalized.blob };
}

/**
 * Resources by URI (static and dynamic) and by URI template.
 *
 * Reads try the exact URI first, then each template in registration order.
 */
export class ResourceRegistry extends SnapshotRegistry<ResourceEntry> {
  protected readonly kind = "Resource";

  registerStatic(options: StaticResourceOptions): void {
    this.assertConcrete(options.uri);
    this.insert(options.uri, {
      kind: "static",
      resource: { uri: options.uri, ...metadataOf(options) },
      content: options.content,
    });
  }

  registerDynamic(options: DynamicResourceOptions): void {
    this.assertConcrete(options.uri);
    this.insert(options.uri, {
      kind: "dynamic",
      resource: { uri: options.uri, ...metadataOf(options) },
      read: options.read,
    });
  }

  registerTemplate(options: TemplateResourceOptions): void {
    if (!isUriTemplate(options.uriTemplate)) {
      throw new Error(
        `URI template '${options.uriTemplate}' has no {placeholders}; register it as a resource instead`
      );
    }
    this.insert(options.uriTemplate, {
      kind: "template",
      template: {
        uriTemplate: options.uriTemplate,
        ...metadataOf(options),
      },
      matcher: compileUriTemplate(options.uriTemplate),
      read: options.read,
      completers: options.complete,
    });
  }

  /**
   * Removes a resource by URI or a template by its template string.
   */
  unregister(uriOrTemplate: string): boolean {
    return this.delete(uriOrTemplate);
  }

  /**
   * Fixed-URI resources, optionally restricted to one scheme.
   */
  list(scheme?: string): McpResource[] {
    const result: McpResource[] = [];
    for (const entry of this.snapshot().values()) {
      if (entry.kind === "template") continue;
      if (scheme && schemeOf(entry.resource.uri) !== scheme) continue;
      result.push(entry.resource);
    }
    return result;
  }

  listTemplates(scheme?: string): McpResourceTemplate[] {
    const result: McpResourceTemplate[] = [];
    for (const entry of this.snapshot().values()) {
      if (entry.kind !== "template") continue;
      if (scheme && schemeOf(entry.template.uriTemplate) !== scheme) continue;
      result.push(entry.template);
    }
    return result;
  }

  resolve(uri: string): ResolvedResource | undefined {
    const entries = this.snapshot();

    const exact = entries.get(uri);
    if (exact && exact.kind !== "template") {
      return { entry: exact, params: {} };
    }

    for (const entry of entries.values()) {
      if (entry.kind !== "template") continue;
      const params = entry.matcher.match(uri);
      if (params) {
        return { entry, params };
      }
    }
    return undefined;
  }

  /**
   * @throws McpError ResourceNotFound when nothing matches the URI
   */
  async read(uri: string, ctx: HandlerContext): Promise<McpResourceContent> {
    const resolved = this.resolve(uri);
    if (!resolved) {
      throw resourceNotFound(uri);
    }

    const { entry, params } = resolved;
    if (entry.kind === "static") {
      return toContent(uri, entry.resource.mimeType, entry.content);
    }
    const mimeType =
      entry.kind === "dynamic"
        ? entry.resource.mimeType
        : entry.template.mimeType;
    return toContent(uri, mimeType, await entry.read({ uri, params }, ctx));
  }

  /**
   * Suggests values for one variable of a URI template. A fixed URI has
   * nothing to complete.
   * @throws McpError InvalidParams when no resource or template is registered under `uri`
   */
  async complete(
    uri: string,
    argument: string,
    value: string,
    context: CompletionContext
  ): Promise<CompleteResult["completion"]> {
    const entry = this.snapshot().get(uri);
    if (!entry) {
      throw invalidParams(`Unknown resource template: ${uri}`, { uri });
    }
    if (entry.kind !== "template") {
      return EMPTY_COMPLETION;
    }
    return runCompleter(entry.completers, argument, value, context);
  }

  private assertConcrete(uri: string): void {
    if (!uri) {
      throw new Error("Resource URI is required");
    }
    if (isUriTemplate(uri)) {
      throw new Error(
        `Resource URI '${uri}' contains placeholders; use registerTemplate`
      );
    }
  }
}
