import type { Registries } from "../registry";
import type { HandlerContext } from "../types/mcp";

/**
 * Serves one routed method. Throwing is how a handler reports a protocol error.
 */
export type MethodHandler = (
  params: unknown,
  ctx: HandlerContext
) => Promise<unknown>;

export type MethodHandlers = Record<string, MethodHandler>;

export interface HandlerDeps {
  registries: Registries;
  pageSize: number;
}
