import { describe, expect, it } from "vitest";
import { InMemoryToolRegistry } from "../../../src/registry";
import { registerCounter } from "../../../src/tools/example/counter";
import { createTestContext } from "../../helpers";

describe("Tool: counter", () => {
  it("keeps its count across calls", async () => {
    const tools = new InMemoryToolRegistry();
    registerCounter(tools);
    const { ctx, session } = createTestContext();
    const counter = tools.getTool("counter", { session, client: null });
    if (!counter) throw new Error("counter is not registered");

    await counter.invoke({}, ctx);
    await counter.invoke({ amount: 5 }, ctx);

    await expect(counter.invoke({ action: "get" }, ctx)).resolves.toEqual({
      content: [{ type: "text", text: "Counter is 6" }],
      structuredContent: { count: 6 },
    });
    await expect(counter.invoke({ action: "reset" }, ctx)).resolves.toEqual({
      content: [{ type: "text", text: "Counter is 0" }],
      structuredContent: { count: 0 },
    });
  });

  it("keeps separate counts per registration", async () => {
    const first = new InMemoryToolRegistry();
    const second = new InMemoryToolRegistry();
    registerCounter(first);
    registerCounter(second);
    const { ctx, session } = createTestContext();

    await first.getTool("counter", { session, client: null })?.invoke({}, ctx);
    const result = await second
      .getTool("counter", { session, client: null })
      ?.invoke({ action: "get" }, ctx);

    expect(result?.structuredContent).toEqual({ count: 0 });
  });

  it("rejects out-of-range amounts", async () => {
    const tools = new InMemoryToolRegistry();
    registerCounter(tools);
    const { ctx, session } = createTestContext();

    await expect(
      tools.getTool("counter", { session, client: null })?.invoke({ amount: 0 }, ctx)
    ).rejects.toThrow("Invalid arguments for tool 'counter'");
  });
});
