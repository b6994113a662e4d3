import { describe, expect, it } from "vitest";
import { RequestCancelledError, ToolExecutionError } from "../../../src/protocol/errors";
import { slowTaskHandler } from "../../../src/tools/example/slowTask";
import { createTestContext } from "../../helpers";

describe("Tool: slow_task", () => {
  it("processes every item and reports progress", async () => {
    const { ctx, sent } = createTestContext({
      params: { name: "slow_task", _meta: { progressToken: "job-1" } },
      logLevel: "info",
    });

    const result = await slowTaskHandler({ items: 2, delay: 10, fail: false }, ctx);

    expect(result.content).toEqual([{ type: "text", text: "Processed 2 items" }]);
    expect(result.structuredContent).toMatchObject({
      results: [
        { item: 1, status: "processed" },
        { item: 2, status: "processed" },
      ],
      summary: { total: 2, processingTimeMs: 20 },
    });

    expect(await sent()).toEqual([
      {
        jsonrpc: "2.0",
        method: "notifications/message",
        params: {
          level: "info",
          data: "Starting slow task with 2 items",
          logger: "slow_task",
        },
      },
      {
        jsonrpc: "2.0",
        method: "notifications/progress",
        params: {
          progressToken: "job-1",
          progress: 1,
          total: 2,
          message: "Processed item 1/2",
        },
      },
      {
        jsonrpc: "2.0",
        method: "notifications/progress",
        params: {
          progressToken: "job-1",
          progress: 2,
          total: 2,
          message: "Processed item 2/2",
        },
      },
    ]);
  });

  it("fails halfway when asked to", async () => {
    const { ctx } = createTestContext();

    const run = slowTaskHandler({ items: 4, delay: 10, fail: true }, ctx);

    await expect(run).rejects.toBeInstanceOf(ToolExecutionError);
    await expect(run).rejects.toThrow("Task failed halfway as requested");
  });

  it("stops at the next checkpoint once cancelled", async () => {
    const { ctx, token, sent } = createTestContext({
      params: { name: "slow_task", _meta: { progressToken: 1 } },
      logLevel: "warning",
    });

    const run = slowTaskHandler({ items: 20, delay: 50, fail: false }, ctx);
    setTimeout(() => token.requestCancel("enough"), 20);

    await expect(run).rejects.toBeInstanceOf(RequestCancelledError);
    expect(await sent()).toEqual([]);
  });
});
