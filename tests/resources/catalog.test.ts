import { describe, expect, it } from "vitest";
import { registerDemoCatalog } from "../../src/catalog";
import { ErrorCode } from "../../src/protocol/errors";
import { createRegistries } from "../../src/registry";
import {
  APP_SETTINGS,
  SETTINGS_URI,
  TIME_URI,
  USER_PROFILE_TEMPLATE,
  WELCOME_MESSAGE,
  WELCOME_URI,
} from "../../src/resources";
import { createTestContext } from "../helpers";

function createCatalog() {
  const registries = createRegistries();
  registerDemoCatalog(registries);
  return registries;
}

describe("Demo resources", () => {
  it("registers the fixed resources and the profile template", () => {
    const { resources } = createCatalog();

    expect(resources.list().map((r) => r.uri)).toEqual([
      WELCOME_URI,
      TIME_URI,
      "file:///docs/readme.md",
      "file:///docs/changelog.md",
      SETTINGS_URI,
    ]);
    expect(resources.listTemplates().map((t) => t.uriTemplate)).toEqual([
      "users://{user_id}/profile",
    ]);
    expect(resources.list("file").map((r) => r.name)).toEqual([
      "README",
      "Changelog",
    ]);
  });

  it("serves the welcome message and settings verbatim", async () => {
    const { resources } = createCatalog();
    const { ctx } = createTestContext();

    await expect(resources.read(WELCOME_URI, ctx)).resolves.toEqual({
      uri: WELCOME_URI,
      mimeType: "text/plain",
      text: WELCOME_MESSAGE,
    });

    const settings = await resources.read(SETTINGS_URI, ctx);
    expect("text" in settings && JSON.parse(settings.text)).toEqual(APP_SETTINGS);
  });

  it("computes the time on every read", async () => {
    const { resources } = createCatalog();
    const { ctx } = createTestContext();

    const content = await resources.read(TIME_URI, ctx);
    expect("text" in content && !Number.isNaN(Date.parse(content.text))).toBe(true);
  });

  it("resolves user profiles from the template", async () => {
    const { resources } = createCatalog();
    const { ctx } = createTestContext();

    const content = await resources.read("users://bob/profile", ctx);
    expect(content.mimeType).toBe("application/json");
    expect("text" in content && JSON.parse(content.text)).toEqual({
      id: "bob",
      name: "Bob Example",
      email: "bob@example.com",
      role: "member",
      joined: "2024-03-02",
    });

    await expect(resources.read("users://zed/profile", ctx)).rejects.toMatchObject({
      code: ErrorCode.ResourceNotFound,
      message: "Resource not found: users://zed/profile",
      data: { uri: "users://zed/profile" },
    });
  });
});

describe("Prompt: summarize_resource", () => {
  it("embeds the resource content", async () => {
    const { prompts } = createCatalog();
    const { ctx } = createTestContext();

    await expect(
      prompts.get("summarize_resource", { uri: WELCOME_URI, style: "bullets" }, ctx)
    ).resolves.toEqual({
      description: `Summary of ${WELCOME_URI}`,
      messages: [
        {
          role: "user",
          content: {
            type: "text",
            text: "Summarize the following resource as a short bulleted list.",
          },
        },
        {
          role: "user",
          content: {
            type: "resource",
            resource: { uri: WELCOME_URI, mimeType: "text/plain", text: WELCOME_MESSAGE },
          },
        },
      ],
    });
  });

  it("falls back to the brief style", async () => {
    const { prompts } = createCatalog();
    const { ctx } = createTestContext();

    const result = await prompts.get(
      "summarize_resource",
      { uri: WELCOME_URI, style: "poetic" },
      ctx
    );
    expect(result.messages[0].content).toEqual({
      type: "text",
      text: "Summarize the following resource in one or two sentences.",
    });
  });
});

describe("Catalog completions", () => {
  it("suggests resource URIs and styles for summarize_resource", async () => {
    const { prompts } = createCatalog();

    await expect(
      prompts.complete("summarize_resource", "uri", "file:", { arguments: {} })
    ).resolves.toEqual({
      values: ["file:///docs/readme.md", "file:///docs/changelog.md"],
      total: 2,
      hasMore: false,
    });
    await expect(
      prompts.complete("summarize_resource", "style", "b", { arguments: {} })
    ).resolves.toEqual({
      values: ["brief", "bullets"],
      total: 2,
      hasMore: false,
    });
  });

  it("suggests user ids for the profile template", async () => {
    const { resources } = createCatalog();

    await expect(
      resources.complete(USER_PROFILE_TEMPLATE, "user_id", "", { arguments: {} })
    ).resolves.toEqual({ values: ["ada", "bob", "cy"], total: 3, hasMore: false });
    await expect(
      resources.complete(USER_PROFILE_TEMPLATE, "user_id", "b", { arguments: {} })
    ).resolves.toEqual({ values: ["bob"], total: 1, hasMore: false });
  });
});
