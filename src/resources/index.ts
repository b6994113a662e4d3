import { z } from "zod";
import { resourceNotFound } from "../protocol/errors";
import { matchPrefix, type ResourceRegistry } from "../registry";
import usersData from "./data/users.json";

const UserProfileSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  role: z.string(),
  joined: z.string(),
});

const userProfiles = new Map(
  z
    .array(UserProfileSchema)
    .parse(usersData)
    .map((user) => [user.id, user] as const)
);

export const WELCOME_URI = "app:///messages/welcome";
export const TIME_URI = "app:///system/time";
export const SETTINGS_URI = "config:///app/settings.json";
export const USER_PROFILE_TEMPLATE = "users://{user_id}/profile";

export const WELCOME_MESSAGE =
  "Welcome! This server exposes resources, tools and prompts over a single streamable HTTP endpoint.";

export const APP_SETTINGS = { theme: "dark", fontSize: 14, autoSave: true };

export function registerResources(resources: ResourceRegistry): void {
  resources.registerStatic({
    uri: WELCOME_URI,
    name: "Welcome Message",
    description: "A fixed greeting for new clients.",
    mimeType: "text/plain",
    content: { text: WELCOME_MESSAGE },
  });

  resources.registerDynamic({
    uri: TIME_URI,
    name: "Server Time",
    description: "The current server time, computed on every read.",
    mimeType: "text/plain",
    read: () => new Date().toISOString(),
  });

  resources.registerStatic({
    uri: "file:///docs/readme.md",
    name: "README",
    description: "Getting started notes.",
    mimeType: "text/markdown",
    content: {
      text: [
        "# Getting started",
        "",
        "1. POST `initialize` to the MCP endpoint and keep the `Mcp-Session-Id` header.",
        "2. POST `notifications/initialized`.",
        "3. GET the endpoint with `Accept: text/event-stream` to receive notifications.",
      ].join("\n"),
    },
  });

  resources.registerStatic({
    uri: "file:///docs/changelog.md",
    name: "Changelog",
    description: "Release notes.",
    mimeType: "text/markdown",
    content: {
      text: [
        "# Changelog",
        "",
        "## 0.1.0",
        "",
        "- Sessions, capability negotiation and cooperative cancellation.",
        "- Server-sent event stream for notifications.",
      ].join("\n"),
    },
  });

  resources.registerStatic({
    uri: SETTINGS_URI,
    name: "Application Settings",
    description: "Core configuration file for the application.",
    mimeType: "application/json",
    content: { text: JSON.stringify(APP_SETTINGS, null, 2) },
  });

  resources.registerTemplate({
    uriTemplate: USER_PROFILE_TEMPLATE,
    name: "User Profile",
    description: "Profile of a user, by id.",
    mimeType: "application/json",
    read: ({ uri, params }) => {
      const profile = userProfiles.get(params.user_id);
      if (!profile) {
        throw resourceNotFound(uri);
      }
      return JSON.stringify(profile, null, 2);
    },
    complete: {
      user_id: (value) => matchPrefix(userProfiles.keys(), value),
    },
  });
}
