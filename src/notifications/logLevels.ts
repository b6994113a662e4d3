import { z } from "zod";

/**
 * Severity levels of `notifications/message`, lowest first (RFC 5424 order).
 */
export const CLIENT_LOG_LEVELS = [
  "debug",
  "info",
  "notice",
  "warning",
  "error",
  "critical",
  "alert",
  "emergency",
] as const;

export type ClientLogLevel = (typeof CLIENT_LOG_LEVELS)[number];

export const ClientLogLevelSchema = z.enum(CLIENT_LOG_LEVELS);

export function isClientLogLevel(value: unknown): value is ClientLogLevel {
  return ClientLogLevelSchema.safeParse(value).success;
}

export function severityOf(level: ClientLogLevel): number {
  return CLIENT_LOG_LEVELS.indexOf(level);
}

/**
 * True when a message at `level` passes a session whose floor is `minimum`.
 */
export function meetsThreshold(
  level: ClientLogLevel,
  minimum: ClientLogLevel
): boolean {
  return severityOf(level) >= severityOf(minimum);
}
