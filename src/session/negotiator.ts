import {
  InitializeParamsSchema,
  Methods,
  type Implementation,
  type InitializeResult,
  type ServerCapabilities,
} from "../mcp/types";
import { ErrorCode, McpError, parseParams } from "../protocol/errors";
import { logger } from "../utils/logger";
import type { Session } from "./session";

const negotiatorLogger = logger.child({ component: "capability-negotiator" });

export const SERVER_CAPABILITIES: ServerCapabilities = {
  logging: {},
  tools: { listChanged: true },
  resources: { subscribe: true, listChanged: true },
  prompts: { listChanged: true },
  completions: {},
};

export interface NegotiatorOptions {
  serverInfo: Implementation;
  /** Latest first. */
  supportedVersions: string[];
  instructions?: string;
}

/**
 * Runs the initialize → initialized handshake for a session.
 */
export class CapabilityNegotiator {
  constructor(private readonly options: NegotiatorOptions) {
    if (options.supportedVersions.length === 0) {
      throw new Error("At least one supported protocol version is required");
    }
  }

  get latestVersion(): string {
    return this.options.supportedVersions[0];
  }

  /**
   * Echoes a supported version, otherwise proposes the latest one.
   * Whether to proceed on a mismatch is the client's call.
   */
  resolveVersion(requested: string): string {
    return this.options.supportedVersions.includes(requested)
      ? requested
      : this.latestVersion;
  }

  negotiate(session: Session, rawParams: unknown): InitializeResult {
    if (session.state !== "uninitialized") {
      throw new McpError(
        ErrorCode.InvalidRequest,
        `Session already initialized (state: ${session.state})`
      );
    }

    const params = parseParams(
      InitializeParamsSchema,
      rawParams,
      Methods.Initialize
    );
    const protocolVersion = this.resolveVersion(params.protocolVersion);

    if (protocolVersion !== params.protocolVersion) {
      negotiatorLogger.warn("Client requested unsupported protocol version", {
        sessionId: session.id,
        requested: params.protocolVersion,
        offered: protocolVersion,
      });
    }

    session.protocolVersion = protocolVersion;
    session.clientCapabilities = params.capabilities;
    session.clientInfo = params.clientInfo && {
      name: params.clientInfo.name,
      version: params.clientInfo.version,
    };
    session.serverCapabilities = SERVER_CAPABILITIES;
    session.transition("initializing");

    negotiatorLogger.info("Session initializing", {
      sessionId: session.id,
      protocolVersion,
      client: params.clientInfo?.name,
    });

    const result: InitializeResult = {
      protocolVersion,
      capabilities: SERVER_CAPABILITIES,
      serverInfo: this.options.serverInfo,
    };
    if (this.options.instructions) {
      result.instructions = this.options.instructions;
    }
    return result;
  }

  /**
   * Handles `notifications/initialized`. Out-of-order arrival is logged and ignored.
   */
  complete(session: Session): boolean {
    if (session.state !== "initializing") {
      negotiatorLogger.warn(
        "Ignoring initialized notification outside of the handshake",
        { sessionId: session.id, state: session.state }
      );
      return false;
    }
    return session.transition("ready");
  }
}
