import { Notifications, type Implementation } from "../mcp/types";
import type { ClientLogLevel } from "../notifications/logLevels";
import { NotificationBroadcaster } from "../notifications/broadcaster";
import { createRegistries, type Registries } from "../registry";
import { CapabilityNegotiator } from "../session/negotiator";
import { SessionStore } from "../session/sessionStore";
import { logger } from "../utils/logger";
import type { MetricsCollector } from "../utils/metrics";
import { Dispatcher } from "./dispatcher";

const engineLogger = logger.child({ component: "engine" });

export interface EngineOptions {
  serverInfo: Implementation;
  supportedVersions: string[];
  instructions?: string;
  defaultClientLogLevel: ClientLogLevel;
  pageSize: number;
  /** Idle sessions are closed after this many ms; 0 keeps them forever. */
  sessionIdleMs?: number;
  metrics?: MetricsCollector;
}

const MAX_SWEEP_INTERVAL_MS = 60_000;

/**
 * Wires sessions, registries, the dispatcher and the broadcaster together.
 *
 * Registrations made after `start()` announce themselves with a
 * `list_changed` broadcast.
 */
export class McpEngine {
  readonly sessions: SessionStore;
  readonly registries: Registries;
  readonly broadcaster: NotificationBroadcaster;
  readonly negotiator: CapabilityNegotiator;
  readonly dispatcher: Dispatcher;
  readonly metrics?: MetricsCollector;

  private detachers: Array<() => void> = [];
  private sweepTimer?: NodeJS.Timeout;
  private readonly sessionIdleMs: number;

  constructor(options: EngineOptions) {
    this.metrics = options.metrics;
    this.sessionIdleMs = options.sessionIdleMs ?? 0;
    this.sessions = new SessionStore(options.defaultClientLogLevel);
    this.registries = createRegistries();
    this.broadcaster = new NotificationBroadcaster(this.sessions, options.metrics);
    this.negotiator = new CapabilityNegotiator({
      serverInfo: options.serverInfo,
      supportedVersions: options.supportedVersions,
      instructions: options.instructions,
    });
    this.dispatcher = new Dispatcher({
      negotiator: this.negotiator,
      registries: this.registries,
      broadcaster: this.broadcaster,
      pageSize: options.pageSize,
      metrics: options.metrics,
    });
  }

  get started(): boolean {
    return this.detachers.length > 0;
  }

  start(): void {
    if (this.started) {
      return;
    }
    const { resources, tools, prompts } = this.registries;
    this.detachers = [
      resources.onChange(() =>
        this.broadcaster.broadcast(Notifications.ResourceListChanged)
      ),
      tools.onChange(() =>
        this.broadcaster.broadcast(Notifications.ToolListChanged)
      ),
      prompts.onChange(() =>
        this.broadcaster.broadcast(Notifications.PromptListChanged)
      ),
    ];
    if (this.sessionIdleMs > 0) {
      this.sweepTimer = setInterval(
        () => this.evictIdleSessions(),
        Math.min(this.sessionIdleMs, MAX_SWEEP_INTERVAL_MS)
      );
      this.sweepTimer.unref();
    }
    engineLogger.info("Engine started", {
      resources: resources.size,
      tools: tools.size,
      prompts: prompts.size,
      sessionIdleMs: this.sessionIdleMs,
    });
  }

  /**
   * @returns Number of sessions closed
   */
  evictIdleSessions(now = Date.now()): number {
    if (this.sessionIdleMs <= 0) {
      return 0;
    }
    const evicted = this.sessions.evictIdle(this.sessionIdleMs, now).length;
    if (evicted > 0) {
      this.metrics?.trackSessionClosed(evicted);
    }
    return evicted;
  }

  /**
   * Closes every session (cancelling their work) and stops change broadcasts.
   */
  shutdown(): void {
    for (const detach of this.detachers) {
      detach();
    }
    this.detachers = [];
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
    const count = this.sessions.size;
    this.sessions.closeAll();
    this.metrics?.trackSessionClosed(count);
    engineLogger.info("Engine stopped", { closedSessions: count });
  }
}
