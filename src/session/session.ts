import { CancellationTracker } from "../engine/cancellation";
import type {
  ClientCapabilities,
  Implementation,
  ServerCapabilities,
} from "../mcp/types";
import type { ClientLogLevel } from "../notifications/logLevels";
import type { Subscription } from "../transport/subscription";
import type { AuthenticatedClient } from "../utils/auth";
import { logger } from "../utils/logger";

const sessionLogger = logger.child({ component: "session" });

export type SessionState =
  | "uninitialized"
  | "initializing"
  | "ready"
  | "closing"
  | "closed";

const TRANSITIONS: Record<SessionState, SessionState[]> = {
  uninitialized: ["initializing", "closing"],
  initializing: ["ready", "closing"],
  ready: ["closing"],
  closing: ["closed"],
  closed: [],
};

export interface SessionOptions {
  logLevel: ClientLogLevel;
  client?: AuthenticatedClient | null;
  /** Transient sessions answer one envelope and are never stored. */
  transient?: boolean;
}

/**
 * Server-side state of one logical client connection.
 */
export class Session {
  private _state: SessionState = "uninitialized";
  private _subscription: Subscription | null = null;

  protocolVersion?: string;
  clientCapabilities: ClientCapabilities = {};
  clientInfo?: Implementation;
  serverCapabilities: ServerCapabilities = {};
  logLevel: ClientLogLevel;
  readonly client: AuthenticatedClient | null;
  readonly transient: boolean;
  readonly createdAt = new Date();
  /** Epoch ms of the last POST or GET that named this session. */
  lastActivityAt = Date.now();
  readonly requests = new CancellationTracker();
  readonly resourceSubscriptions = new Set<string>();

  constructor(
    public readonly id: string,
    options: SessionOptions
  ) {
    this.logLevel = options.logLevel;
    this.client = options.client ?? null;
    this.transient = options.transient ?? false;
  }

  get state(): SessionState {
    return this._state;
  }

  get isReady(): boolean {
    return this._state === "ready";
  }

  get isClosed(): boolean {
    return this._state === "closing" || this._state === "closed";
  }

  /**
   * Moves along the lifecycle; returns false (and stays put) on an illegal move.
   */
  transition(next: SessionState): boolean {
    if (!TRANSITIONS[this._state].includes(next)) {
      sessionLogger.warn("Rejected session state transition", {
        sessionId: this.id,
        from: this._state,
        to: next,
      });
      return false;
    }
    sessionLogger.debug("Session state changed", {
      sessionId: this.id,
      from: this._state,
      to: next,
    });
    this._state = next;
    return true;
  }

  touch(now = Date.now()): void {
    this.lastActivityAt = now;
  }

  /**
   * Idle means no open stream, nothing in flight and no traffic for `idleMs`.
   */
  isIdle(idleMs: number, now = Date.now()): boolean {
    return (
      !this.subscription &&
      this.requests.size === 0 &&
      now - this.lastActivityAt > idleMs
    );
  }

  get subscription(): Subscription | null {
    return this._subscription?.isOpen ? this._subscription : null;
  }

  /**
   * Binds an open stream. At most one per session.
   * @returns false when another stream is already open
   */
  attachSubscription(subscription: Subscription): boolean {
    if (this.subscription) {
      return false;
    }
    this._subscription = subscription;
    return true;
  }

  detachSubscription(subscription: Subscription): void {
    if (this._subscription === subscription) {
      this._subscription = null;
    }
  }

  /**
   * closing → cancel outstanding work, drop the stream → closed
   */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.transition("closing");
    const cancelled = this.requests.cancelAll("session closed");
    this._subscription?.close("session-closed");
    this._subscription = null;
    this.resourceSubscriptions.clear();
    this.transition("closed");
    sessionLogger.info("Session closed", {
      sessionId: this.id,
      cancelledRequests: cancelled,
    });
  }
}
