import { v4 as uuidv4 } from "uuid";
import type { ClientLogLevel } from "../notifications/logLevels";
import type { AuthenticatedClient } from "../utils/auth";
import { logger } from "../utils/logger";
import { Session } from "./session";

const storeLogger = logger.child({ component: "session-store" });

/**
 * In-memory index of live sessions keyed by their `Mcp-Session-Id`.
 */
export class SessionStore {
  private sessions = new Map<string, Session>();

  constructor(private readonly defaultLogLevel: ClientLogLevel) {}

  create(client: AuthenticatedClient | null = null): Session {
    const session = new Session(uuidv4(), {
      logLevel: this.defaultLogLevel,
      client,
    });
    this.sessions.set(session.id, session);
    storeLogger.info("Session created", {
      sessionId: session.id,
      clientId: client?.id,
    });
    return session;
  }

  /**
   * A throwaway session for envelopes that arrive without a session id.
   */
  transient(client: AuthenticatedClient | null = null): Session {
    return new Session(`transient-${uuidv4()}`, {
      logLevel: this.defaultLogLevel,
      client,
      transient: true,
    });
  }

  get(id: string): Session | undefined {
    const session = this.sessions.get(id);
    return session && !session.isClosed ? session : undefined;
  }

  /**
   * Closes the session and forgets it.
   * @returns false if no live session had that id
   */
  close(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }
    this.sessions.delete(id);
    session.close();
    return true;
  }

  /**
   * Closes every session that has been idle for longer than `idleMs`.
   * @returns The ids of the closed sessions
   */
  evictIdle(idleMs: number, now = Date.now()): string[] {
    const evicted: string[] = [];
    for (const session of [...this.sessions.values()]) {
      if (session.isIdle(idleMs, now)) {
        this.close(session.id);
        evicted.push(session.id);
      }
    }
    if (evicted.length > 0) {
      storeLogger.info("Evicted idle sessions", {
        count: evicted.length,
        idleMs,
      });
    }
    return evicted;
  }

  closeAll(): void {
    for (const id of [...this.sessions.keys()]) {
      this.close(id);
    }
  }

  all(): Session[] {
    return [...this.sessions.values()].filter((s) => !s.isClosed);
  }

  get size(): number {
    return this.sessions.size;
  }
}
