import { formatSseEvent } from "../protocol/codec";
import type { JsonRpcMessage } from "../types/json-rpc";
import { logger } from "../utils/logger";

const subscriptionLogger = logger.child({ component: "subscription" });

/**
 * Where SSE frames end up. The HTTP layer adapts its streaming API to this.
 */
export interface SseSink {
  write(frame: string): Promise<void>;
  close(): void | Promise<void>;
}

export type SubscriptionCloseReason =
  | "client-disconnected"
  | "write-failed"
  | "session-closed"
  | "server-shutdown";

export interface SubscriptionOptions {
  keepAliveMs?: number;
  onClose?: (reason: SubscriptionCloseReason) => void;
}

/**
 * One open server→client stream bound to a session.
 *
 * Frames go through a single promise chain, so a subscriber sees envelopes in
 * emission order. The first failed write tears the subscription down.
 */
export class Subscription {
  private chain: Promise<void> = Promise.resolve();
  private open = true;
  private keepAliveTimer?: NodeJS.Timeout;
  private resolveClosed: (reason: SubscriptionCloseReason) => void = () =>
    undefined;
  private readonly options: SubscriptionOptions;

  /** Settles once the subscription is closed for any reason. */
  readonly closed: Promise<SubscriptionCloseReason>;

  constructor(
    public readonly sessionId: string,
    private readonly sink: SseSink,
    options: SubscriptionOptions = {}
  ) {
    this.options = options;
    this.closed = new Promise<SubscriptionCloseReason>((resolve) => {
      this.resolveClosed = resolve;
    });

    if (options.keepAliveMs && options.keepAliveMs > 0) {
      this.keepAliveTimer = setInterval(() => {
        this.enqueue(": keepalive\n\n");
      }, options.keepAliveMs);
      this.keepAliveTimer.unref();
    }
  }

  get isOpen(): boolean {
    return this.open;
  }

  /**
   * Queues an envelope for delivery.
   * @returns false when the subscription is already closed (the envelope is dropped)
   */
  send(message: JsonRpcMessage): boolean {
    return this.enqueue(formatSseEvent(message));
  }

  private enqueue(frame: string): boolean {
    if (!this.open) {
      return false;
    }
    this.chain = this.chain
      .then(() => (this.open ? this.sink.write(frame) : undefined))
      .catch((error: unknown) => {
        subscriptionLogger.warn("Stream write failed, dropping subscription", {
          sessionId: this.sessionId,
          error: error instanceof Error ? error.message : String(error),
        });
        this.close("write-failed");
      });
    return true;
  }

  /**
   * Resolves after every frame queued so far was handed to the sink.
   */
  flush(): Promise<void> {
    return this.chain;
  }

  close(reason: SubscriptionCloseReason): void {
    if (!this.open) {
      return;
    }
    this.open = false;
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = undefined;
    }

    subscriptionLogger.debug("Subscription closed", {
      sessionId: this.sessionId,
      reason,
    });

    Promise.resolve()
      .then(() => this.sink.close())
      .catch((error: unknown) => {
        subscriptionLogger.debug("Error closing stream sink", {
          sessionId: this.sessionId,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    this.options.onClose?.(reason);
    this.resolveClosed(reason);
  }
}
