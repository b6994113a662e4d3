import { RequestCancelledError } from "../protocol/errors";
import type { RequestId } from "../types/json-rpc";

export type CancellationState = "running" | "cancel-requested" | "terminated";

/**
 * Cooperative cancellation flag handed to every handler invocation.
 *
 * Handlers poll it at their own checkpoints; the engine never interrupts them.
 * The attached AbortSignal lets I/O (fetch, timers) observe the same request.
 */
export class CancellationToken {
  private _state: CancellationState = "running";
  private _reason?: string;
  private readonly controller = new AbortController();

  constructor(public readonly requestId: RequestId) {}

  get state(): CancellationState {
    return this._state;
  }

  get reason(): string | undefined {
    return this._reason;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancellationRequested(): boolean {
    return this._state === "cancel-requested";
  }

  /**
   * Checkpoint: throws RequestCancelledError once cancellation was requested.
   */
  throwIfCancellationRequested(): void {
    if (this.isCancellationRequested) {
      throw new RequestCancelledError(this._reason);
    }
  }

  /** @internal driven by the tracker */
  requestCancel(reason?: string): boolean {
    if (this._state !== "running") {
      return false;
    }
    this._state = "cancel-requested";
    this._reason = reason;
    this.controller.abort(new RequestCancelledError(reason));
    return true;
  }

  /** @internal driven by the tracker */
  terminate(): CancellationState {
    const previous = this._state;
    this._state = "terminated";
    return previous;
  }
}

/**
 * Per-session map of outstanding request ids to their tokens.
 *
 * Only the dispatcher creates and removes tokens. A cancellation that names an
 * unknown or finished id is a benign race and does nothing.
 */
export class CancellationTracker {
  private readonly tokens = new Map<RequestId, CancellationToken>();

  begin(requestId: RequestId): CancellationToken {
    if (this.tokens.has(requestId)) {
      throw new Error(`Request id '${requestId}' is already in flight`);
    }
    const token = new CancellationToken(requestId);
    this.tokens.set(requestId, token);
    return token;
  }

  has(requestId: RequestId): boolean {
    return this.tokens.has(requestId);
  }

  get(requestId: RequestId): CancellationToken | undefined {
    return this.tokens.get(requestId);
  }

  /**
   * @returns true when a running request moved to cancel-requested
   */
  requestCancel(requestId: RequestId, reason?: string): boolean {
    return this.tokens.get(requestId)?.requestCancel(reason) ?? false;
  }

  /**
   * Removes the token and reports the state it was in before termination.
   */
  complete(requestId: RequestId): CancellationState | undefined {
    const token = this.tokens.get(requestId);
    if (!token) {
      return undefined;
    }
    this.tokens.delete(requestId);
    return token.terminate();
  }

  cancelAll(reason: string): number {
    let count = 0;
    for (const token of this.tokens.values()) {
      if (token.requestCancel(reason)) count++;
    }
    return count;
  }

  get size(): number {
    return this.tokens.size;
  }
}

/**
 * Promise-based delay that rejects as soon as the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
