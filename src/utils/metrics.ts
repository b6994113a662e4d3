/**
 * Metrics utility for conduit-mcp
 * Provides simple performance and protocol counters
 */

import { logger } from "./logger";

const metricsLogger = logger.child({ component: "metrics" });

interface MetricsData {
  // Request metrics
  requestCount: number;
  requestDurations: number[];

  // JSON-RPC method metrics
  methodCalls: Map<string, number>;
  methodDurations: Map<string, number[]>;

  // Error metrics
  errorCount: number;
  errorsByType: Map<string, number>;

  // Protocol metrics
  sessionsOpened: number;
  sessionsClosed: number;
  notificationsDelivered: number;
  notificationsDropped: number;
  cancellationsRequested: number;

  startTime: number;
}

export interface MetricsSnapshot {
  uptime: number;
  requests: { total: number; avgDuration: string };
  methods: Record<string, { calls: number; avgDuration: number }>;
  errors: { total: number; byType: Record<string, number> };
  sessions: { opened: number; closed: number; active: number };
  notifications: { delivered: number; dropped: number };
  cancellations: number;
}

const average = (values: number[]): number =>
  values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;

/**
 * Simple in-memory metrics collector
 */
export class MetricsCollector {
  private data: MetricsData;
  private readonly maxSamples: number = 1000;

  constructor() {
    this.data = MetricsCollector.emptyData();
    metricsLogger.debug("Metrics collection started");
  }

  private static emptyData(): MetricsData {
    return {
      requestCount: 0,
      requestDurations: [],
      methodCalls: new Map(),
      methodDurations: new Map(),
      errorCount: 0,
      errorsByType: new Map(),
      sessionsOpened: 0,
      sessionsClosed: 0,
      notificationsDelivered: 0,
      notificationsDropped: 0,
      cancellationsRequested: 0,
      startTime: Date.now(),
    };
  }

  reset(): void {
    this.data = MetricsCollector.emptyData();
  }

  /**
   * Track request start
   * @returns A function to call when the request ends
   */
  trackRequest(): () => void {
    const startTime = performance.now();
    this.data.requestCount++;

    return () => {
      this.pushSample(this.data.requestDurations, performance.now() - startTime);
    };
  }

  /**
   * Track one dispatched JSON-RPC method
   * @returns A function to call when the handler settles
   */
  trackMethod(method: string): () => void {
    const startTime = performance.now();
    this.data.methodCalls.set(
      method,
      (this.data.methodCalls.get(method) || 0) + 1
    );

    return () => {
      const samples = this.data.methodDurations.get(method) ?? [];
      this.pushSample(samples, performance.now() - startTime);
      this.data.methodDurations.set(method, samples);
    };
  }

  trackError(errorType: string): void {
    this.data.errorCount++;
    this.data.errorsByType.set(
      errorType,
      (this.data.errorsByType.get(errorType) || 0) + 1
    );
  }

  trackSessionOpened(): void {
    this.data.sessionsOpened++;
  }

  trackSessionClosed(count = 1): void {
    this.data.sessionsClosed += count;
  }

  trackNotification(delivered: boolean): void {
    if (delivered) {
      this.data.notificationsDelivered++;
    } else {
      this.data.notificationsDropped++;
    }
  }

  trackCancellation(): void {
    this.data.cancellationsRequested++;
  }

  private pushSample(samples: number[], duration: number): void {
    samples.push(duration);
    // Keep the array at a reasonable size
    if (samples.length > this.maxSamples) {
      samples.shift();
    }
  }

  getMetrics(): MetricsSnapshot {
    const methods: MetricsSnapshot["methods"] = {};
    this.data.methodCalls.forEach((calls, method) => {
      methods[method] = {
        calls,
        avgDuration: average(this.data.methodDurations.get(method) ?? []),
      };
    });

    const byType: Record<string, number> = {};
    this.data.errorsByType.forEach((count, type) => {
      byType[type] = count;
    });

    return {
      uptime: Math.round((Date.now() - this.data.startTime) / 1000),
      requests: {
        total: this.data.requestCount,
        avgDuration: average(this.data.requestDurations).toFixed(2),
      },
      methods,
      errors: { total: this.data.errorCount, byType },
      sessions: {
        opened: this.data.sessionsOpened,
        closed: this.data.sessionsClosed,
        active: this.data.sessionsOpened - this.data.sessionsClosed,
      },
      notifications: {
        delivered: this.data.notificationsDelivered,
        dropped: this.data.notificationsDropped,
      },
      cancellations: this.data.cancellationsRequested,
    };
  }
}
