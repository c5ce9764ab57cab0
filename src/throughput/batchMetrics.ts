import type { Classification, ClassificationType } from "../types";

export type MetricsSnapshot = {
  totals: Record<ClassificationType, number>;
  dispatched: number;
  durationMs: number;
  requestsPerSecond: number;
  successRatio: number;
};

function emptyTotals(): Record<ClassificationType, number> {
  return { success: 0, rate_limited: 0, blocked: 0, transient: 0, fatal: 0 };
}

/** Counters only grow; a fresh run needs a fresh instance. */
export class BatchMetrics {
  private readonly totals = emptyTotals();
  private dispatched = 0;
  private startedAt?: number;
  private endedAt?: number;

  start(now: number): void {
    this.startedAt ??= now;
  }

  record(classification: Classification): void {
    this.totals[classification.type] += 1;
    this.dispatched += 1;
  }

  finish(now: number): void {
    this.endedAt = now;
  }

  get count(): number {
    return this.dispatched;
  }

  snapshot(now: number): MetricsSnapshot {
    const durationMs = this.startedAt === undefined ? 0 : Math.max(0, (this.endedAt ?? now) - this.startedAt);
    return {
      totals: { ...this.totals },
      dispatched: this.dispatched,
      durationMs,
      requestsPerSecond: durationMs > 0 ? this.dispatched / (durationMs / 1000) : 0,
      successRatio: this.dispatched > 0 ? this.totals.success / this.dispatched : 0
    };
  }
}
