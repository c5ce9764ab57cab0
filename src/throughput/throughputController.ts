import type { RequestDispatcher } from "../dispatcher/requestDispatcher";
import type { IdentityPool } from "../identity/identityPool";
import { ConcurrencyLimiter } from "../limiters/concurrencyLimiter";
import { Pacer } from "../limiters/pacer";
import { OutcomePolicy, THROUGHPUT_ACTIONS } from "../policy/outcomePolicy";
import { RepeatTracker } from "../signals/repeatTracker";
import type {
  ClassificationType,
  ControllerStateName,
  Identity,
  IndexedOutcome,
  RequestDescriptor,
  ResponseClassifier,
  ShapeCheck,
  TelemetrySink
} from "../types";
import { systemClock, type Clock } from "../utils/time";
import { BatchMetrics, type MetricsSnapshot } from "./batchMetrics";

export type PacingConfig = {
  initialMs: number;
  baseMs: number;
  factor: number;
  maxMs: number;
};

export type ThroughputConfig = {
  totalRequests: number;
  initialConcurrency: number;
  maxConcurrency: number;
  growthFactor: number;
  backoffFactor: number;
  transientTolerance: number;
  requestsPerSlot: number;
  rotateEvery: number;
  timeoutMs: number;
  cooldownMs: number;
  revalidateEvery: number;
  maxSchemaDrift: number;
  pacing: PacingConfig;
};

type ControllerDeps = {
  identityPool: IdentityPool;
  dispatcher: RequestDispatcher;
  classifier: ResponseClassifier;
  shapeCheck: ShapeCheck;
  describe: () => RequestDescriptor;
  telemetry?: TelemetrySink;
  clock?: Clock;
};

export type StopReason = "completed" | "cancelled" | "fatal";

export type BatchSummary = {
  batch: number;
  state: ControllerStateName;
  escalation: boolean;
  concurrency: number;
  pacingMs: number;
  size: number;
  generation: number;
  counts: Record<ClassificationType, number>;
};

export type SteadyRun = {
  pacingMs: number;
  concurrency: number;
  batches: number;
  requests: number;
  durationMs: number;
};

export type RecommendedRate = SteadyRun & { requestsPerSecond: number };

export type ThroughputReport = MetricsSnapshot & {
  stopReason: StopReason;
  concurrency: number;
  peakConcurrency: number;
  pacingMs: number;
  recommended?: RecommendedRate;
  history: BatchSummary[];
};

function zeroCounts(): Record<ClassificationType, number> {
  return { success: 0, rate_limited: 0, blocked: 0, transient: 0, fatal: 0 };
}

function measuredRate(run: SteadyRun): number {
  return run.durationMs > 0 ? run.requests / (run.durationMs / 1000) : 0;
}

export class ThroughputController {
  private state: ControllerStateName = "probing";
  private readonly limiter: ConcurrencyLimiter;
  private readonly pacer: Pacer;
  private readonly policy: OutcomePolicy;
  private readonly tracker = new RepeatTracker();
  private readonly metrics = new BatchMetrics();
  private readonly clock: Clock;
  private readonly history: BatchSummary[] = [];
  private steadyBatches = 0;
  private currentRun?: SteadyRun;
  private bestRun?: SteadyRun;
  private started = false;

  constructor(
    private readonly config: ThroughputConfig,
    private readonly deps: ControllerDeps
  ) {
    if (config.revalidateEvery < 1) {
      throw new RangeError("revalidateEvery must be at least 1");
    }
    this.clock = deps.clock ?? systemClock;
    this.limiter = new ConcurrencyLimiter({
      initial: config.initialConcurrency,
      min: 1,
      max: config.maxConcurrency,
      growthFactor: config.growthFactor,
      backoffFactor: config.backoffFactor
    });
    this.pacer = new Pacer(
      {
        spacingMs: config.pacing.initialMs,
        baseMs: config.pacing.baseMs,
        factor: config.pacing.factor,
        maxMs: config.pacing.maxMs
      },
      this.clock
    );
    this.policy = new OutcomePolicy({ actions: THROUGHPUT_ACTIONS, maxSchemaDrift: config.maxSchemaDrift });
  }

  getState(): { state: ControllerStateName; concurrency: number; pacingMs: number } {
    return {
      state: this.state,
      concurrency: this.limiter.getState().level,
      pacingMs: this.pacer.getState().spacingMs
    };
  }

  async run(signal?: AbortSignal): Promise<ThroughputReport> {
    if (this.started) {
      throw new Error("ThroughputController runs once; create a new one for another experiment");
    }
    this.started = true;
    this.metrics.start(this.clock.now());
    let stopReason: StopReason = "completed";

    while (this.metrics.count < this.config.totalRequests) {
      if (signal?.aborted) {
        stopReason = "cancelled";
        break;
      }

      const remaining = this.config.totalRequests - this.metrics.count;
      const escalation = this.state === "steady" && (this.steadyBatches + 1) % this.config.revalidateEvery === 0;
      const concurrency = escalation ? this.limiter.grown() : this.limiter.getState().level;
      const size = Math.min(remaining, concurrency * this.config.requestsPerSlot);
      const identity = this.acquireIdentity(size);
      const descriptors = Array.from({ length: size }, () => this.deps.describe());

      const batchStartedAt = this.clock.now();
      const outcomes = await this.deps.dispatcher.dispatchBatch(descriptors, identity, {
        concurrency,
        timeoutMs: this.config.timeoutMs,
        pacer: this.pacer,
        signal
      });

      const elapsedMs = this.clock.now() - batchStartedAt;
      const ranIn = this.state;
      const pacingMs = this.pacer.getState().spacingMs;
      const counts = this.aggregate(outcomes, descriptors, identity);
      // a batch cut short by cancellation says nothing about the limits
      const complete = outcomes.length === size;
      const backedOff = complete && this.transition(counts, outcomes.length, concurrency, escalation, elapsedMs);

      this.history.push({
        batch: this.history.length + 1,
        state: ranIn,
        escalation,
        concurrency,
        pacingMs,
        size: outcomes.length,
        generation: identity.generation,
        counts
      });
      this.emitState();

      if (counts.fatal > 0) {
        stopReason = "fatal";
        break;
      }
      if (outcomes.length < size) {
        stopReason = "cancelled";
        break;
      }
      if (backedOff && this.metrics.count < this.config.totalRequests) {
        await this.clock.sleep(this.config.cooldownMs, signal);
      }
    }

    this.state = "done";
    const now = this.clock.now();
    this.metrics.finish(now);
    this.emitState();
    return this.report(stopReason, now);
  }

  private acquireIdentity(size: number): Identity {
    const before = this.deps.identityPool.peek()?.generation;
    const identity = this.deps.identityPool.nextIdentity(this.config.rotateEvery, size);
    if (identity.generation !== before) {
      this.deps.telemetry?.onIdentityRotated?.(identity, "window");
    }
    return identity;
  }

  // Single aggregation point: the batch has fully resolved, outcomes are
  // folded in index order.
  private aggregate(
    outcomes: IndexedOutcome[],
    descriptors: RequestDescriptor[],
    identity: Identity
  ): Record<ClassificationType, number> {
    const counts = zeroCounts();
    const ordered = [...outcomes].sort((a, b) => a.index - b.index);
    for (const { index, outcome } of ordered) {
      const context = this.tracker.observe(identity, outcome);
      const classification = this.deps.classifier.classify(outcome, this.deps.shapeCheck, context);
      const decision = this.policy.evaluate(classification);
      this.metrics.record(decision.classification);
      counts[decision.classification.type] += 1;
      this.deps.telemetry?.onClassification?.({
        source: descriptors[index].kind,
        classification: decision.classification,
        statusCode: outcome.kind === "response" ? outcome.statusCode : undefined,
        generation: identity.generation,
        at: this.clock.now()
      });
    }
    return counts;
  }

  /** Returns true when the batch sent the controller into backoff. */
  private transition(
    counts: Record<ClassificationType, number>,
    size: number,
    concurrency: number,
    escalation: boolean,
    elapsedMs: number
  ): boolean {
    if (counts.rate_limited + counts.blocked > 0) {
      this.enterBackoff(concurrency);
      return true;
    }

    const transientRatio = size > 0 ? counts.transient / size : 0;
    const clean = counts.fatal === 0 && transientRatio < this.config.transientTolerance;

    switch (this.state) {
      case "probing":
        if (clean) this.limiter.onSuccess();
        break;
      case "backoff":
        this.state = "steady";
        this.steadyBatches = 0;
        this.currentRun = undefined;
        break;
      case "steady":
        this.steadyBatches += 1;
        if (escalation && clean) this.limiter.adopt(concurrency);
        this.extendRun(size, elapsedMs);
        break;
      case "done":
        break;
    }
    return false;
  }

  private enterBackoff(from: number): void {
    this.limiter.onLoss(from);
    const identity = this.deps.identityPool.forceRotate();
    this.deps.telemetry?.onIdentityRotated?.(identity, "forced");
    this.pacer.slowDown();
    this.state = "backoff";
    this.steadyBatches = 0;
    this.currentRun = undefined;
  }

  private extendRun(requests: number, elapsedMs: number): void {
    const run = this.currentRun ?? {
      pacingMs: this.pacer.getState().spacingMs,
      concurrency: this.limiter.getState().level,
      batches: 0,
      requests: 0,
      durationMs: 0
    };
    run.batches += 1;
    run.requests += requests;
    run.durationMs += elapsedMs;
    run.concurrency = this.limiter.getState().level;
    this.currentRun = run;
    const best = this.bestRun;
    if (!best || run.batches > best.batches || (run.batches === best.batches && run.requests > best.requests)) {
      this.bestRun = { ...run };
    }
  }

  private emitState(): void {
    const { state, concurrency, pacingMs } = this.getState();
    this.deps.telemetry?.onControllerState?.({
      state,
      concurrency,
      pacingMs,
      dispatched: this.metrics.count,
      generation: this.deps.identityPool.peek()?.generation ?? 0
    });
  }

  private report(stopReason: StopReason, now: number): ThroughputReport {
    const best = this.bestRun;
    const { level, peak } = this.limiter.getState();
    const report: ThroughputReport = {
      ...this.metrics.snapshot(now),
      stopReason,
      concurrency: level,
      peakConcurrency: peak,
      pacingMs: this.pacer.getState().spacingMs,
      history: [...this.history]
    };
    if (best) {
      report.recommended = {
        ...best,
        requestsPerSecond: best.pacingMs > 0 ? 1000 / best.pacingMs : measuredRate(best)
      };
    }
    return report;
  }
}
