import { priceDescriptor, stockDescriptor, type ProductTarget } from "../descriptors";
import type { RequestDispatcher } from "../dispatcher/requestDispatcher";
import { extractPrice, priceShapeCheck, type PriceSnapshot } from "../extract/price";
import { extractStock, stockShapeCheck, type StockSnapshot } from "../extract/stock";
import type { IdentityPool } from "../identity/identityPool";
import { DEFAULT_MAX_SCHEMA_DRIFT, MONITOR_ACTIONS, OutcomePolicy } from "../policy/outcomePolicy";
import { RepeatTracker } from "../signals/repeatTracker";
import type {
  Classification,
  Identity,
  MonitorStateName,
  RawOutcome,
  RequestKind,
  ResponseClassifier,
  ShapeCheck,
  TelemetrySink
} from "../types";
import { systemClock, type Clock } from "../utils/time";

/** Lower bound on every wait between checks, whatever the configured interval. */
export const SAFETY_FLOOR_SECONDS = 60;

export type MonitorConfig = {
  target: ProductTarget;
  intervalSeconds: number;
  maxAttempts?: number;
  rotateEvery: number;
  trackPrice: boolean;
  timeoutMs: number;
  maxSchemaDrift?: number;
};

type MonitorDeps = {
  identityPool: IdentityPool;
  dispatcher: RequestDispatcher;
  classifier: ResponseClassifier;
  telemetry?: TelemetrySink;
  clock?: Clock;
};

export type AbortReason = "fatal" | "attempts_exhausted" | "cancelled";

export type MonitorResult =
  | { status: "found"; stock: StockSnapshot; price?: PriceSnapshot; checks: number }
  | { status: "aborted"; reason: AbortReason; classification?: Classification; checks: number };

export class MonitorLoop {
  private state: MonitorStateName = "idle";
  private checks = 0;
  private latestPrice?: PriceSnapshot;
  private latestStock?: StockSnapshot;
  private readonly tracker = new RepeatTracker();
  private readonly policy: OutcomePolicy;
  private readonly clock: Clock;
  private readonly stockShape: ShapeCheck;

  constructor(
    private readonly config: MonitorConfig,
    private readonly deps: MonitorDeps
  ) {
    this.clock = deps.clock ?? systemClock;
    this.stockShape = stockShapeCheck(config.target.storeId);
    this.policy = new OutcomePolicy({
      actions: MONITOR_ACTIONS,
      maxSchemaDrift: config.maxSchemaDrift ?? DEFAULT_MAX_SCHEMA_DRIFT,
      maxConsecutiveFailures: config.maxAttempts
    });
  }

  getState(): { state: MonitorStateName; checks: number; latestStock?: StockSnapshot; latestPrice?: PriceSnapshot } {
    return { state: this.state, checks: this.checks, latestStock: this.latestStock, latestPrice: this.latestPrice };
  }

  async run(signal?: AbortSignal): Promise<MonitorResult> {
    if (this.state !== "idle") {
      throw new Error("MonitorLoop runs once; create a new one to monitor again");
    }

    while (true) {
      if (signal?.aborted) return this.abort("cancelled");

      this.checks += 1;
      this.setState("checking");
      const identity = this.nextIdentity();
      // not interruptible: a request already sent runs to completion or timeout
      const outcome = await this.deps.dispatcher.dispatchOne(
        stockDescriptor(this.config.target),
        identity,
        this.config.timeoutMs
      );
      if (signal?.aborted) return this.abort("cancelled");

      const decision = this.policy.evaluate(this.classify("stock", outcome, identity, this.stockShape));
      let waitMs = this.config.intervalSeconds * 1000;

      switch (decision.action) {
        case "proceed": {
          if (outcome.kind !== "response") break;
          const stock = extractStock(outcome.body, this.config.target.storeId);
          this.latestStock = stock;
          if (this.config.trackPrice) {
            await this.checkPrice();
            if (signal?.aborted) return this.abort("cancelled");
          }
          if (stock.inStock) {
            this.setState("found");
            return { status: "found", stock, price: this.latestPrice, checks: this.checks };
          }
          break;
        }
        case "retry":
        case "back_off":
          waitMs = decision.retryAfterMs ?? waitMs;
          break;
        case "rotate_and_retry":
          this.rotate();
          break;
        case "abort":
          return this.abort(decision.exhausted ? "attempts_exhausted" : "fatal", decision.classification);
      }

      waitMs = Math.max(waitMs, SAFETY_FLOOR_SECONDS * 1000);
      this.setState("waiting", waitMs);
      await this.clock.sleep(waitMs, signal);
    }
  }

  // Price failures are recorded but never move the loop's state.
  private async checkPrice(): Promise<void> {
    const identity = this.nextIdentity();
    const outcome = await this.deps.dispatcher.dispatchOne(
      priceDescriptor(this.config.target),
      identity,
      this.config.timeoutMs
    );
    const classification = this.classify("price", outcome, identity, priceShapeCheck);
    if (classification.type === "success" && outcome.kind === "response") {
      this.latestPrice = extractPrice(outcome.body);
    } else if (classification.type === "blocked") {
      this.rotate();
    }
  }

  private classify(source: RequestKind, outcome: RawOutcome, identity: Identity, shapeCheck: ShapeCheck): Classification {
    const context = this.tracker.observe(identity, outcome);
    const classification = this.deps.classifier.classify(outcome, shapeCheck, context);
    this.deps.telemetry?.onClassification?.({
      source,
      classification,
      statusCode: outcome.kind === "response" ? outcome.statusCode : undefined,
      generation: identity.generation,
      at: this.clock.now()
    });
    return classification;
  }

  private nextIdentity(): Identity {
    const before = this.deps.identityPool.peek()?.generation;
    const identity = this.deps.identityPool.nextIdentity(this.config.rotateEvery);
    if (identity.generation !== before) {
      this.deps.telemetry?.onIdentityRotated?.(identity, "window");
    }
    return identity;
  }

  private rotate(): void {
    const identity = this.deps.identityPool.forceRotate();
    this.deps.telemetry?.onIdentityRotated?.(identity, "forced");
  }

  private abort(reason: AbortReason, classification?: Classification): MonitorResult {
    this.setState("aborted");
    return { status: "aborted", reason, classification, checks: this.checks };
  }

  private setState(state: MonitorStateName, waitMs?: number): void {
    this.state = state;
    this.deps.telemetry?.onMonitorState?.(state, {
      checks: this.checks,
      failures: this.policy.getState().consecutiveFailures,
      waitMs
    });
  }
}
