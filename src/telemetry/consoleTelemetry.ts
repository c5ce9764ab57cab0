import type {
  ClassificationRecord,
  ControllerSnapshot,
  Identity,
  MonitorStateName,
  RotationReason,
  TelemetrySink
} from "../types";

export class ConsoleTelemetry implements TelemetrySink {
  onClassification(record: ClassificationRecord): void {
    if (record.classification.type === "success") return;
    console.warn(
      "[sentinel] %s status=%s classification=%s generation=%d at=%s",
      record.source,
      record.statusCode ?? "-",
      describe(record),
      record.generation,
      new Date(record.at).toISOString()
    );
  }

  onIdentityRotated(identity: Identity, reason: RotationReason): void {
    console.info(
      "[sentinel] identity generation=%d archetype=%s reason=%s",
      identity.generation,
      identity.archetype,
      reason
    );
  }

  onControllerState(snapshot: ControllerSnapshot): void {
    console.info(
      "[sentinel] state=%s concurrency=%d pacing_ms=%d dispatched=%d",
      snapshot.state,
      snapshot.concurrency,
      snapshot.pacingMs,
      snapshot.dispatched
    );
  }

  onMonitorState(state: MonitorStateName, ctx: { checks: number; failures: number; waitMs?: number }): void {
    if (state === "waiting") {
      console.info("[sentinel] check=%d failures=%d waiting %ds", ctx.checks, ctx.failures, Math.round((ctx.waitMs ?? 0) / 1000));
      return;
    }
    if (state === "found" || state === "aborted") {
      console.info("[sentinel] monitor %s after %d checks", state, ctx.checks);
    }
  }
}

function describe(record: ClassificationRecord): string {
  const c = record.classification;
  switch (c.type) {
    case "rate_limited":
      return c.retryAfterSeconds === undefined ? c.type : `${c.type}(retry_after=${c.retryAfterSeconds}s)`;
    case "transient":
    case "fatal":
      return `${c.type}(${c.reason})`;
    default:
      return c.type;
  }
}
