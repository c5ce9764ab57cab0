import type { ClassificationRecord, ControllerSnapshot, RotationReason, Identity, TelemetrySink } from "../types";

type Counter = Map<string, number>;
type Gauge = Map<string, number>;

export class MetricsTelemetry implements TelemetrySink {
  classifications: Counter = new Map();
  rotations: Counter = new Map();
  controllerGauge: Gauge = new Map();

  onClassification(record: ClassificationRecord): void {
    const k = `${record.source}:${record.classification.type}`;
    this.classifications.set(k, (this.classifications.get(k) ?? 0) + 1);
  }

  onIdentityRotated(_identity: Identity, reason: RotationReason): void {
    this.rotations.set(reason, (this.rotations.get(reason) ?? 0) + 1);
  }

  onControllerState(snapshot: ControllerSnapshot): void {
    this.controllerGauge.set("concurrency", snapshot.concurrency);
    this.controllerGauge.set("pacing_ms", snapshot.pacingMs);
    this.controllerGauge.set("dispatched", snapshot.dispatched);
  }

  snapshot() {
    return {
      classifications: new Map(this.classifications),
      rotations: new Map(this.rotations),
      controllerGauge: new Map(this.controllerGauge)
    };
  }
}
