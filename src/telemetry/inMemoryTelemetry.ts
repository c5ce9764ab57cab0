import type {
  ClassificationRecord,
  ControllerSnapshot,
  Identity,
  MonitorStateName,
  RotationReason,
  TelemetrySink
} from "../types";

export class InMemoryTelemetry implements TelemetrySink {
  classifications: ClassificationRecord[] = [];
  rotations: Array<{ generation: number; reason: RotationReason }> = [];
  controllerStates: ControllerSnapshot[] = [];
  monitorStates: Array<{ state: MonitorStateName; checks: number; failures: number; waitMs?: number }> = [];

  onClassification(record: ClassificationRecord): void {
    this.classifications.push(record);
  }

  onIdentityRotated(identity: Identity, reason: RotationReason): void {
    this.rotations.push({ generation: identity.generation, reason });
  }

  onControllerState(snapshot: ControllerSnapshot): void {
    this.controllerStates.push(snapshot);
  }

  onMonitorState(state: MonitorStateName, ctx: { checks: number; failures: number; waitMs?: number }): void {
    this.monitorStates.push({ state, ...ctx });
  }
}
