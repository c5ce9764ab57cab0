import type { TelemetrySink } from "../types";

export class NullTelemetry implements TelemetrySink {
  onClassification(): void {
    // noop
  }
  onIdentityRotated(): void {
    // noop
  }
  onControllerState(): void {
    // noop
  }
  onMonitorState(): void {
    // noop
  }
}
