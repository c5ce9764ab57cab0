import { systemClock, type Clock } from "../utils/time";

export type PacerConfig = {
  spacingMs: number;
  baseMs: number;
  factor: number;
  maxMs: number;
};

/**
 * Enforces a minimum spacing between request starts. Callers reserve the next
 * start slot synchronously, so concurrent workers never share one.
 */
export class Pacer {
  private spacingMs: number;
  private nextStartAt = 0;

  constructor(private readonly config: PacerConfig, private readonly clock: Clock = systemClock) {
    this.spacingMs = Math.min(config.maxMs, Math.max(0, config.spacingMs));
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    const now = this.clock.now();
    const startAt = Math.max(now, this.nextStartAt);
    this.nextStartAt = startAt + this.spacingMs;
    await this.clock.sleep(startAt - now, signal);
  }

  slowDown(): void {
    const next = this.spacingMs > 0 ? this.spacingMs * this.config.factor : this.config.baseMs;
    this.spacingMs = Math.min(this.config.maxMs, next);
  }

  getState(): { spacingMs: number } {
    return { spacingMs: this.spacingMs };
  }
}
