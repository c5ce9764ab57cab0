export type ConcurrencyLimiterConfig = {
  initial: number;
  min: number;
  max: number;
  growthFactor: number;
  backoffFactor: number;
};

export class ConcurrencyLimiter {
  private level: number;
  private peak: number;

  constructor(private readonly config: ConcurrencyLimiterConfig) {
    if (config.min < 1 || config.max < config.min) {
      throw new RangeError(`Invalid concurrency bounds ${config.min}..${config.max}`);
    }
    this.level = this.clamp(config.initial);
    this.peak = this.level;
  }

  /** The level a clean batch at `from` would move to. */
  grown(from = this.level): number {
    return this.clamp(Math.ceil(from * this.config.growthFactor));
  }

  onSuccess(): void {
    this.adopt(this.grown());
  }

  /** Backs off from the level the offending batch actually ran at. */
  onLoss(from = this.level): void {
    this.level = this.clamp(Math.floor(from * this.config.backoffFactor));
  }

  adopt(level: number): void {
    this.level = this.clamp(level);
    this.peak = Math.max(this.peak, this.level);
  }

  getState(): { level: number; peak: number } {
    return { level: this.level, peak: this.peak };
  }

  private clamp(value: number): number {
    return Math.max(this.config.min, Math.min(this.config.max, Math.floor(value)));
  }
}
