import type { Clock } from "../src/utils/time";

/**
 * Clock whose sleeps return at once and move `now` forward. Every non-zero
 * sleep is recorded; `onSleep` runs before the sleep returns.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(
    private current = 0,
    private readonly onSleep?: (ms: number) => void
  ) {}

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return;
    this.sleeps.push(ms);
    this.onSleep?.(ms);
    this.current += ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}
