import { describe, expect, it } from "vitest";
import { ConcurrencyLimiter } from "../src/limiters/concurrencyLimiter";
import { Pacer } from "../src/limiters/pacer";
import { ManualClock } from "../sim/clock";

describe("ConcurrencyLimiter", () => {
  const cfg = { initial: 1, min: 1, max: 8, growthFactor: 1.5, backoffFactor: 0.5 };

  it("grows multiplicatively, rounding up, and clamps at max", () => {
    const limiter = new ConcurrencyLimiter(cfg);
    const levels: number[] = [];
    for (let i = 0; i < 6; i++) {
      limiter.onSuccess();
      levels.push(limiter.getState().level);
    }
    expect(levels).toEqual([2, 3, 5, 8, 8, 8]);
    expect(limiter.getState().peak).toBe(8);
  });

  it("backs off from the level the batch ran at, never below min", () => {
    const limiter = new ConcurrencyLimiter({ ...cfg, initial: 4 });
    limiter.onLoss(8);
    expect(limiter.getState().level).toBe(4);
    limiter.onLoss(1);
    expect(limiter.getState().level).toBe(1);
  });

  it("reports the grown level without adopting it", () => {
    const limiter = new ConcurrencyLimiter({ ...cfg, initial: 4 });
    expect(limiter.grown()).toBe(6);
    expect(limiter.getState()).toEqual({ level: 4, peak: 4 });
    limiter.adopt(6);
    expect(limiter.getState()).toEqual({ level: 6, peak: 6 });
  });

  it("rejects inverted bounds", () => {
    expect(() => new ConcurrencyLimiter({ ...cfg, min: 4, max: 2 })).toThrow(RangeError);
  });
});

describe("Pacer", () => {
  const cfg = { spacingMs: 0, baseMs: 250, factor: 2, maxMs: 1000 };

  it("does not wait while spacing is zero", async () => {
    const clock = new ManualClock();
    const pacer = new Pacer(cfg, clock);
    await pacer.acquire();
    await pacer.acquire();
    expect(clock.sleeps).toEqual([]);
  });

  it("starts at the base spacing and multiplies up to the cap", () => {
    const pacer = new Pacer(cfg, new ManualClock());
    const spacings: number[] = [];
    for (let i = 0; i < 4; i++) {
      pacer.slowDown();
      spacings.push(pacer.getState().spacingMs);
    }
    expect(spacings).toEqual([250, 500, 1000, 1000]);
  });

  it("spaces consecutive starts by the current spacing", async () => {
    const clock = new ManualClock();
    const pacer = new Pacer({ ...cfg, spacingMs: 100 }, clock);
    await pacer.acquire();
    await pacer.acquire();
    await pacer.acquire();
    expect(clock.sleeps).toEqual([100, 100]);
    expect(clock.now()).toBe(200);
  });

  it("reserves distinct slots for concurrent callers", async () => {
    const clock = new ManualClock();
    const pacer = new Pacer({ ...cfg, spacingMs: 50 }, clock);
    await Promise.all([pacer.acquire(), pacer.acquire(), pacer.acquire()]);
    expect(clock.sleeps).toEqual([50, 50]);
    expect(clock.now()).toBe(100);
  });
});
