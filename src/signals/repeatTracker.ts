import type { ClassifyContext, Identity, RawOutcome } from "../types";

/**
 * Counts how often each status code has come back under the current identity.
 * The count resets whenever a new identity generation shows up.
 */
export class RepeatTracker {
  private generation = -1;
  private readonly counts = new Map<number, number>();

  observe(identity: Identity, outcome: RawOutcome): ClassifyContext {
    if (identity.generation !== this.generation) {
      this.generation = identity.generation;
      this.counts.clear();
    }
    if (outcome.kind !== "response") {
      return { priorSameStatus: 0 };
    }
    const prior = this.counts.get(outcome.statusCode) ?? 0;
    this.counts.set(outcome.statusCode, prior + 1);
    return { priorSameStatus: prior };
  }
}
