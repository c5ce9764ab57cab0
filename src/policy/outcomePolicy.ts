import type { Classification, ClassificationType } from "../types";

export type PolicyAction = "proceed" | "retry" | "rotate_and_retry" | "back_off" | "abort";

export type ActionMap = Readonly<Record<ClassificationType, PolicyAction>>;

export const MONITOR_ACTIONS: ActionMap = {
  success: "proceed",
  rate_limited: "retry",
  transient: "retry",
  blocked: "rotate_and_retry",
  fatal: "abort"
};

export const THROUGHPUT_ACTIONS: ActionMap = {
  success: "proceed",
  transient: "proceed",
  rate_limited: "back_off",
  blocked: "back_off",
  fatal: "abort"
};

export type OutcomePolicyConfig = {
  actions: ActionMap;
  maxSchemaDrift: number;
  maxConsecutiveFailures?: number;
};

export type PolicyDecision = {
  action: PolicyAction;
  // fatal when repeated schema drift was escalated, otherwise the input
  classification: Classification;
  failures: number;
  exhausted: boolean;
  retryAfterMs?: number;
};

export const DEFAULT_MAX_SCHEMA_DRIFT = 3;

export class OutcomePolicy {
  private consecutiveFailures = 0;
  private consecutiveDrift = 0;

  constructor(private readonly config: OutcomePolicyConfig) {
    if (config.maxSchemaDrift < 1) {
      throw new RangeError("maxSchemaDrift must be at least 1");
    }
  }

  evaluate(classification: Classification): PolicyDecision {
    const effective = this.escalate(classification);

    if (effective.type === "success") {
      this.consecutiveFailures = 0;
    } else if (effective.type !== "fatal") {
      this.consecutiveFailures += 1;
    }

    const limit = this.config.maxConsecutiveFailures;
    const exhausted = limit !== undefined && this.consecutiveFailures > limit;
    const decision: PolicyDecision = {
      action: exhausted ? "abort" : this.config.actions[effective.type],
      classification: effective,
      failures: this.consecutiveFailures,
      exhausted
    };
    if (effective.type === "rate_limited" && effective.retryAfterSeconds !== undefined) {
      decision.retryAfterMs = effective.retryAfterSeconds * 1000;
    }
    return decision;
  }

  getState(): { consecutiveFailures: number; consecutiveDrift: number } {
    return { consecutiveFailures: this.consecutiveFailures, consecutiveDrift: this.consecutiveDrift };
  }

  private escalate(classification: Classification): Classification {
    if (classification.type !== "transient" || classification.reason !== "schema_drift") {
      this.consecutiveDrift = 0;
      return classification;
    }
    this.consecutiveDrift += 1;
    if (this.consecutiveDrift >= this.config.maxSchemaDrift) {
      return { type: "fatal", reason: "schema_drift" };
    }
    return classification;
  }
}
