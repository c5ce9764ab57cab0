import type { Classification, ClassifyContext, RawOutcome, ResponseClassifier, ShapeCheck } from "../types";

const NO_CONTEXT: ClassifyContext = { priorSameStatus: 0 };

export const BLOCK_REPEAT_THRESHOLD = 2;

export class BasicResponseClassifier implements ResponseClassifier {
  classify(outcome: RawOutcome, shapeCheck: ShapeCheck, context: ClassifyContext = NO_CONTEXT): Classification {
    if (outcome.kind === "transport_error") {
      return { type: "transient", reason: "transport" };
    }

    const { statusCode, body, headers } = outcome;

    if (statusCode === 200) {
      return shapeCheck(body) ? { type: "success" } : { type: "transient", reason: "schema_drift" };
    }

    if (statusCode === 429) {
      const retryAfterSeconds = this.parseRetryAfter(headers);
      return retryAfterSeconds === undefined ? { type: "rate_limited" } : { type: "rate_limited", retryAfterSeconds };
    }

    if (statusCode === 410) {
      return { type: "fatal", reason: "gone" };
    }

    if (statusCode === 403 || statusCode === 404) {
      return context.priorSameStatus >= BLOCK_REPEAT_THRESHOLD
        ? { type: "blocked" }
        : { type: "transient", reason: "suspect_block" };
    }

    if (statusCode >= 500 && statusCode <= 599) {
      return { type: "transient", reason: "server_error" };
    }

    return { type: "fatal", reason: "unexpected_status" };
  }

  // HTTP-date values are measured against the response's own Date header so
  // the result never depends on the local clock.
  private parseRetryAfter(headers: Record<string, string>): number | undefined {
    const header = headerValue(headers, "retry-after");
    if (!header) return undefined;

    const seconds = Number(header);
    if (!Number.isNaN(seconds)) {
      return Math.max(0, seconds);
    }

    const until = Date.parse(header);
    const sent = Date.parse(headerValue(headers, "date") ?? "");
    if (!Number.isNaN(until) && !Number.isNaN(sent)) {
      return Math.max(0, (until - sent) / 1000);
    }

    return undefined;
  }
}

export function headerValue(headers: Record<string, string>, name: string): string | undefined {
  const target = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === target) return headers[key];
  }
  return undefined;
}
