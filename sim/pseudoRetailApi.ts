import { TransportError } from "../src/errors";
import type { Transport, TransportRequest, TransportResponse } from "../src/types";
import { sleep } from "../src/utils/time";
import { priceBody, stockBody } from "./bodies";

export type PseudoRetailApiConfig = {
  rateLimitChance?: number;
  blockChance?: number;
  serverErrorChance?: number;
  timeoutChance?: number;
  // requests in flight beyond this come back as 429
  capacity?: number;
  latencyMs?: number;
  retryAfterSeconds?: number;
  quantity?: number;
  currentRetail?: number;
};

const DEFAULTS: Required<PseudoRetailApiConfig> = {
  rateLimitChance: 0.0,
  blockChance: 0.0,
  serverErrorChance: 0.0,
  timeoutChance: 0.0,
  capacity: Number.POSITIVE_INFINITY,
  latencyMs: 40,
  retryAfterSeconds: 1,
  quantity: 0,
  currentRetail: 19.99
};

export class PseudoRetailApi implements Transport {
  readonly name = "pseudo-retail";
  private readonly cfg: Required<PseudoRetailApiConfig>;
  private inFlight = 0;

  constructor(
    config: PseudoRetailApiConfig = {},
    private readonly random: () => number = Math.random
  ) {
    this.cfg = { ...DEFAULTS, ...config };
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.inFlight += 1;
    try {
      await sleep(this.jitter(this.cfg.latencyMs));
      return this.respond(new URL(request.url));
    } finally {
      this.inFlight -= 1;
    }
  }

  private respond(url: URL): TransportResponse {
    if (this.inFlight > this.cfg.capacity) {
      return this.status(429, { "retry-after": String(this.cfg.retryAfterSeconds) });
    }

    const roll = this.random();
    let threshold = this.cfg.rateLimitChance;
    if (roll < threshold) {
      return this.status(429, { "retry-after": String(this.cfg.retryAfterSeconds) });
    }
    threshold += this.cfg.blockChance;
    if (roll < threshold) {
      return this.status(403, {});
    }
    threshold += this.cfg.serverErrorChance;
    if (roll < threshold) {
      return this.status(503, {});
    }
    threshold += this.cfg.timeoutChance;
    if (roll < threshold) {
      throw new TransportError("timeout");
    }

    const storeId = url.searchParams.get("pricing_store_id") ?? url.searchParams.get("store_id") ?? "0";
    const body = url.searchParams.has("pricing_store_id")
      ? priceBody(this.cfg.currentRetail)
      : stockBody(storeId, this.cfg.quantity);
    return { statusCode: 200, body: Buffer.from(body), headers: { "content-type": "application/json" } };
  }

  private status(statusCode: number, headers: Record<string, string>): TransportResponse {
    return { statusCode, body: Buffer.from(""), headers };
  }

  private jitter(value: number): number {
    const spread = value * 0.1;
    return Math.max(0, value + (this.random() * spread - spread / 2));
  }
}
