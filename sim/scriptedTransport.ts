import { TransportError } from "../src/errors";
import type { Transport, TransportErrorKind, TransportRequest, TransportResponse } from "../src/types";
import { sleep } from "../src/utils/time";

export type ScriptedReply =
  | { status: number; body?: string; headers?: Record<string, string>; delayMs?: number }
  | { error: TransportErrorKind; delayMs?: number };

type Script = readonly ScriptedReply[] | ((request: TransportRequest, call: number) => ScriptedReply);

/** Replays scripted replies in call order and records every request it sees. */
export class ScriptedTransport implements Transport {
  readonly name = "scripted";
  readonly requests: TransportRequest[] = [];
  private inFlight = 0;
  private peakInFlight = 0;

  constructor(private readonly script: Script) {}

  get calls(): number {
    return this.requests.length;
  }

  get maxInFlight(): number {
    return this.peakInFlight;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const call = this.requests.length;
    this.requests.push(request);
    const reply = this.replyFor(request, call);

    this.inFlight += 1;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      await sleep(reply.delayMs ?? 0);
      if ("error" in reply) {
        throw new TransportError(reply.error);
      }
      return {
        statusCode: reply.status,
        body: Buffer.from(reply.body ?? ""),
        headers: reply.headers ?? {}
      };
    } finally {
      this.inFlight -= 1;
    }
  }

  private replyFor(request: TransportRequest, call: number): ScriptedReply {
    if (typeof this.script === "function") {
      return this.script(request, call);
    }
    const reply = this.script[call];
    if (!reply) {
      throw new Error(`ScriptedTransport has no reply for call ${call + 1}`);
    }
    return reply;
  }
}
