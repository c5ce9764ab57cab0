import http from "http";
import https from "https";
import { TransportError } from "../errors";
import type { Transport, TransportProfile, TransportRequest, TransportResponse } from "../types";
import { transportErrorKindOf } from "./fetchTransport";

export type NodeHttpTransportOptions = {
  maxSockets?: number;
  keepAliveMsecs?: number;
};

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const MAX_REDIRECTS = 5;

export function profileKey(profile: TransportProfile): string {
  return profile.kind === "plain" ? "plain" : `${profile.family}:${profile.id}`;
}

/** Flattens headers into raw [name, value, ...] form, keeping declaration order. */
export function orderedRawHeaders(headers: Readonly<Record<string, string>>, host: string): string[] {
  const raw = ["host", host];
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === "host") continue;
    raw.push(name, value);
  }
  return raw;
}

/**
 * Transport that keeps one keep-alive agent per transport profile, so sockets
 * are never shared between identities of different browser families, and
 * writes headers in the order the archetype declares them.
 */
export class NodeHttpTransport implements Transport {
  readonly name = "node-http";
  private readonly agents = new Map<string, http.Agent>();

  constructor(private readonly options: NodeHttpTransportOptions = {}) {}

  async send(request: TransportRequest): Promise<TransportResponse> {
    const deadline = Date.now() + request.timeoutMs;
    let url = new URL(request.url);
    for (let hop = 0; ; hop++) {
      const remainingMs = deadline - Date.now();
      if (remainingMs <= 0) {
        throw new TransportError("timeout", `Request timed out after ${request.timeoutMs}ms`);
      }
      const response = await this.exchange(url, request, remainingMs);
      const location = response.headers.location;
      if (!REDIRECT_STATUSES.has(response.statusCode) || !location || hop >= MAX_REDIRECTS) {
        return response;
      }
      url = new URL(location, url);
    }
  }

  private exchange(url: URL, request: TransportRequest, timeoutMs: number): Promise<TransportResponse> {
    const secure = url.protocol === "https:";
    const agent = this.agentFor(request.profile, secure);

    return new Promise<TransportResponse>((resolve, reject) => {
      let settled = false;
      let timer: NodeJS.Timeout | undefined;
      const settle = (finish: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        finish();
      };

      const onResponse = (res: http.IncomingMessage) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () => {
          const headers: Record<string, string> = {};
          for (const [name, value] of Object.entries(res.headers)) {
            if (value === undefined) continue;
            headers[name] = Array.isArray(value) ? value.join(", ") : value;
          }
          settle(() => resolve({ statusCode: res.statusCode ?? 0, body: Buffer.concat(chunks), headers }));
        });
        res.on("error", (error) => settle(() => reject(this.toTransportError(error))));
        res.on("close", () => {
          if (!res.complete) {
            settle(() => reject(new TransportError("connection_failed", "Response ended before completion")));
          }
        });
      };
      const options: http.RequestOptions = {
        method: "GET",
        hostname: url.hostname,
        port: url.port || undefined,
        path: `${url.pathname}${url.search}`,
        agent,
        headers: orderedRawHeaders(request.headers, url.host)
      };
      const req = secure ? https.request(options, onResponse) : http.request(options, onResponse);

      // covers the whole exchange, a trickling body included
      timer = setTimeout(() => {
        settle(() => reject(new TransportError("timeout", `Request timed out after ${request.timeoutMs}ms`)));
        req.destroy();
      }, timeoutMs);
      req.on("error", (error) => settle(() => reject(this.toTransportError(error))));
      req.end();
    });
  }

  close(): void {
    for (const agent of this.agents.values()) {
      agent.destroy();
    }
    this.agents.clear();
  }

  private agentFor(profile: TransportProfile, secure: boolean): http.Agent {
    const key = `${secure ? "https" : "http"}|${profileKey(profile)}`;
    const existing = this.agents.get(key);
    if (existing) return existing;
    const agentOptions = {
      keepAlive: true,
      keepAliveMsecs: this.options.keepAliveMsecs ?? 1000,
      maxSockets: this.options.maxSockets ?? 16
    };
    const agent = secure ? new https.Agent(agentOptions) : new http.Agent(agentOptions);
    this.agents.set(key, agent);
    return agent;
  }

  private toTransportError(error: Error): TransportError {
    if (error instanceof TransportError) return error;
    const code = "code" in error ? error.code : undefined;
    return new TransportError(transportErrorKindOf(code), error.message);
  }
}
