import { TransportError } from "../errors";
import type { Transport, TransportErrorKind, TransportRequest, TransportResponse } from "../types";

const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN"]);
const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT"
]);

export function transportErrorKindOf(code: unknown): TransportErrorKind {
  if (typeof code !== "string") return "other";
  if (DNS_CODES.has(code)) return "dns_failure";
  if (code === "ETIMEDOUT" || code === "UND_ERR_HEADERS_TIMEOUT" || code === "UND_ERR_BODY_TIMEOUT") return "timeout";
  if (CONNECTION_CODES.has(code)) return "connection_failed";
  return "other";
}

function errorCode(error: unknown): unknown {
  if (error instanceof Error && "code" in error) return error.code;
  return undefined;
}

/**
 * Plain transport on the global fetch API. The transport profile is ignored:
 * every identity goes out with the runtime's own connection behaviour.
 */
export class FetchTransport implements Transport {
  readonly name = "fetch";

  async send(request: TransportRequest): Promise<TransportResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: { ...request.headers },
        signal: controller.signal,
        redirect: "follow"
      });
      const body = Buffer.from(await response.arrayBuffer());
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });
      return { statusCode: response.status, body, headers };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new TransportError("timeout", `Request timed out after ${request.timeoutMs}ms`);
      }
      // fetch wraps socket failures as TypeError("fetch failed") with the cause attached
      const cause = error instanceof Error ? error.cause : undefined;
      const kind = transportErrorKindOf(errorCode(cause) ?? errorCode(error));
      throw new TransportError(kind, error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
