import http from "http";
import type { AddressInfo } from "net";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { TransportError } from "../src/errors";
import { NodeHttpTransport } from "../src/transport/nodeHttpTransport";
import type { TransportRequest } from "../src/types";

let server: http.Server;
let baseUrl = "";
const seenHeaders: string[][] = [];
const transport = new NodeHttpTransport();

function handle(req: http.IncomingMessage, res: http.ServerResponse): void {
  seenHeaders.push(req.rawHeaders.filter((_value, index) => index % 2 === 0));
  switch (req.url) {
    case "/ok":
      res.writeHead(200, { "content-type": "application/json", "x-test": "1" });
      res.end('{"ok":true}');
      return;
    case "/moved":
      res.writeHead(302, { location: "/ok" });
      res.end();
      return;
    case "/trickle": {
      res.writeHead(200, { "content-length": "20" });
      let sent = 0;
      const interval = setInterval(() => {
        res.write("x");
        sent += 1;
        if (sent === 20) {
          clearInterval(interval);
          res.end();
        }
      }, 50);
      res.on("close", () => clearInterval(interval));
      return;
    }
    case "/stall":
      res.writeHead(200, { "content-length": "100" });
      res.write("partial");
      return;
    case "/drop":
      res.writeHead(200, { "content-length": "100" });
      res.write("partial", () => req.socket.destroy());
      return;
    default:
      res.writeHead(404);
      res.end();
  }
}

function request(path: string, timeoutMs = 2000): TransportRequest {
  return {
    url: `${baseUrl}${path}`,
    headers: { "user-agent": "test-agent", accept: "application/json" },
    profile: { kind: "browser", id: "chrome_124", family: "chrome" },
    timeoutMs
  };
}

beforeAll(async () => {
  server = http.createServer(handle);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("server has no TCP address");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  transport.close();
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe("NodeHttpTransport", () => {
  it("returns status, body and headers, writing headers in declared order", async () => {
    seenHeaders.length = 0;
    const response = await transport.send(request("/ok"));

    expect(response.statusCode).toBe(200);
    expect(response.body.toString("utf8")).toBe('{"ok":true}');
    expect(response.headers["x-test"]).toBe("1");
    expect(seenHeaders[0].slice(0, 3)).toEqual(["host", "user-agent", "accept"]);
  });

  it("follows redirects", async () => {
    const response = await transport.send(request("/moved"));
    expect(response.statusCode).toBe(200);
    expect(response.body.toString("utf8")).toBe('{"ok":true}');
  });

  it("times out a trickling body at the request deadline", async () => {
    const startedAt = Date.now();
    const failure = transport.send(request("/trickle", 200));

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({ kind: "timeout" });
    expect(Date.now() - startedAt).toBeLessThan(600);
  });

  it("times out a stalled body", async () => {
    await expect(transport.send(request("/stall", 200))).rejects.toMatchObject({ kind: "timeout" });
  });

  it("reports a connection dropped mid-body", async () => {
    await expect(transport.send(request("/drop"))).rejects.toMatchObject({ kind: "connection_failed" });
  });
});
