import { describe, expect, it } from "vitest";
import { priceDescriptor, stockDescriptor } from "../src/descriptors";
import { RequestDispatcher } from "../src/dispatcher/requestDispatcher";
import { RetailEndpoints } from "../src/transport/endpoints";
import type { EndpointResolver } from "../src/types";
import { ScriptedTransport, type ScriptedReply } from "../sim/scriptedTransport";
import { fixedIdentity } from "./helpers";

const endpoints = new RetailEndpoints({
  stockUrl: "http://inventory.test/stock",
  priceUrl: "http://inventory.test/price",
  apiKey: "test-key"
});
const target = { tcin: "12345678", storeId: "1234" };
const ok: ScriptedReply = { status: 200, body: "{}" };

function build(transport: ScriptedTransport, resolver: EndpointResolver = endpoints): RequestDispatcher {
  return new RequestDispatcher({ transport, endpoints: resolver });
}

describe("RequestDispatcher.dispatchOne", () => {
  it("sends the identity's headers, profile and session token", async () => {
    const transport = new ScriptedTransport([ok]);
    const identity = fixedIdentity(3);
    const outcome = await build(transport).dispatchOne(stockDescriptor(target), identity, 500);

    expect(outcome).toMatchObject({ kind: "response", statusCode: 200 });
    const [request] = transport.requests;
    expect(request.headers).toBe(identity.headerSet);
    expect(request.profile).toEqual({ kind: "browser", id: "firefox_125", family: "firefox" });
    expect(request.timeoutMs).toBe(500);
    const url = new URL(request.url);
    expect(url.pathname).toBe("/stock");
    expect(url.searchParams.get("key")).toBe("test-key");
    expect(url.searchParams.get("tcin")).toBe("12345678");
    expect(url.searchParams.get("store_id")).toBe("1234");
    expect(url.searchParams.get("page")).toBe("/p/A-12345678");
    expect(url.searchParams.get("visitor_id")).toBe(identity.sessionToken);
  });

  it("routes price descriptors to the price endpoint", async () => {
    const transport = new ScriptedTransport([ok]);
    await build(transport).dispatchOne(priceDescriptor(target), fixedIdentity(), 500);
    const url = new URL(transport.requests[0].url);
    expect(url.pathname).toBe("/price");
    expect(url.searchParams.get("pricing_store_id")).toBe("1234");
  });

  it("turns transport failures into outcomes", async () => {
    const transport = new ScriptedTransport([{ error: "dns_failure" }, { error: "timeout" }]);
    const dispatcher = build(transport);
    expect(await dispatcher.dispatchOne(stockDescriptor(target), fixedIdentity(), 500)).toMatchObject({
      kind: "transport_error",
      error: "dns_failure"
    });
    expect(await dispatcher.dispatchOne(stockDescriptor(target), fixedIdentity(), 500)).toMatchObject({
      kind: "transport_error",
      error: "timeout"
    });
  });

  it("reports resolver failures as other", async () => {
    const resolver: EndpointResolver = {
      resolve: () => {
        throw new Error("no endpoint");
      }
    };
    const transport = new ScriptedTransport([ok]);
    const outcome = await build(transport, resolver).dispatchOne(stockDescriptor(target), fixedIdentity(), 500);
    expect(outcome).toEqual({ kind: "transport_error", error: "other", message: "no endpoint" });
    expect(transport.calls).toBe(0);
  });
});

describe("RequestDispatcher.dispatchBatch", () => {
  it("returns one outcome per descriptor tagged with its index", async () => {
    const transport = new ScriptedTransport((_request, call) => ({ status: 200 + call, delayMs: (5 - call) * 2 }));
    const descriptors = Array.from({ length: 5 }, () => stockDescriptor(target));
    const outcomes = await build(transport).dispatchBatch(descriptors, fixedIdentity(), { concurrency: 5, timeoutMs: 500 });

    expect(outcomes.map((entry) => entry.index).sort()).toEqual([0, 1, 2, 3, 4]);
    for (const { index, outcome } of outcomes) {
      expect(outcome).toMatchObject({ kind: "response", statusCode: 200 + index });
    }
  });

  it("never runs more requests at once than the concurrency", async () => {
    const transport = new ScriptedTransport(() => ({ status: 200, delayMs: 5 }));
    const descriptors = Array.from({ length: 10 }, () => stockDescriptor(target));
    const outcomes = await build(transport).dispatchBatch(descriptors, fixedIdentity(), { concurrency: 3, timeoutMs: 500 });

    expect(outcomes).toHaveLength(10);
    expect(transport.maxInFlight).toBe(3);
  });

  it("sends every request in the batch with one identity", async () => {
    const transport = new ScriptedTransport(() => ok);
    const identity = fixedIdentity(7);
    const descriptors = Array.from({ length: 4 }, () => stockDescriptor(target));
    await build(transport).dispatchBatch(descriptors, identity, { concurrency: 2, timeoutMs: 500 });

    const visitors = new Set(transport.requests.map((request) => new URL(request.url).searchParams.get("visitor_id")));
    expect([...visitors]).toEqual([identity.sessionToken]);
  });

  it("sends nothing once the signal has aborted", async () => {
    const transport = new ScriptedTransport(() => ok);
    const controller = new AbortController();
    controller.abort();
    const outcomes = await build(transport).dispatchBatch([stockDescriptor(target)], fixedIdentity(), {
      concurrency: 1,
      timeoutMs: 500,
      signal: controller.signal
    });
    expect(outcomes).toEqual([]);
    expect(transport.calls).toBe(0);
  });

  it("stops scheduling after cancellation but keeps requests already sent", async () => {
    const controller = new AbortController();
    const transport = new ScriptedTransport((_request, call) => {
      if (call === 1) controller.abort();
      return ok;
    });
    const descriptors = Array.from({ length: 6 }, () => stockDescriptor(target));
    const outcomes = await build(transport).dispatchBatch(descriptors, fixedIdentity(), {
      concurrency: 1,
      timeoutMs: 500,
      signal: controller.signal
    });
    expect(outcomes.map((entry) => entry.index)).toEqual([0, 1]);
  });
});
