import { describe, expect, it } from "vitest";
import { ParseError } from "../src/errors";
import { extractPrice, priceShapeCheck } from "../src/extract/price";
import { extractStock, stockShapeCheck } from "../src/extract/stock";
import { priceBody, stockBody } from "../sim/bodies";

describe("extractStock", () => {
  it("reads quantity and location for the requested store", () => {
    const snapshot = extractStock(Buffer.from(stockBody("1234", 3, "Downtown")), "1234");
    expect(snapshot).toEqual({ quantity: 3, locationName: "Downtown", storeId: "1234", inStock: true });
  });

  it("matches numeric location ids", () => {
    const body = JSON.stringify({
      data: { product: { fulfillment: { store_options: [{ location_id: 1234 }] } } }
    });
    expect(extractStock(Buffer.from(body), "1234")).toEqual({
      quantity: 0,
      locationName: "Unknown Store",
      storeId: "1234",
      inStock: false
    });
  });

  it("throws ParseError when the store is missing", () => {
    expect(() => extractStock(Buffer.from(stockBody("9999", 1)), "1234")).toThrow("Store 1234 not found in response");
  });

  it("throws ParseError on non-JSON bodies", () => {
    expect(() => extractStock(Buffer.from("<html>blocked</html>"), "1234")).toThrow(ParseError);
  });

  it("backs the shape check", () => {
    const check = stockShapeCheck("1234");
    expect(check(Buffer.from(stockBody("1234", 0)))).toBe(true);
    expect(check(Buffer.from('{"data":{}}'))).toBe(false);
  });
});

describe("extractPrice", () => {
  it("reads price and title", () => {
    expect(extractPrice(Buffer.from(priceBody(24.5, "Trading Cards")))).toEqual({
      currentRetail: 24.5,
      formattedPrice: "$24.50",
      title: "Trading Cards"
    });
  });

  it("fills in formatted price and title when absent", () => {
    const body = JSON.stringify({ data: { product: { price: { current_retail: 5 } } } });
    expect(extractPrice(Buffer.from(body))).toEqual({
      currentRetail: 5,
      formattedPrice: "$5.00",
      title: "Unknown Product"
    });
  });

  it("rejects a body without current_retail", () => {
    const body = JSON.stringify({ data: { product: { price: {} } } });
    expect(() => extractPrice(Buffer.from(body))).toThrow(ParseError);
    expect(priceShapeCheck(Buffer.from(body))).toBe(false);
  });
});
