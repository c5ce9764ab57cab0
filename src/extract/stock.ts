import { z } from "zod";
import { ParseError } from "../errors";
import type { ShapeCheck } from "../types";
import { parseJsonBody } from "./json";

const storeOptionSchema = z.object({
  location_id: z.union([z.string(), z.number()]),
  location_available_to_promise_quantity: z.number().nonnegative().optional(),
  store: z.object({ location_name: z.string().optional() }).passthrough().optional()
});

const stockBodySchema = z.object({
  data: z.object({
    product: z.object({
      fulfillment: z.object({
        store_options: z.array(storeOptionSchema)
      })
    })
  })
});

export type StockSnapshot = {
  quantity: number;
  locationName: string;
  storeId: string;
  inStock: boolean;
};

export function extractStock(body: Buffer, storeId: string): StockSnapshot {
  const parsed = stockBodySchema.safeParse(parseJsonBody(body));
  if (!parsed.success) {
    throw new ParseError(`Stock body mismatch at ${parsed.error.issues[0]?.path.join(".") ?? "root"}`);
  }

  const option = parsed.data.data.product.fulfillment.store_options.find(
    (candidate) => String(candidate.location_id) === storeId
  );
  if (!option) {
    throw new ParseError(`Store ${storeId} not found in response`);
  }

  const quantity = option.location_available_to_promise_quantity ?? 0;
  return {
    quantity,
    locationName: option.store?.location_name ?? "Unknown Store",
    storeId,
    inStock: quantity > 0
  };
}

export function stockShapeCheck(storeId: string): ShapeCheck {
  return (body) => {
    try {
      extractStock(body, storeId);
      return true;
    } catch (error) {
      if (error instanceof ParseError) return false;
      throw error;
    }
  };
}
