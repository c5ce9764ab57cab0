import { z } from "zod";
import { ParseError } from "../errors";
import type { ShapeCheck } from "../types";
import { parseJsonBody } from "./json";

const priceBodySchema = z.object({
  data: z.object({
    product: z.object({
      price: z.object({
        current_retail: z.number().nonnegative(),
        formatted_current_price: z.string().optional()
      }),
      item: z
        .object({
          product_description: z.object({ title: z.string().optional() }).passthrough().optional()
        })
        .passthrough()
        .optional()
    })
  })
});

export type PriceSnapshot = {
  currentRetail: number;
  formattedPrice: string;
  title: string;
};

export function extractPrice(body: Buffer): PriceSnapshot {
  const parsed = priceBodySchema.safeParse(parseJsonBody(body));
  if (!parsed.success) {
    throw new ParseError(`Price body mismatch at ${parsed.error.issues[0]?.path.join(".") ?? "root"}`);
  }
  const { price, item } = parsed.data.data.product;
  return {
    currentRetail: price.current_retail,
    formattedPrice: price.formatted_current_price ?? `$${price.current_retail.toFixed(2)}`,
    title: item?.product_description?.title ?? "Unknown Product"
  };
}

export const priceShapeCheck: ShapeCheck = (body) => {
  try {
    extractPrice(body);
    return true;
  } catch (error) {
    if (error instanceof ParseError) return false;
    throw error;
  }
};
