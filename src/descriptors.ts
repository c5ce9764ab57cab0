import type { RequestDescriptor } from "./types";

export type ProductTarget = {
  tcin: string;
  storeId: string;
  zip?: string;
  state?: string;
  latitude?: string;
  longitude?: string;
};

export function stockDescriptor(target: ProductTarget): RequestDescriptor {
  const params: Record<string, string> = {
    tcin: target.tcin,
    store_id: target.storeId,
    required_store_id: target.storeId,
    scheduled_delivery_store_id: target.storeId
  };
  if (target.zip) params.zip = target.zip;
  if (target.state) params.state = target.state;
  if (target.latitude) params.latitude = target.latitude;
  if (target.longitude) params.longitude = target.longitude;
  params.channel = "WEB";
  params.page = `/p/A-${target.tcin}`;
  return { kind: "stock", params };
}

export function priceDescriptor(target: ProductTarget): RequestDescriptor {
  return {
    kind: "price",
    params: {
      tcin: target.tcin,
      pricing_store_id: target.storeId
    }
  };
}
