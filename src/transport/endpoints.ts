import type { EndpointResolver, Identity, RequestDescriptor } from "../types";

export type EndpointConfig = {
  stockUrl: string;
  priceUrl: string;
  apiKey: string;
};

export class RetailEndpoints implements EndpointResolver {
  constructor(private readonly config: EndpointConfig) {}

  resolve(descriptor: RequestDescriptor, identity: Identity): string {
    const url = new URL(descriptor.kind === "stock" ? this.config.stockUrl : this.config.priceUrl);
    url.searchParams.set("key", this.config.apiKey);
    for (const [name, value] of Object.entries(descriptor.params)) {
      url.searchParams.set(name, value);
    }
    url.searchParams.set("visitor_id", identity.sessionToken);
    return url.toString();
  }
}
