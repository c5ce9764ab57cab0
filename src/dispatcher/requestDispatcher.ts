import { TransportError } from "../errors";
import type { Pacer } from "../limiters/pacer";
import type {
  EndpointResolver,
  Identity,
  IndexedOutcome,
  RawOutcome,
  RequestDescriptor,
  Transport
} from "../types";

export type BatchOptions = {
  concurrency: number;
  timeoutMs: number;
  pacer?: Pacer;
  // stops scheduling; requests already sent still resolve
  signal?: AbortSignal;
};

type DispatcherDeps = {
  transport: Transport;
  endpoints: EndpointResolver;
};

export class RequestDispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  get transportName(): string {
    return this.deps.transport.name;
  }

  async dispatchOne(descriptor: RequestDescriptor, identity: Identity, timeoutMs: number): Promise<RawOutcome> {
    let url: string;
    try {
      url = this.deps.endpoints.resolve(descriptor, identity);
    } catch (error) {
      return { kind: "transport_error", error: "other", message: messageOf(error) };
    }

    try {
      const response = await this.deps.transport.send({
        url,
        headers: identity.headerSet,
        profile: identity.transportProfile,
        timeoutMs
      });
      return { kind: "response", statusCode: response.statusCode, body: response.body, headers: response.headers };
    } catch (error) {
      if (error instanceof TransportError) {
        return { kind: "transport_error", error: error.kind, message: error.message };
      }
      return { kind: "transport_error", error: "other", message: messageOf(error) };
    }
  }

  /**
   * Runs the descriptors on a pool of `concurrency` workers sharing one
   * identity snapshot. Results come back in completion order, each tagged with
   * the index of its descriptor.
   */
  async dispatchBatch(
    descriptors: readonly RequestDescriptor[],
    identity: Identity,
    options: BatchOptions
  ): Promise<IndexedOutcome[]> {
    const workers = Math.min(descriptors.length, Math.max(1, Math.floor(options.concurrency)));
    const results: IndexedOutcome[] = [];
    let cursor = 0;

    const work = async (): Promise<void> => {
      while (cursor < descriptors.length) {
        if (options.signal?.aborted) return;
        const index = cursor;
        cursor += 1;
        await options.pacer?.acquire(options.signal);
        if (options.signal?.aborted) return;
        const startedAt = Date.now();
        const outcome = await this.dispatchOne(descriptors[index], identity, options.timeoutMs);
        results.push({ index, outcome, elapsedMs: Date.now() - startedAt });
      }
    };

    await Promise.all(Array.from({ length: workers }, () => work()));
    return results;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
