import type { SentinelConfig } from "../config";
import { priceDescriptor, stockDescriptor } from "../descriptors";
import { RequestDispatcher } from "../dispatcher/requestDispatcher";
import { priceShapeCheck } from "../extract/price";
import { stockShapeCheck } from "../extract/stock";
import { IdentityPool } from "../identity/identityPool";
import { MonitorLoop, type MonitorResult } from "../monitor/monitorLoop";
import { BasicResponseClassifier } from "../signals/responseClassifier";
import { ThroughputController, type ThroughputReport } from "../throughput/throughputController";
import { RetailEndpoints } from "../transport/endpoints";
import { FetchTransport } from "../transport/fetchTransport";
import { NodeHttpTransport } from "../transport/nodeHttpTransport";
import type { TelemetrySink, Transport } from "../types";
import type { Clock } from "../utils/time";
import { formatMonitorResult, formatThroughputReport } from "./report";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export type CommandDeps = {
  transport: Transport;
  telemetry?: TelemetrySink;
  identityPool?: IdentityPool;
  clock?: Clock;
  print?: (line: string) => void;
};

export function createTransport(kind: SentinelConfig["transport"]): Transport {
  return kind === "fetch" ? new FetchTransport() : new NodeHttpTransport();
}

export function monitorExitCode(result: MonitorResult): number {
  if (result.status === "found") return EXIT_OK;
  return result.reason === "cancelled" ? EXIT_OK : EXIT_FAILURE;
}

export function throughputExitCode(report: ThroughputReport): number {
  return report.stopReason === "fatal" ? EXIT_FAILURE : EXIT_OK;
}

function dispatcherFor(config: SentinelConfig, deps: CommandDeps): RequestDispatcher {
  return new RequestDispatcher({ transport: deps.transport, endpoints: new RetailEndpoints(config.endpoints) });
}

export async function runMonitorCommand(config: SentinelConfig, deps: CommandDeps, signal?: AbortSignal): Promise<number> {
  const print = deps.print ?? console.log;
  const loop = new MonitorLoop(
    { ...config.monitor, target: config.target },
    {
      identityPool: deps.identityPool ?? new IdentityPool(),
      dispatcher: dispatcherFor(config, deps),
      classifier: new BasicResponseClassifier(),
      telemetry: deps.telemetry,
      clock: deps.clock
    }
  );
  const result = await loop.run(signal);
  formatMonitorResult(result).forEach((line) => print(line));
  return monitorExitCode(result);
}

export async function runThroughputCommand(
  config: SentinelConfig,
  deps: CommandDeps,
  signal?: AbortSignal
): Promise<number> {
  const print = deps.print ?? console.log;
  const { kind, ...throughput } = config.throughput;
  const target = config.target;
  const controller = new ThroughputController(throughput, {
    identityPool: deps.identityPool ?? new IdentityPool(),
    dispatcher: dispatcherFor(config, deps),
    classifier: new BasicResponseClassifier(),
    shapeCheck: kind === "stock" ? stockShapeCheck(target.storeId) : priceShapeCheck,
    describe: () => (kind === "stock" ? stockDescriptor(target) : priceDescriptor(target)),
    telemetry: deps.telemetry,
    clock: deps.clock
  });
  const report = await controller.run(signal);
  formatThroughputReport(report).forEach((line) => print(line));
  return throughputExitCode(report);
}
