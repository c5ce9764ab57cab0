import type { MonitorResult } from "../monitor/monitorLoop";
import type { ThroughputReport } from "../throughput/throughputController";
import { CLASSIFICATION_TYPES } from "../types";

export function formatMonitorResult(result: MonitorResult): string[] {
  if (result.status === "found") {
    const lines = [
      `IN STOCK: ${result.stock.quantity} available at ${result.stock.locationName} (store ${result.stock.storeId})`,
      `checks: ${result.checks}`
    ];
    if (result.price) {
      lines.push(`price: ${result.price.formattedPrice} (${result.price.title})`);
    }
    return lines;
  }

  const lines = [`monitor stopped: ${result.reason} after ${result.checks} checks`];
  const classification = result.classification;
  if (classification?.type === "fatal") {
    lines.push(`last classification: fatal (${classification.reason})`);
  } else if (classification) {
    lines.push(`last classification: ${classification.type}`);
  }
  return lines;
}

export function formatThroughputReport(report: ThroughputReport): string[] {
  const totals = CLASSIFICATION_TYPES.map((type) => `${type}=${report.totals[type]}`).join(" ");
  const lines = [
    `stop: ${report.stopReason}`,
    `dispatched: ${report.dispatched} in ${(report.durationMs / 1000).toFixed(1)}s (${report.requestsPerSecond.toFixed(2)} req/s)`,
    `outcomes: ${totals}`,
    `success ratio: ${(report.successRatio * 100).toFixed(1)}%`,
    `concurrency: final ${report.concurrency}, peak ${report.peakConcurrency}; pacing ${report.pacingMs}ms`
  ];
  const recommended = report.recommended;
  if (recommended) {
    lines.push(
      `recommended: concurrency ${recommended.concurrency}, pacing ${recommended.pacingMs}ms, ` +
        `${recommended.requestsPerSecond.toFixed(2)} req/s (steady for ${recommended.batches} batches)`
    );
  } else {
    lines.push("recommended: none (no steady phase reached)");
  }
  return lines;
}
