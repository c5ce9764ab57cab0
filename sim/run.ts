import { stockDescriptor, type ProductTarget } from "../src/descriptors";
import { RequestDispatcher } from "../src/dispatcher/requestDispatcher";
import { stockShapeCheck } from "../src/extract/stock";
import { IdentityPool } from "../src/identity/identityPool";
import { BasicResponseClassifier } from "../src/signals/responseClassifier";
import { InMemoryTelemetry } from "../src/telemetry/inMemoryTelemetry";
import { ThroughputController } from "../src/throughput/throughputController";
import { RetailEndpoints } from "../src/transport/endpoints";
import { formatThroughputReport } from "../src/cli/report";
import { PseudoRetailApi } from "./pseudoRetailApi";

async function main() {
  const target: ProductTarget = { tcin: "12345678", storeId: "1234" };
  const telemetry = new InMemoryTelemetry();

  const controller = new ThroughputController(
    {
      totalRequests: 120,
      initialConcurrency: 1,
      maxConcurrency: 12,
      growthFactor: 1.5,
      backoffFactor: 0.5,
      transientTolerance: 0.1,
      requestsPerSlot: 2,
      rotateEvery: 20,
      timeoutMs: 2000,
      cooldownMs: 200,
      revalidateEvery: 3,
      maxSchemaDrift: 3,
      pacing: { initialMs: 0, baseMs: 20, factor: 2, maxMs: 500 }
    },
    {
      identityPool: new IdentityPool(),
      dispatcher: new RequestDispatcher({
        transport: new PseudoRetailApi({ capacity: 6, serverErrorChance: 0.02, quantity: 3 }),
        endpoints: new RetailEndpoints({
          stockUrl: "http://inventory.sim.invalid/stock",
          priceUrl: "http://inventory.sim.invalid/price",
          apiKey: "test-key"
        })
      }),
      classifier: new BasicResponseClassifier(),
      shapeCheck: stockShapeCheck(target.storeId),
      describe: () => stockDescriptor(target),
      telemetry
    }
  );

  const report = await controller.run();
  formatThroughputReport(report).forEach((line) => console.log(line));
  console.log("batches:", report.history.map((entry) => `${entry.state}@${entry.concurrency}`).join(" "));
  console.log("rotations:", telemetry.rotations.length);
}

main().catch((err) => {
  console.error("run error", err);
  process.exit(1);
});
