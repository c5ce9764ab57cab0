#!/usr/bin/env node
import { config as loadDotenv } from "dotenv";
import { loadConfig } from "../config";
import { ConfigError } from "../errors";
import { ConsoleTelemetry } from "../telemetry/consoleTelemetry";
import { NodeHttpTransport } from "../transport/nodeHttpTransport";
import { parseArgs } from "./parseFlags";
import { createTransport, EXIT_FAILURE, EXIT_OK, EXIT_USAGE, runMonitorCommand, runThroughputCommand } from "./commands";

function printHelp(): void {
  console.log("stock-sentinel");
  console.log("");
  console.log("Commands:");
  console.log("  monitor --tcin <id> --store <id> [--interval s] [--max-attempts n] [--rotate-every k] [--no-price]");
  console.log("  throughput --tcin <id> --store <id> [--requests n] [--concurrency n] [--max-concurrency n] [--kind stock|price]");
  console.log("");
  console.log("Common: [--transport fetch|node] [--timeout-ms ms] [--stock-url url] [--price-url url] [--api-key key]");
  console.log("Every flag can also be set through SENTINEL_* environment variables or a .env file.");
}

async function main(): Promise<number> {
  loadDotenv();
  const { command, flags } = parseArgs(process.argv.slice(2));
  if (!command || command === "help" || flags.help === true) {
    printHelp();
    return command ? EXIT_OK : EXIT_USAGE;
  }
  if (command !== "monitor" && command !== "throughput") {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return EXIT_USAGE;
  }

  const config = loadConfig(process.env, flags);
  const transport = createTransport(config.transport);
  const controller = new AbortController();
  const onSigint = () => {
    console.info("[sentinel] interrupt received, stopping after the current request");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const deps = { transport, telemetry: new ConsoleTelemetry() };
    return command === "monitor"
      ? await runMonitorCommand(config, deps, controller.signal)
      : await runThroughputCommand(config, deps, controller.signal);
  } finally {
    process.removeListener("SIGINT", onSigint);
    if (transport instanceof NodeHttpTransport) transport.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(`[sentinel] ${error.message}`);
      process.exitCode = EXIT_USAGE;
      return;
    }
    console.error("[sentinel] run error", error);
    process.exitCode = EXIT_FAILURE;
  });
