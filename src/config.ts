import { z } from "zod";
import { ConfigError } from "./errors";

const targetSchema = z.object({
  tcin: z.string().regex(/^\d+$/, "tcin must be numeric"),
  storeId: z.string().regex(/^\d+$/, "store id must be numeric"),
  zip: z.string().optional(),
  state: z.string().optional(),
  latitude: z.string().optional(),
  longitude: z.string().optional()
});

const endpointsSchema = z.object({
  stockUrl: z.string().url(),
  priceUrl: z.string().url(),
  apiKey: z.string().min(1)
});

const monitorSchema = z.object({
  intervalSeconds: z.number().positive().max(86400).default(60),
  maxAttempts: z.number().int().positive().optional(),
  rotateEvery: z.number().int().positive().default(20),
  trackPrice: z.boolean().default(true),
  timeoutMs: z.number().int().min(100).max(120000).default(10000),
  maxSchemaDrift: z.number().int().min(1).max(100).default(3)
});

const pacingSchema = z.object({
  initialMs: z.number().min(0).default(0),
  baseMs: z.number().positive().default(250),
  factor: z.number().min(1).default(2),
  maxMs: z.number().positive().default(10000)
});

const throughputSchema = z
  .object({
    kind: z.enum(["stock", "price"]).default("stock"),
    totalRequests: z.number().int().positive().default(50),
    initialConcurrency: z.number().int().positive().default(1),
    maxConcurrency: z.number().int().positive().default(16),
    growthFactor: z.number().gt(1).default(1.5),
    backoffFactor: z.number().gt(0).lt(1).default(0.5),
    transientTolerance: z.number().min(0).max(1).default(0.1),
    requestsPerSlot: z.number().int().positive().default(1),
    rotateEvery: z.number().int().positive().default(20),
    timeoutMs: z.number().int().min(100).max(120000).default(10000),
    cooldownMs: z.number().int().min(0).default(5000),
    revalidateEvery: z.number().int().positive().default(5),
    maxSchemaDrift: z.number().int().min(1).max(100).default(3),
    pacing: pacingSchema.default({})
  })
  .refine((value) => value.initialConcurrency <= value.maxConcurrency, {
    message: "initialConcurrency must not exceed maxConcurrency",
    path: ["initialConcurrency"]
  });

const sentinelSchema = z.object({
  transport: z.enum(["fetch", "node"]).default("node"),
  target: targetSchema,
  endpoints: endpointsSchema,
  monitor: monitorSchema.default({}),
  throughput: throughputSchema.default({})
});

export type SentinelConfig = z.infer<typeof sentinelSchema>;
export type SentinelConfigInput = z.input<typeof sentinelSchema>;

export function parseConfig(input: unknown): SentinelConfig {
  const parsed = sentinelSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration (${details.join("; ")})`);
  }
  return parsed.data;
}

type Env = Record<string, string | undefined>;
type Flags = Record<string, string | boolean>;

function numberOf(value: string | boolean | undefined, name: string): number | undefined {
  if (value === undefined || value === "") return undefined;
  if (typeof value === "boolean") {
    throw new ConfigError(`${name} needs a value`);
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

function stringOf(value: string | boolean | undefined): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function pick(flags: Flags, env: Env, flag: string, variable: string): string | boolean | undefined {
  return flags[flag] ?? env[variable];
}

function compact(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));
}

/**
 * Builds the configuration from SENTINEL_* environment variables and CLI
 * flags. Flags take precedence.
 */
export function loadConfig(env: Env, flags: Flags = {}): SentinelConfig {
  const noPrice = flags["no-price"] === true || env.SENTINEL_TRACK_PRICE === "false";
  const num = (flag: string, variable: string) => numberOf(pick(flags, env, flag, variable), `--${flag}`);
  const str = (flag: string, variable: string) => stringOf(pick(flags, env, flag, variable));

  return parseConfig({
    transport: str("transport", "SENTINEL_TRANSPORT"),
    target: compact({
      tcin: str("tcin", "SENTINEL_TCIN"),
      storeId: str("store", "SENTINEL_STORE_ID"),
      zip: str("zip", "SENTINEL_ZIP"),
      state: str("state", "SENTINEL_STATE"),
      latitude: str("latitude", "SENTINEL_LATITUDE"),
      longitude: str("longitude", "SENTINEL_LONGITUDE")
    }),
    endpoints: compact({
      stockUrl: str("stock-url", "SENTINEL_STOCK_URL"),
      priceUrl: str("price-url", "SENTINEL_PRICE_URL"),
      apiKey: str("api-key", "SENTINEL_API_KEY")
    }),
    monitor: compact({
      intervalSeconds: num("interval", "SENTINEL_INTERVAL_SECONDS"),
      maxAttempts: num("max-attempts", "SENTINEL_MAX_ATTEMPTS"),
      rotateEvery: num("rotate-every", "SENTINEL_ROTATE_EVERY"),
      trackPrice: noPrice ? false : undefined,
      timeoutMs: num("timeout-ms", "SENTINEL_TIMEOUT_MS")
    }),
    throughput: compact({
      kind: str("kind", "SENTINEL_THROUGHPUT_KIND"),
      totalRequests: num("requests", "SENTINEL_THROUGHPUT_REQUESTS"),
      initialConcurrency: num("concurrency", "SENTINEL_THROUGHPUT_CONCURRENCY"),
      maxConcurrency: num("max-concurrency", "SENTINEL_THROUGHPUT_MAX_CONCURRENCY"),
      rotateEvery: num("rotate-every", "SENTINEL_ROTATE_EVERY"),
      timeoutMs: num("timeout-ms", "SENTINEL_TIMEOUT_MS"),
      cooldownMs: num("cooldown-ms", "SENTINEL_THROUGHPUT_COOLDOWN_MS")
    })
  });
}
