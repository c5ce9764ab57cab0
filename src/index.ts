export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./descriptors";
export { IdentityPool, SESSION_TOKEN_PATTERN } from "./identity/identityPool";
export type { IdentityPoolOptions } from "./identity/identityPool";
export { DEFAULT_CATALOG, loadCatalog, familyOfUserAgent } from "./identity/archetypes";
export type { Archetype } from "./identity/archetypes";
export { RequestDispatcher } from "./dispatcher/requestDispatcher";
export type { BatchOptions } from "./dispatcher/requestDispatcher";
export { BasicResponseClassifier, BLOCK_REPEAT_THRESHOLD, headerValue } from "./signals/responseClassifier";
export { RepeatTracker } from "./signals/repeatTracker";
export * from "./policy/outcomePolicy";
export * from "./limiters/concurrencyLimiter";
export * from "./limiters/pacer";
export * from "./throughput/batchMetrics";
export * from "./throughput/throughputController";
export * from "./monitor/monitorLoop";
export * from "./extract/stock";
export * from "./extract/price";
export { RetailEndpoints } from "./transport/endpoints";
export type { EndpointConfig } from "./transport/endpoints";
export { FetchTransport } from "./transport/fetchTransport";
export { NodeHttpTransport } from "./transport/nodeHttpTransport";
export * from "./telemetry/telemetry";
export * from "./telemetry/consoleTelemetry";
export * from "./telemetry/inMemoryTelemetry";
export * from "./telemetry/metricsTelemetry";
export { systemClock, sleep } from "./utils/time";
export type { Clock } from "./utils/time";
