export type BrowserFamily = "chrome" | "firefox" | "safari" | "edge";

export type TransportProfile =
  | { kind: "plain" }
  | { kind: "browser"; id: string; family: BrowserFamily };

export type Identity = {
  readonly headerSet: Readonly<Record<string, string>>;
  readonly transportProfile: TransportProfile;
  readonly sessionToken: string;
  readonly generation: number;
  readonly archetype: string;
};

export type RequestKind = "stock" | "price";

export type RequestDescriptor = {
  kind: RequestKind;
  params: Record<string, string>;
};

export type TransportErrorKind = "timeout" | "connection_failed" | "dns_failure" | "other";

export type RawOutcome =
  | { kind: "response"; statusCode: number; body: Buffer; headers: Record<string, string> }
  | { kind: "transport_error"; error: TransportErrorKind; message?: string };

export type IndexedOutcome = {
  index: number;
  outcome: RawOutcome;
  elapsedMs: number;
};

export type TransientReason = "transport" | "schema_drift" | "suspect_block" | "server_error";
export type FatalReason = "gone" | "unexpected_status" | "schema_drift";

export type Classification =
  | { type: "success" }
  | { type: "rate_limited"; retryAfterSeconds?: number }
  | { type: "blocked" }
  | { type: "transient"; reason: TransientReason }
  | { type: "fatal"; reason: FatalReason };

export type ClassificationType = Classification["type"];

export const CLASSIFICATION_TYPES: readonly ClassificationType[] = [
  "success",
  "rate_limited",
  "blocked",
  "transient",
  "fatal"
];

export type ShapeCheck = (body: Buffer) => boolean;

export type ClassifyContext = {
  // same-status outcomes already seen under the identity that produced this one
  priorSameStatus: number;
};

export interface ResponseClassifier {
  classify(outcome: RawOutcome, shapeCheck: ShapeCheck, context?: ClassifyContext): Classification;
}

export type TransportRequest = {
  url: string;
  headers: Readonly<Record<string, string>>;
  profile: TransportProfile;
  timeoutMs: number;
};

export type TransportResponse = {
  statusCode: number;
  body: Buffer;
  headers: Record<string, string>;
};

export interface Transport {
  readonly name: string;
  send(request: TransportRequest): Promise<TransportResponse>;
}

export interface EndpointResolver {
  resolve(descriptor: RequestDescriptor, identity: Identity): string;
}

export type ControllerStateName = "probing" | "backoff" | "steady" | "done";

export type ControllerSnapshot = {
  state: ControllerStateName;
  concurrency: number;
  pacingMs: number;
  dispatched: number;
  generation: number;
};

export type MonitorStateName = "idle" | "checking" | "waiting" | "found" | "aborted";

export type ClassificationRecord = {
  source: RequestKind;
  classification: Classification;
  statusCode?: number;
  generation: number;
  at: number;
};

export type RotationReason = "window" | "forced";

export interface TelemetrySink {
  onClassification?(record: ClassificationRecord): void;
  onIdentityRotated?(identity: Identity, reason: RotationReason): void;
  onControllerState?(snapshot: ControllerSnapshot): void;
  onMonitorState?(state: MonitorStateName, ctx: { checks: number; failures: number; waitMs?: number }): void;
}
