import type { TransportErrorKind } from "./types";

export class TransportError extends Error {
  constructor(readonly kind: TransportErrorKind, message = `Transport failure: ${kind}`) {
    super(message);
    this.name = "TransportError";
  }
}

export class ParseError extends Error {
  constructor(message = "Response body does not match the expected shape") {
    super(message);
    this.name = "ParseError";
  }
}

export class ConfigError extends Error {
  constructor(message = "Invalid configuration") {
    super(message);
    this.name = "ConfigError";
  }
}
