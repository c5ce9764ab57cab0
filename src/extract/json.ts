import { ParseError } from "../errors";

export function parseJsonBody(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString("utf8"));
  } catch (error) {
    throw new ParseError(`Body is not JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}
