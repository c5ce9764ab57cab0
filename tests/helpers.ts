import type { Identity, RawOutcome } from "../src/types";

export function tokenSequence(): () => string {
  let n = 0;
  return () => {
    n += 1;
    return `01${n.toString(16).toUpperCase().padStart(30, "0")}`;
  };
}

export function fixedIdentity(generation = 1): Identity {
  return {
    headerSet: { "user-agent": "Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0" },
    transportProfile: { kind: "browser", id: "firefox_125", family: "firefox" },
    sessionToken: `01${generation.toString(16).toUpperCase().padStart(30, "0")}`,
    generation,
    archetype: "test-firefox"
  };
}

export function response(statusCode: number, body = "", headers: Record<string, string> = {}): RawOutcome {
  return { kind: "response", statusCode, body: Buffer.from(body), headers };
}
