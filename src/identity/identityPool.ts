import { randomBytes } from "crypto";
import type { Identity } from "../types";
import { DEFAULT_CATALOG, type Archetype } from "./archetypes";

export const SESSION_TOKEN_PATTERN = /^01[0-9A-F]{30}$/;

export type IdentityPoolOptions = {
  catalog?: readonly Archetype[];
  random?: () => number;
  tokenSource?: () => string;
};

function defaultToken(): string {
  return `01${randomBytes(15).toString("hex").toUpperCase()}`;
}

export class IdentityPool {
  private counter = 0;
  private generation = 0;
  private current?: Identity;
  private readonly catalog: readonly Archetype[];
  private readonly random: () => number;
  private readonly tokenSource: () => string;

  constructor(options: IdentityPoolOptions = {}) {
    this.catalog = options.catalog ?? DEFAULT_CATALOG;
    if (this.catalog.length === 0) {
      throw new RangeError("IdentityPool needs at least one archetype");
    }
    this.random = options.random ?? Math.random;
    this.tokenSource = options.tokenSource ?? defaultToken;
  }

  /**
   * Returns the identity for the next `count` dispatched requests. A new
   * identity is minted when one of the reserved counter slots opens a
   * `rotateEvery` window; otherwise the cached one is returned.
   */
  nextIdentity(rotateEvery: number, count = 1): Identity {
    if (!Number.isInteger(rotateEvery) || rotateEvery <= 0) {
      throw new RangeError(`rotateEvery must be a positive integer, got ${rotateEvery}`);
    }
    if (!Number.isInteger(count) || count <= 0) {
      throw new RangeError(`count must be a positive integer, got ${count}`);
    }
    const first = this.counter;
    this.counter += count;
    const crossesWindow = first % rotateEvery === 0 || Math.floor((this.counter - 1) / rotateEvery) > Math.floor(first / rotateEvery);
    if (crossesWindow || this.current === undefined) {
      this.current = this.mint();
    }
    return this.current;
  }

  forceRotate(): Identity {
    this.current = this.mint();
    return this.current;
  }

  peek(): Identity | undefined {
    return this.current;
  }

  getState(): { counter: number; generation: number } {
    return { counter: this.counter, generation: this.generation };
  }

  private mint(): Identity {
    const index = Math.min(this.catalog.length - 1, Math.floor(this.random() * this.catalog.length));
    const archetype = this.catalog[index];
    const sessionToken = this.tokenSource();
    if (!SESSION_TOKEN_PATTERN.test(sessionToken)) {
      throw new RangeError(`Session token ${sessionToken} does not match the expected format`);
    }
    this.generation += 1;
    return Object.freeze({
      headerSet: Object.freeze({ ...archetype.headers }),
      transportProfile: Object.freeze({
        kind: "browser" as const,
        id: archetype.transportProfile,
        family: archetype.family
      }),
      sessionToken,
      generation: this.generation,
      archetype: archetype.name
    });
  }
}
