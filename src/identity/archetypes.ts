import { z } from "zod";
import catalogJson from "./archetypes.json";
import { ConfigError } from "../errors";
import type { BrowserFamily } from "../types";

const familySchema = z.enum(["chrome", "firefox", "safari", "edge"]);

const archetypeSchema = z
  .object({
    name: z.string().min(1),
    family: familySchema,
    transportProfile: z.string().min(1),
    headers: z.record(z.string())
  })
  .superRefine((entry, ctx) => {
    const userAgent = entry.headers["user-agent"];
    if (!userAgent) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "user-agent header is required", path: ["headers"] });
      return;
    }
    const declared = familyOfUserAgent(userAgent);
    if (declared !== entry.family) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `user-agent declares ${declared ?? "an unknown family"}, archetype is ${entry.family}`,
        path: ["headers", "user-agent"]
      });
    }
    if (!entry.transportProfile.startsWith(`${entry.family}_`)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `transport profile ${entry.transportProfile} does not belong to ${entry.family}`,
        path: ["transportProfile"]
      });
    }
  });

const catalogSchema = z.array(archetypeSchema).min(1);

export type Archetype = z.infer<typeof archetypeSchema>;

// Order matters: Edge advertises Chrome, Chrome advertises Safari.
export function familyOfUserAgent(userAgent: string): BrowserFamily | undefined {
  if (userAgent.includes("Edg/")) return "edge";
  if (userAgent.includes("Firefox/")) return "firefox";
  if (userAgent.includes("Chrome/")) return "chrome";
  if (userAgent.includes("Safari/") && userAgent.includes("Version/")) return "safari";
  return undefined;
}

export function loadCatalog(raw: unknown): readonly Archetype[] {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    throw new ConfigError(`Invalid archetype catalog at ${where}: ${issue?.message ?? "unknown issue"}`);
  }
  const names = new Set<string>();
  for (const entry of parsed.data) {
    if (names.has(entry.name)) {
      throw new ConfigError(`Duplicate archetype ${entry.name}`);
    }
    names.add(entry.name);
  }
  return Object.freeze(parsed.data.map((entry) => Object.freeze({ ...entry, headers: Object.freeze({ ...entry.headers }) })));
}

export const DEFAULT_CATALOG: readonly Archetype[] = loadCatalog(catalogJson);
