import { z } from "zod";
import { loadYamlFile } from "../utils/config.js";

const PatternSchema = z.string().refine((p) => {
  try {
    new RegExp(p);
    return true;
  } catch {
    return false;
  }
}, "Invalid regular expression");

const CapabilitySchema = z.object({
  name: z.string().regex(/^[a-z][a-z0-9-]*$/),
  description: z.string(),
  icon: z.string().default(""),
  /** Read-only capabilities gain from analysis verbs, mutating ones from action verbs. */
  orientation: z.enum(["read_only", "mutating"]),
  /** A score for this capability suppresses the verb boost. */
  verb_neutral: z.boolean().default(false),
  prefixes: z.array(z.string().startsWith("@")).default([]),
  weight: z.number().positive().default(1),
  patterns: z.array(PatternSchema).default([]),
  functions: z.array(z.string()).default([]),
  system_prompt: z.string(),
  examples: z.array(z.string()).default([]),
});

export const CapabilityCatalogSchema = z
  .object({
    default_capability: z.string(),
    verbs: z.object({
      action: z.array(z.string()),
      analysis: z.array(z.string()),
    }),
    capabilities: z.array(CapabilitySchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    const names = catalog.capabilities.map((c) => c.name);
    if (new Set(names).size !== names.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Duplicate capability names" });
    }
    const defaultCap = catalog.capabilities.find((c) => c.name === catalog.default_capability);
    if (!defaultCap) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Default capability "${catalog.default_capability}" is not defined`,
      });
    } else if (defaultCap.orientation !== "read_only") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Default capability must be read-only",
      });
    }
  });

export type CapabilityDefinition = Readonly<z.infer<typeof CapabilitySchema>>;
export type CapabilityCatalog = Readonly<z.infer<typeof CapabilityCatalogSchema>>;

export interface VerbSets {
  action: ReadonlySet<string>;
  analysis: ReadonlySet<string>;
}

/** Immutable capability set loaded once at startup. */
export class CapabilityStore {
  private byName: Map<string, CapabilityDefinition>;
  readonly verbs: VerbSets;

  constructor(readonly catalog: CapabilityCatalog) {
    this.byName = new Map(catalog.capabilities.map((c) => [c.name, Object.freeze(c)]));
    this.verbs = {
      action: new Set(catalog.verbs.action.map((v) => v.toLowerCase())),
      analysis: new Set(catalog.verbs.analysis.map((v) => v.toLowerCase())),
    };
  }

  static fromFile(path: string): CapabilityStore {
    return new CapabilityStore(loadYamlFile(path, CapabilityCatalogSchema));
  }

  static fromData(data: unknown): CapabilityStore {
    return new CapabilityStore(CapabilityCatalogSchema.parse(data));
  }

  get(name: string): CapabilityDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  list(): CapabilityDefinition[] {
    return Array.from(this.byName.values());
  }

  get defaultCapability(): CapabilityDefinition {
    const cap = this.byName.get(this.catalog.default_capability);
    if (!cap) {
      throw new Error(`Default capability "${this.catalog.default_capability}" missing`);
    }
    return cap;
  }

  /** Check every capability only names functions the registry knows. */
  assertFunctionsKnown(isKnown: (name: string) => boolean): void {
    for (const cap of this.byName.values()) {
      const unknown = cap.functions.filter((f) => !isKnown(f));
      if (unknown.length > 0) {
        throw new Error(`Capability "${cap.name}" names unknown functions: ${unknown.join(", ")}`);
      }
    }
  }
}

export interface VerbType {
  hasAction: boolean;
  hasAnalysis: boolean;
}

/** Verb detection over the whitespace-split, lower-cased word set. */
export function detectVerbType(message: string, verbs: VerbSets): VerbType {
  const words = new Set(message.toLowerCase().split(/\s+/).filter(Boolean));
  let hasAction = false;
  let hasAnalysis = false;
  for (const word of words) {
    if (verbs.action.has(word)) hasAction = true;
    if (verbs.analysis.has(word)) hasAnalysis = true;
  }
  return { hasAction, hasAnalysis };
}
