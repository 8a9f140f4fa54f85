/**
 * trait-builder.ts: Trait types and the validation that every trait passes,
 * whether it comes from a definition file or from the create wizard.
 */

import { z } from "zod";
import { TraitValidationError } from "../errors.js";

// ── Types ───────────────────────────────────────────────────────────────────

export const TRAIT_CATEGORIES = [
  "base",
  "communication-style",
  "domain-expertise",
  "behavior-pattern",
  "response-modifier",
] as const;
export type TraitCategory = (typeof TRAIT_CATEGORIES)[number];

export const OVERRIDE_RULES = ["append", "prepend", "replace"] as const;
export type OverrideRule = (typeof OVERRIDE_RULES)[number];

/** Lower applies earlier. */
export const CATEGORY_PRIORITY: Record<TraitCategory, number> = {
  base: 0,
  "communication-style": 10,
  "domain-expertise": 20,
  "behavior-pattern": 50,
  "response-modifier": 100,
};

export const TRAIT_ID_PATTERN = /^[a-z][a-z0-9-]*$/;
export const MIN_BODY_LENGTH = 50;
export const MAX_BODY_LENGTH = 2000;

export interface Trait {
  readonly id: string;
  readonly name: string;
  readonly category: TraitCategory;
  readonly priority: number;
  readonly override: OverrideRule;
  readonly body: string;
  readonly tags: readonly string[];
  readonly description: string;
  readonly author: string;
  readonly version: string;
  /** Definition file the trait was loaded from, when there is one. */
  readonly source?: string;
}

export type TraitBuildResult =
  | { ok: true; trait: Trait }
  | { ok: false; error: TraitValidationError };

// ── Schema ──────────────────────────────────────────────────────────────────

function toStringList(value: unknown): unknown {
  if (typeof value === "string") {
    return value
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
  }
  return value;
}

function toText(value: unknown): unknown {
  return typeof value === "number" ? String(value) : value;
}

const traitSchema = z.object({
  id: z
    .string({ required_error: "is required" })
    .regex(
      TRAIT_ID_PATTERN,
      "must start with a lowercase letter and use only a-z, 0-9 and '-'",
    ),
  name: z.string({ required_error: "is required" }).trim().min(1, "is required"),
  category: z.enum(TRAIT_CATEGORIES, {
    errorMap: () => ({
      message: `must be one of ${TRAIT_CATEGORIES.join(", ")}`,
    }),
  }),
  priority: z.number().int("must be an integer").optional(),
  override: z
    .enum(OVERRIDE_RULES, {
      errorMap: () => ({
        message: `must be one of ${OVERRIDE_RULES.join(", ")}`,
      }),
    })
    .default("append"),
  body: z
    .string({ required_error: "is required" })
    .trim()
    .min(MIN_BODY_LENGTH, `must be at least ${MIN_BODY_LENGTH} characters`)
    .max(MAX_BODY_LENGTH, `must be at most ${MAX_BODY_LENGTH} characters`),
  tags: z.preprocess(toStringList, z.array(z.string())).default([]),
  description: z.preprocess(toText, z.string()).default(""),
  author: z.preprocess(toText, z.string()).default(""),
  version: z.preprocess(toText, z.string()).default("1.0.0"),
  source: z.string().optional(),
});

/**
 * Build a validated, immutable trait from loose fields.
 *
 * `priority` falls back to the category default; tags are lower-cased and
 * de-duplicated.
 */
export function buildTrait(fields: Record<string, unknown>): TraitBuildResult {
  const result = traitSchema.safeParse(fields);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? String(issue.path[0]) : "trait";
    return { ok: false, error: new TraitValidationError(field, issue.message) };
  }

  const data = result.data;
  const tags = [...new Set(data.tags.map((t) => t.trim().toLowerCase()))].filter(
    Boolean,
  );

  const trait: Trait = {
    id: data.id,
    name: data.name,
    category: data.category,
    priority: data.priority ?? CATEGORY_PRIORITY[data.category],
    override: data.override,
    body: data.body,
    tags,
    description: data.description.trim(),
    author: data.author.trim(),
    version: data.version.trim() || "1.0.0",
    ...(data.source ? { source: data.source } : {}),
  };

  return { ok: true, trait: Object.freeze(trait) };
}

export function isTraitCategory(value: string): value is TraitCategory {
  return TRAIT_CATEGORIES.some((c) => c === value);
}
