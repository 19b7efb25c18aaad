/**
 * Keyword rule tables for attribute extraction.
 *
 * The tables live in rules/extraction-rules.json at the repository root and
 * are validated once on first use. Every list is ordered: where a text can
 * match several entries, the earlier entry wins.
 */

import { readFileSync } from "node:fs";
import { z, ZodError } from "zod";
import { SUBCATEGORIES } from "./types.js";

const DEFAULT_RULES_URL = new URL("../../rules/extraction-rules.json", import.meta.url);

/** Keywords are compared against lower-cased text. */
const keyword = z
  .string()
  .min(1)
  .transform((s) => s.toLowerCase());
const keywordList = z.array(keyword).min(1);

const rulesSchema = z.object({
  brands: z.array(z.object({ key: z.string().min(1), brand: z.string().min(1) })).min(1),
  subcategories: z
    .array(z.object({ subcategory: z.enum(SUBCATEGORIES), keywords: keywordList }))
    .min(1),
  eggTypes: z.array(z.object({ keyword, label: z.string().min(1) })),
  cheesePreparations: z.array(z.object({ label: z.string().min(1), keywords: keywordList })),
  cheeseTypes: keywordList,
  dietary: z.object({
    lactose_free: keywordList,
    gluten_free: keywordList,
    organic: keywordList,
    vegan: keywordList,
  }),
  flavors: keywordList,
  productTypes: z.array(z.object({ label: z.string().min(1), keywords: keywordList })),
});

export type ExtractionRules = z.output<typeof rulesSchema>;
export type BrandRule = ExtractionRules["brands"][number];

/** Raised when the rule tables cannot be read or fail validation. */
export class RuleTableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RuleTableError";
  }
}

/**
 * Brand keys are matched as substrings in list order, so a key placed after
 * a shorter key it contains ("q-meieriene" after "q") could never match.
 */
function findShadowedBrandKey(brands: BrandRule[]): string | null {
  for (let j = 1; j < brands.length; j++) {
    const later = brands[j].key.toLowerCase();
    for (let i = 0; i < j; i++) {
      const earlier = brands[i].key.toLowerCase();
      if (later.includes(earlier)) {
        return `brand key '${brands[j].key}' (position ${j}) is shadowed by '${brands[i].key}' (position ${i})`;
      }
    }
  }
  return null;
}

/**
 * Validate raw rule data and return a frozen copy.
 */
export function parseRules(data: unknown): ExtractionRules {
  let rules: ExtractionRules;
  try {
    rules = rulesSchema.parse(data);
  } catch (err: unknown) {
    if (err instanceof ZodError) {
      const details = err.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
      throw new RuleTableError(`Invalid extraction rules: ${details}`, { cause: err });
    }
    throw err;
  }

  const shadowed = findShadowedBrandKey(rules.brands);
  if (shadowed) {
    throw new RuleTableError(`Invalid extraction rules: ${shadowed}`);
  }

  return deepFreeze(rules);
}

/**
 * Read and validate a rule file.
 */
export function loadRules(path: string | URL = DEFAULT_RULES_URL): ExtractionRules {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err: unknown) {
    throw new RuleTableError(`Cannot read extraction rules from ${String(path)}`, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err: unknown) {
    throw new RuleTableError(`Extraction rules at ${String(path)} are not valid JSON`, { cause: err });
  }

  return parseRules(data);
}

let defaultRules: ExtractionRules | undefined;

/** The bundled rule tables, loaded on first call. */
export function getDefaultRules(): ExtractionRules {
  defaultRules ??= loadRules();
  return defaultRules;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}
