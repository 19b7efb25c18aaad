import { getDefaultRules, type ExtractionRules } from "./rules.js";
import type { Subcategory } from "./types.js";

/**
 * Classify a product by keyword. The first subcategory in rule order with a
 * keyword inside "<name> <info>" wins; "other" when nothing matches.
 */
export function classifySubcategory(
  name: string,
  info = "",
  table: ExtractionRules["subcategories"] = getDefaultRules().subcategories
): Subcategory {
  const text = `${name} ${info}`.toLowerCase();

  for (const { subcategory, keywords } of table) {
    if (keywords.some((keyword) => text.includes(keyword.toLowerCase()))) {
      return subcategory;
    }
  }
  return "other";
}
