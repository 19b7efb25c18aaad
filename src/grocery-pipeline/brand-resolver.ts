/**
 * Brand resolution from product info and name.
 *
 * Order: a brand the caller already knows, then the brand dictionary, then
 * an all-caps comma segment of the info, then a short trailing segment.
 */

import { getDefaultRules, type BrandRule } from "./rules.js";

/** True when the text has letters and none of them are lower case. */
function isUpperCaseToken(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

function matchBrandDictionary(text: string, brands: readonly BrandRule[]): string | undefined {
  const haystack = text.toLowerCase();
  return brands.find(({ key }) => haystack.includes(key.toLowerCase()))?.brand;
}

export function resolveBrand(
  info: string,
  name = "",
  knownBrand?: string,
  brands: readonly BrandRule[] = getDefaultRules().brands
): string | undefined {
  if (knownBrand) return knownBrand;

  const fromDictionary = matchBrandDictionary(`${info} ${name}`, brands);
  if (fromDictionary) return fromDictionary;

  for (const part of info.split(",")) {
    const token = part.trim();
    if (token.length > 1 && isUpperCaseToken(token)) return token;
  }

  if (info.includes(",")) {
    const lastPart = info.slice(info.lastIndexOf(",") + 1).trim();
    if (lastPart && lastPart.length < 20) return lastPart;
  }

  return undefined;
}
