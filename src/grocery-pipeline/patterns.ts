/**
 * Regular expressions for the measurements packed into product info text.
 *
 * All patterns are case-insensitive searches; only the first match in the
 * text is used. Decimal numbers may use either "," or "." as separator.
 */

import type { ExtractedAttributes } from "./types.js";

export const PATTERNS = {
  /** "1,75 l", "500g", "12 stk"; the unit is required. */
  size: /(\d+(?:[.,]\d+)?)\s*(l|ml|g|kg|dl|cl|stk)/i,
  /** "3,9%" with an optional trailing "fett". */
  percentage: /(\d+(?:[.,]\d+)?)%(?:\s+fett)?/i,
  /** "4x125g", "6x1,5 l". */
  multipack: /(\d+)x(\d+(?:[.,]\d+)?)\s*(g|ml|l|kg|stk)/i,
  /** "6 pk", "2 stk", "3 pakning". */
  packQuantity: /(\d+)\s*(?:pk|stk|pakk|pakning)/i,
  /** "str. M", "størrelse L". */
  eggSize: /(?:str\.?|størrelse)\s*(xs|s|m|l|xl)/i,
  /** "12 stk", "6 egg". */
  eggQuantity: /(\d+)\s*(?:stk|egg)/i,
  /** "12 mnd", "6 måneder". */
  aging: /(\d+)\s*(?:mnd|måned)/i,
} as const;

function toNumber(raw: string): number {
  return parseFloat(raw.replace(",", "."));
}

export function extractSize(text: string): Pick<ExtractedAttributes, "size_quantity" | "size_unit"> {
  const match = PATTERNS.size.exec(text);
  if (!match) return {};
  return {
    size_quantity: toNumber(match[1]),
    size_unit: match[2].toLowerCase(),
  };
}

export function extractFatContent(text: string): number | undefined {
  const match = PATTERNS.percentage.exec(text);
  return match ? toNumber(match[1]) : undefined;
}

/**
 * Pack count, unit size and unit from "4x125g". Falls back to a bare pack
 * count ("6 pk") when there is no multipack notation.
 */
export function extractMultipack(
  text: string
): Pick<ExtractedAttributes, "pack_quantity" | "unit_size" | "unit_size_unit"> {
  const match = PATTERNS.multipack.exec(text);
  if (match) {
    return {
      pack_quantity: parseInt(match[1], 10),
      unit_size: toNumber(match[2]),
      unit_size_unit: match[3].toLowerCase(),
    };
  }

  const pack = PATTERNS.packQuantity.exec(text);
  if (pack) return { pack_quantity: parseInt(pack[1], 10) };
  return {};
}

export function extractEggSize(text: string): string | undefined {
  return PATTERNS.eggSize.exec(text)?.[1].toUpperCase();
}

export function extractEggQuantity(text: string): number | undefined {
  const match = PATTERNS.eggQuantity.exec(text);
  return match ? parseInt(match[1], 10) : undefined;
}

export function extractAging(text: string): string | undefined {
  const match = PATTERNS.aging.exec(text);
  return match ? `${match[1]} måneder` : undefined;
}
