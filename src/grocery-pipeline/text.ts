/**
 * Text helpers shared by the scrapers and the attribute extractor.
 */

/**
 * Normalize free text before pattern matching: collapse whitespace, turn
 * semicolons into commas and drop quote characters.
 */
export function cleanText(text: unknown): string {
  if (typeof text !== "string" || !text) return "";

  return text
    .replace(/\s+/g, " ")
    .trim()
    .replaceAll(";", ",")
    .replace(/["']/g, "");
}

/**
 * Parse a price label such as "kr 35,30" into a number.
 * Returns 0 when the label holds no price (e.g. a header was scraped instead).
 */
export function parsePrice(priceText: string): number {
  if (priceText.includes("Hopp til hovedinnhold")) return 0;

  const match = /(?:kr|kr\s+)?(\d+[,.]\d+|\d+)/.exec(priceText);
  if (!match) return 0;

  const value = parseFloat(match[1].replace(",", "."));
  return isNaN(value) ? 0 : value;
}

export interface UnitPrice {
  price: number;
  unit: string;
}

/**
 * Parse a unit price label such as "kr 20,17 /l".
 */
export function parseUnitPrice(unitPriceText: string | undefined): UnitPrice | undefined {
  if (!unitPriceText) return undefined;

  const cleaned = unitPriceText.replaceAll("kr", "").replaceAll("&nbsp;", " ").trim();
  const match = /(\d+[,.]?\d*)\s*\/\s*(\w+)/.exec(cleaned);
  if (!match) return undefined;

  const price = parseFloat(match[1].replace(",", "."));
  if (isNaN(price)) return undefined;
  return { price, unit: match[2] };
}

/**
 * Stable id derived from name and info, for pages that expose no product id.
 */
export function generateProductId(name: string, info: string): string {
  return `${name}_${info}`.replace(/[^\w]/g, "").toLowerCase().slice(0, 32);
}
