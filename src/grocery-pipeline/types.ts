/**
 * Shared types for the grocery scraping pipeline.
 *
 * Covers raw products as they come off a store page, the attribute
 * vocabulary the extractor fills in, and the flat record handed to storage.
 */

/** Sites we know how to scrape. */
export const SITES = ["oda", "meny"] as const;
export type Site = (typeof SITES)[number];

/** Coarse product classification, in classifier priority order. */
export const SUBCATEGORIES = [
  "melk",
  "plantebasert",
  "ost",
  "smør",
  "egg",
  "fløte_rømme",
  "yoghurt",
  "kjølte_desserter",
  "cottage_cheese",
] as const;
export type Subcategory = (typeof SUBCATEGORIES)[number] | "other";

export const ATTRIBUTE_KEYS = [
  "size_quantity",
  "size_unit",
  "fat_content",
  "pack_quantity",
  "unit_size",
  "unit_size_unit",
  "egg_size",
  "egg_quantity",
  "egg_type",
  "cheese_type",
  "aging",
  "preparation",
  "lactose_free",
  "gluten_free",
  "organic",
  "vegan",
  "flavor",
  "product_type",
] as const;
export type AttributeKey = (typeof ATTRIBUTE_KEYS)[number];

export type AttributeValue = string | number | boolean;

/**
 * Attributes detected in a product's free text. A missing key means the
 * attribute was not detected; there are no null placeholders.
 */
export type ExtractedAttributes = Partial<Record<AttributeKey, AttributeValue>>;

/** A product as scraped from a store page. */
export interface RawProduct {
  id: string;
  name: string;
  /** Free-text description, e.g. "1% fett, 1,75 l, TINE". */
  info: string;
  price: number;
  priceText: string;
  unitPrice?: string;
  brand?: string;
  imageUrl?: string;
  category?: string;
  subcategory?: string;
  url?: string;
  attributes?: ExtractedAttributes;
  scrapedAt: Date;
  runId?: string;
}

/** A product after attribute extraction. */
export interface ProcessedProduct extends RawProduct {
  attributes: ExtractedAttributes;
}

/** Flat row as written to a storage sink. */
export interface ProductRecord {
  product_id: string;
  name: string;
  brand: string | null;
  info: string;
  price: number;
  price_text: string;
  unit_price: string | null;
  image_url: string | null;
  category: string | null;
  subcategory: string | null;
  url: string | null;
  attributes: ExtractedAttributes;
  scraped_at: string;
  run_id: string | null;
}

/** A category listing to scrape. */
export interface CategoryTarget {
  name: string;
  url: string;
}
