/**
 * Attribute extraction for a single product.
 *
 * Extraction is a sequence of stages, each a pure function from the cleaned
 * product text to a partial attribute map over the keys it owns. Every site
 * runs the measurement and egg stages; the cheese, dietary and feature stages
 * are switched on per site profile.
 */

import { resolveBrand } from "./brand-resolver.js";
import {
  extractAging,
  extractEggQuantity,
  extractEggSize,
  extractFatContent,
  extractMultipack,
  extractSize,
} from "./patterns.js";
import { getDefaultRules, type ExtractionRules } from "./rules.js";
import { classifySubcategory } from "./subcategory.js";
import { cleanText } from "./text.js";
import type { AttributeKey, ExtractedAttributes, ProcessedProduct, RawProduct, Site } from "./types.js";

/** Cleaned inputs seen by every stage. */
export interface StageContext {
  name: string;
  info: string;
  subcategory: string;
  rules: ExtractionRules;
}

export interface ExtractionStage {
  /** Keys this stage sets; earlier values for them are dropped before it runs. */
  readonly keys: readonly AttributeKey[];
  run(ctx: StageContext): ExtractedAttributes;
}

/** Which optional stages a site runs. */
export interface SiteProfile {
  site: Site;
  cheese: boolean;
  dietary: boolean;
  features: boolean;
}

export const SITE_PROFILES: Readonly<Record<Site, SiteProfile>> = {
  oda: { site: "oda", cheese: true, dietary: true, features: true },
  meny: { site: "meny", cheese: false, dietary: false, features: false },
};

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

export const sizeStage: ExtractionStage = {
  keys: ["size_quantity", "size_unit"],
  run: ({ info }) => extractSize(info),
};

export const fatContentStage: ExtractionStage = {
  keys: ["fat_content"],
  run: ({ info }) => {
    const fat = extractFatContent(info);
    return fat === undefined ? {} : { fat_content: fat };
  },
};

export const multipackStage: ExtractionStage = {
  keys: ["pack_quantity", "unit_size", "unit_size_unit"],
  run: ({ info }) => extractMultipack(info),
};

function eggAttributes({ info, subcategory, rules }: StageContext): ExtractedAttributes {
  if (subcategory !== "egg") return {};

  const result: ExtractedAttributes = {};
  const size = extractEggSize(info);
  if (size) result.egg_size = size;

  const quantity = extractEggQuantity(info);
  if (quantity !== undefined) result.egg_quantity = quantity;

  const lower = info.toLowerCase();
  const eggType = rules.eggTypes.find(({ keyword }) => lower.includes(keyword));
  if (eggType) result.egg_type = eggType.label;

  return result;
}

export const eggStage: ExtractionStage = {
  keys: ["egg_size", "egg_quantity", "egg_type"],
  run: eggAttributes,
};

function cheeseAttributes({ info, subcategory, rules }: StageContext): ExtractedAttributes {
  if (subcategory !== "ost") return {};

  const result: ExtractedAttributes = {};
  const lower = info.toLowerCase();

  const preparation = rules.cheesePreparations.find(({ keywords }) =>
    keywords.some((kw) => lower.includes(kw))
  );
  if (preparation) result.preparation = preparation.label;

  const aging = extractAging(info);
  if (aging) result.aging = aging;

  const cheeseType = rules.cheeseTypes.find((type) => lower.includes(type));
  if (cheeseType) result.cheese_type = capitalize(cheeseType);

  return result;
}

export const cheeseStage: ExtractionStage = {
  keys: ["preparation", "aging", "cheese_type"],
  run: cheeseAttributes,
};

/** The four flags are independent and always reported once this stage runs. */
export const dietaryStage: ExtractionStage = {
  keys: ["lactose_free", "gluten_free", "organic", "vegan"],
  run: ({ info, rules }) => {
    const lower = info.toLowerCase();
    const has = (keywords: readonly string[]) => keywords.some((kw) => lower.includes(kw));

    return {
      lactose_free: has(rules.dietary.lactose_free),
      gluten_free: has(rules.dietary.gluten_free),
      organic: has(rules.dietary.organic),
      vegan: has(rules.dietary.vegan),
    };
  },
};

function featureAttributes({ name, info, rules }: StageContext): ExtractedAttributes {
  const result: ExtractedAttributes = {};
  const combined = `${name} ${info}`.toLowerCase();

  const flavor = rules.flavors.find((f) => combined.includes(f));
  if (flavor) result.flavor = capitalize(flavor);

  const productType = rules.productTypes.find(({ keywords }) =>
    keywords.some((kw) => combined.includes(kw))
  );
  if (productType) result.product_type = capitalize(productType.label);

  return result;
}

export const featuresStage: ExtractionStage = {
  keys: ["flavor", "product_type"],
  run: featureAttributes,
};

export function isProcessedProduct(product: RawProduct): product is ProcessedProduct {
  return product.attributes !== undefined;
}

/** Stages for a profile, in the order they run. */
export function buildStages(profile: SiteProfile): ExtractionStage[] {
  const stages: ExtractionStage[] = [sizeStage, fatContentStage, multipackStage, eggStage];
  if (profile.cheese) stages.push(cheeseStage);
  if (profile.dietary) stages.push(dietaryStage);
  if (profile.features) stages.push(featuresStage);
  return stages;
}

export interface AttributeExtractor {
  readonly profile: SiteProfile;
  /**
   * Returns a new product with brand, subcategory and attributes filled in.
   * A product without info text is returned as is.
   */
  extract(product: RawProduct): RawProduct | ProcessedProduct;
}

export function createAttributeExtractor(
  profile: SiteProfile = SITE_PROFILES.oda,
  rules: ExtractionRules = getDefaultRules()
): AttributeExtractor {
  const stages = buildStages(profile);

  return {
    profile,
    extract(product: RawProduct): RawProduct | ProcessedProduct {
      if (!product.info) return product;

      const name = cleanText(product.name);
      const info = cleanText(product.info);

      const brand = resolveBrand(info, name, product.brand, rules.brands);
      const subcategory = product.subcategory || classifySubcategory(name, info, rules.subcategories);

      const ctx: StageContext = { name, info, subcategory, rules };
      const attributes: ExtractedAttributes = { ...product.attributes };
      for (const stage of stages) {
        for (const key of stage.keys) delete attributes[key];
        Object.assign(attributes, stage.run(ctx));
      }

      const processed: ProcessedProduct = { ...product, subcategory, attributes };
      if (brand !== undefined) processed.brand = brand;
      return processed;
    },
  };
}

/**
 * One-off extraction with the bundled rules.
 */
export function extractAttributes(
  product: RawProduct,
  profile: SiteProfile = SITE_PROFILES.oda
): RawProduct | ProcessedProduct {
  return createAttributeExtractor(profile).extract(product);
}
