/**
 * Grocery pipeline barrel export.
 */

export type {
  AttributeKey,
  AttributeValue,
  CategoryTarget,
  ExtractedAttributes,
  ProcessedProduct,
  ProductRecord,
  RawProduct,
  Site,
  Subcategory,
} from "./types.js";
export { ATTRIBUTE_KEYS, SITES, SUBCATEGORIES } from "./types.js";
export { cleanText, parsePrice, parseUnitPrice, generateProductId } from "./text.js";
export { getDefaultRules, loadRules, parseRules, RuleTableError, type ExtractionRules } from "./rules.js";
export { resolveBrand } from "./brand-resolver.js";
export { classifySubcategory } from "./subcategory.js";
export {
  buildStages,
  createAttributeExtractor,
  extractAttributes,
  isProcessedProduct,
  SITE_PROFILES,
  type AttributeExtractor,
  type ExtractionStage,
  type SiteProfile,
} from "./attribute-extractor.js";
export { processAll } from "./batch-processor.js";
export { toProductRecord } from "./record.js";
export { generateRunId, formatRunId } from "./run-id.js";
export { HttpFetcher, ScrapeError, type HtmlFetcher } from "./http.js";
export { createScraper, type ProductScraper } from "./scraper.js";
export { OdaScraper, parseOdaProductPage, parseOdaProductUrls } from "./oda-scraper.js";
export { MenyScraper, extractMenyProductCards, parseMenyProductCard } from "./meny-scraper.js";
export { createStorage, CsvStorage, SupabaseStorage, StorageError, type ProductStorage } from "./storage/index.js";
export { runScrape, type CategoryResult, type ScrapeRunOptions } from "./pipeline.js";
