/**
 * Scrape run orchestration.
 *
 * For each category: scrape the listing, stamp run and category, extract
 * attributes, then hand the batch to storage. A failing category is logged
 * and reported; the remaining categories still run.
 */

import { createLogger, describeError } from "../log.js";
import { runWithRunContext } from "../run-context.js";
import { createAttributeExtractor, SITE_PROFILES, type AttributeExtractor } from "./attribute-extractor.js";
import { processAll } from "./batch-processor.js";
import type { ProductScraper } from "./scraper.js";
import type { ProductStorage } from "./storage/types.js";
import type { CategoryTarget } from "./types.js";

const log = createLogger("pipeline");

export type CategoryStatus = "success" | "empty" | "failed";

export interface CategoryResult {
  category: string;
  scraped: number;
  saved: number;
  status: CategoryStatus;
  error?: string;
}

export interface ScrapeRunOptions {
  scraper: ProductScraper;
  storage: ProductStorage;
  categories: readonly CategoryTarget[];
  runId: string;
  /** Defaults to an extractor with the scraper's site profile. */
  extractor?: AttributeExtractor;
  maxProducts?: number;
  replaceExisting?: boolean;
}

async function scrapeCategory(
  options: ScrapeRunOptions,
  extractor: AttributeExtractor,
  category: CategoryTarget
): Promise<CategoryResult> {
  const categoryRunId = `${options.runId}_${category.name}`;
  let scraped = 0;

  try {
    const products = await options.scraper.getProducts(category, options.maxProducts);
    scraped = products.length;
    if (scraped === 0) {
      log.warn(`No products found in ${category.name}`);
      return { category: category.name, scraped, saved: 0, status: "empty" };
    }

    const stamped = products.map((product) => ({
      ...product,
      category: product.category ?? category.name,
      runId: categoryRunId,
    }));
    const processed = processAll(stamped, extractor);
    const saved = await options.storage.saveProducts(processed, { replaceExisting: options.replaceExisting });

    log.info(`Category ${category.name}: scraped ${scraped}, saved ${saved}`);
    return { category: category.name, scraped, saved, status: "success" };
  } catch (err: unknown) {
    const message = describeError(err);
    log.error(`Category ${category.name} failed: ${message}`);
    return { category: category.name, scraped, saved: 0, status: "failed", error: message };
  }
}

/** Scrape, process and store every category in order. */
export async function runScrape(options: ScrapeRunOptions): Promise<CategoryResult[]> {
  const extractor = options.extractor ?? createAttributeExtractor(SITE_PROFILES[options.scraper.site]);
  const results: CategoryResult[] = [];

  for (const category of options.categories) {
    const result = await runWithRunContext({ runId: options.runId, category: category.name }, () =>
      scrapeCategory(options, extractor, category)
    );
    results.push(result);
  }

  const failed = results.filter((r) => r.status === "failed").length;
  log.info(`Run ${options.runId} finished: ${results.length} categories, ${failed} failed`);
  return results;
}
