import type { ScraperConfig } from "../config.js";
import { HttpFetcher, type HtmlFetcher } from "./http.js";
import { MenyScraper } from "./meny-scraper.js";
import { OdaScraper } from "./oda-scraper.js";
import type { CategoryTarget, RawProduct, Site } from "./types.js";

/** A store scraper: one category listing in, raw products out. */
export interface ProductScraper {
  readonly site: Site;
  getProducts(category: CategoryTarget, maxProducts?: number): Promise<RawProduct[]>;
}

export function createScraper(config: ScraperConfig, fetcher?: HtmlFetcher): ProductScraper {
  const http = fetcher ?? new HttpFetcher(config);
  switch (config.site) {
    case "oda":
      return new OdaScraper(http, config.baseUrl);
    case "meny":
      return new MenyScraper(http, config.baseUrl);
  }
}
