/**
 * Oda.com product scraper.
 *
 * A category page lists product cards as <article> elements; each product
 * page carries the name, the info line ("1% fett, 1,75 l, TINE"), price and
 * unit price. Pages are parsed with cheerio.
 */

import * as cheerio from "cheerio";
import { createLogger, describeError } from "../log.js";
import type { HtmlFetcher } from "./http.js";
import type { ProductScraper } from "./scraper.js";
import { generateProductId, parsePrice } from "./text.js";
import type { CategoryTarget, RawProduct } from "./types.js";

const log = createLogger("oda");

const PRICE_SELECTORS = [
  "span.k-text-style--label-m.k-text--weight-bold",
  "span.k-text-color--default",
  "div.price span",
  "span[class*='price']",
  "span.k-text-style--label-m",
];

const UNIT_PRICE_SELECTORS = [
  "p.k-text-style--label-s.k-text-color--subdued",
  "p.k-text-style--label-s",
  "p[class*='subdued']",
  "span[class*='unit']",
];

function textOf(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Text of the first element matching any selector (tried in order) that passes `accept`. */
function firstMatchingText(
  $: cheerio.CheerioAPI,
  selectors: readonly string[],
  accept: (text: string) => boolean
): string | undefined {
  for (const selector of selectors) {
    for (const el of $(selector).toArray()) {
      const text = textOf($(el).text());
      if (accept(text)) return text;
    }
  }
  return undefined;
}

/** Product page URLs on a category page, absolute and de-duplicated. */
export function parseOdaProductUrls(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const hrefs: string[] = [];

  $("article").each((_i, el) => {
    const href = $(el).find("a[href]").first().attr("href");
    if (href) hrefs.push(href);
  });

  if (hrefs.length === 0) {
    $("a[href*='/products/']").each((_i, el) => {
      const href = $(el).attr("href");
      if (href) hrefs.push(href);
    });
  }

  return [...new Set(hrefs.map((href) => new URL(href, baseUrl).toString()))];
}

function odaProductId(url: string): string | undefined {
  return /\/products\/(\d+)/.exec(url)?.[1];
}

/**
 * Parse an Oda product page. Returns null when the page has no product name
 * or no price.
 */
export function parseOdaProductPage(
  html: string,
  productUrl: string,
  category?: string,
  scrapedAt: Date = new Date()
): RawProduct | null {
  const $ = cheerio.load(html);

  const name = textOf($("h1").first().text()) || textOf($("h2").first().text());
  if (!name) {
    log.warn(`No product name found at ${productUrl}`);
    return null;
  }

  const info = textOf($("p.k-text-style--body-s").first().text());

  const hasPrice = (text: string) => text.includes("kr") || /\d/.test(text);
  const priceText =
    firstMatchingText($, PRICE_SELECTORS, hasPrice) ??
    firstMatchingText($, ["span, div, p"], (text) => text.includes("kr") && /\d/.test(text));
  if (!priceText) {
    log.warn(`No price found for ${name} at ${productUrl}`);
    return null;
  }

  const unitPrice = firstMatchingText(
    $,
    UNIT_PRICE_SELECTORS,
    (text) => text.includes("/") && text.includes("kr")
  );

  const imageSrc = $("img[src]").first().attr("src");

  return {
    id: odaProductId(productUrl) ?? generateProductId(name, info),
    name,
    info,
    price: parsePrice(priceText),
    priceText,
    unitPrice,
    imageUrl: imageSrc ? new URL(imageSrc, productUrl).toString() : undefined,
    category,
    url: productUrl,
    scrapedAt,
  };
}

export class OdaScraper implements ProductScraper {
  readonly site = "oda" as const;

  constructor(
    private readonly fetcher: HtmlFetcher,
    private readonly baseUrl = "https://oda.com"
  ) {}

  async getProducts(category: CategoryTarget, maxProducts?: number): Promise<RawProduct[]> {
    const listing = await this.fetcher.fetchHtml(category.url);
    let productUrls = parseOdaProductUrls(listing, this.baseUrl);
    if (maxProducts !== undefined) productUrls = productUrls.slice(0, maxProducts);
    log.info(`Found ${productUrls.length} product URLs in ${category.name}`);

    const products: RawProduct[] = [];
    for (const url of productUrls) {
      try {
        const html = await this.fetcher.fetchHtml(url);
        const product = parseOdaProductPage(html, url, category.name);
        if (product) products.push(product);
      } catch (err: unknown) {
        log.error(`Failed to scrape product from ${url}: ${describeError(err)}`);
      }
    }

    log.info(`Scraped ${products.length} products from ${category.name}`);
    return products;
  }
}
