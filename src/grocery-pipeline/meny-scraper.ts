/**
 * Meny.no product scraper.
 *
 * Meny renders every product as a card on the category listing, so one
 * listing page yields complete products without visiting product pages.
 */

import * as cheerio from "cheerio";
import { createLogger } from "../log.js";
import type { HtmlFetcher } from "./http.js";
import type { ProductScraper } from "./scraper.js";
import { generateProductId, parsePrice } from "./text.js";
import type { CategoryTarget, RawProduct } from "./types.js";

const log = createLogger("meny");

const CARD_SELECTORS = ["li.ws-product-list-vertical__item", "div.ws-product-vertical"];

function textOf(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Outer HTML of each product card on a listing page. */
export function extractMenyProductCards(html: string): string[] {
  const $ = cheerio.load(html);
  for (const selector of CARD_SELECTORS) {
    const cards = $(selector).toArray();
    if (cards.length > 0) {
      log.debug(`Found ${cards.length} product cards using ${selector}`);
      return cards.map((card) => $.html(card));
    }
  }
  log.warn("No product cards found on the page");
  return [];
}

/** "/varer/meieri-egg/melk/lettmelk-7038010000737/" -> "meieri-egg/melk/lettmelk-7038010000737". */
function menyProductId(url: string): string | undefined {
  const idx = url.indexOf("/varer/");
  if (idx < 0) return undefined;
  const id = url.slice(idx + "/varer/".length).replace(/\/+$/, "");
  return id || undefined;
}

/**
 * Parse one product card. Returns null when the card has no product link or
 * no price.
 */
export function parseMenyProductCard(
  cardHtml: string,
  baseUrl: string,
  category?: string,
  scrapedAt: Date = new Date()
): RawProduct | null {
  const $ = cheerio.load(cardHtml);

  let link = $("a.ws-product-vertical__link").first();
  if (!link.length) link = $("h3 a").first();
  const href = link.attr("href");
  if (!link.length || !href) {
    log.warn("Could not find product link");
    return null;
  }
  const productUrl = new URL(href, baseUrl).toString();

  const title = $("h3.ws-product-vertical__title").first();
  const name = textOf(title.length ? title.text() : link.text());
  const info = textOf($("p.ws-product-vertical__subtitle").first().text());

  // Brand is usually the last word of the subtitle.
  const infoParts = info.split(" ").filter(Boolean);
  const brand = infoParts.length > 1 ? infoParts[infoParts.length - 1] : undefined;

  const priceEl = $("div.ws-product-vertical__price").first();
  if (!priceEl.length) {
    log.warn(`No price found for ${name}`);
    return null;
  }
  const priceText = textOf(priceEl.text());

  const unitPriceEl = $("p.ws-product-vertical__price-unit").first();
  const unitPrice = unitPriceEl.length ? textOf(unitPriceEl.text()) : undefined;

  const imageSrc = $("img").first().attr("src");

  return {
    id: menyProductId(href) ?? generateProductId(name, info),
    name,
    info,
    price: parsePrice(priceText),
    priceText,
    unitPrice,
    brand,
    imageUrl: imageSrc ? new URL(imageSrc, baseUrl).toString() : undefined,
    category,
    url: productUrl,
    scrapedAt,
  };
}

export class MenyScraper implements ProductScraper {
  readonly site = "meny" as const;

  constructor(
    private readonly fetcher: HtmlFetcher,
    private readonly baseUrl = "https://meny.no"
  ) {}

  async getProducts(category: CategoryTarget, maxProducts?: number): Promise<RawProduct[]> {
    const listing = await this.fetcher.fetchHtml(category.url);
    const products: RawProduct[] = [];

    for (const card of extractMenyProductCards(listing)) {
      if (maxProducts !== undefined && products.length >= maxProducts) break;
      const product = parseMenyProductCard(card, this.baseUrl, category.name);
      if (product) products.push(product);
    }

    log.info(`Scraped ${products.length} products from ${category.name}`);
    return products;
  }
}
