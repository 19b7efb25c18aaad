import { beforeEach, describe, expect, it, vi } from "vitest";
import type { HtmlFetcher } from "./http.js";
import { extractMenyProductCards, MenyScraper, parseMenyProductCard } from "./meny-scraper.js";

const scrapedAt = new Date("2024-05-17T10:00:00.000Z");

const LISTING = `<html><body><ul>
  <li class="ws-product-list-vertical__item">
    <div class="ws-product-vertical">
      <a class="ws-product-vertical__link" href="/varer/meieri-egg/melk/lettmelk-7038010000737/">
        <img src="https://bilder.example.no/7038010000737/large.jpg">
        <h3 class="ws-product-vertical__title">Lettmelk 1%</h3>
      </a>
      <p class="ws-product-vertical__subtitle">1,75 l TINE</p>
      <div class="ws-product-vertical__price">kr 25,90</div>
      <p class="ws-product-vertical__price-unit">kr 14,80 /l</p>
    </div>
  </li>
  <li class="ws-product-list-vertical__item">
    <div class="ws-product-vertical">
      <h3 class="ws-product-vertical__title"><a href="/varer/meieri-egg/egg/egg-12pk/">Egg 12 stk</a></h3>
      <p class="ws-product-vertical__subtitle">Prior</p>
      <div class="ws-product-vertical__price">kr 49,90</div>
    </div>
  </li>
  <li class="ws-product-list-vertical__item">
    <div class="ws-product-vertical"><h3 class="ws-product-vertical__title">Uten lenke</h3></div>
  </li>
</ul></body></html>`;

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

describe("parseMenyProductCard", () => {
  const cards = extractMenyProductCards(LISTING);

  it("finds every card on the listing", () => {
    expect(cards).toHaveLength(3);
  });

  it("reads a full card", () => {
    expect(parseMenyProductCard(cards[0], "https://meny.no", "meieri-egg", scrapedAt)).toEqual({
      id: "meieri-egg/melk/lettmelk-7038010000737",
      name: "Lettmelk 1%",
      info: "1,75 l TINE",
      price: 25.9,
      priceText: "kr 25,90",
      unitPrice: "kr 14,80 /l",
      brand: "TINE",
      imageUrl: "https://bilder.example.no/7038010000737/large.jpg",
      category: "meieri-egg",
      url: "https://meny.no/varer/meieri-egg/melk/lettmelk-7038010000737/",
      scrapedAt,
    });
  });

  it("falls back to the heading link and leaves a one-word subtitle unbranded", () => {
    const product = parseMenyProductCard(cards[1], "https://meny.no", "meieri-egg", scrapedAt);
    expect(product).toMatchObject({ id: "meieri-egg/egg/egg-12pk", name: "Egg 12 stk", info: "Prior", price: 49.9 });
    expect(product?.brand).toBeUndefined();
    expect(product?.unitPrice).toBeUndefined();
    expect(product?.imageUrl).toBeUndefined();
  });

  it("skips a card without a link", () => {
    expect(parseMenyProductCard(cards[2], "https://meny.no")).toBeNull();
  });

  it("skips a card without a price", () => {
    const card = `<div class="ws-product-vertical"><a class="ws-product-vertical__link" href="/varer/x/">X</a></div>`;
    expect(parseMenyProductCard(card, "https://meny.no")).toBeNull();
  });

  it("falls back to product divs when there are no list items", () => {
    const html = `<div class="ws-product-vertical"></div><div class="ws-product-vertical"></div>`;
    expect(extractMenyProductCards(html)).toHaveLength(2);
    expect(extractMenyProductCards("<p>tom</p>")).toEqual([]);
  });
});

describe("MenyScraper", () => {
  const listingUrl = "https://meny.no/varer/meieri-egg/";
  const fetcher: HtmlFetcher = { fetchHtml: async () => LISTING };

  it("reads products from the listing page", async () => {
    const products = await new MenyScraper(fetcher).getProducts({ name: "meieri-egg", url: listingUrl });
    expect(products.map((p) => p.name)).toEqual(["Lettmelk 1%", "Egg 12 stk"]);
    expect(products.every((p) => p.category === "meieri-egg")).toBe(true);
  });

  it("stops at maxProducts", async () => {
    const products = await new MenyScraper(fetcher).getProducts({ name: "meieri-egg", url: listingUrl }, 1);
    expect(products).toHaveLength(1);
  });
});
