import { beforeEach, describe, expect, it, vi } from "vitest";
import { ScrapeError, type HtmlFetcher } from "./http.js";
import { OdaScraper, parseOdaProductPage, parseOdaProductUrls } from "./oda-scraper.js";

const scrapedAt = new Date("2024-05-17T10:00:00.000Z");

const LISTING = `<html><body>
  <article><a href="/no/products/123-tine-lettmelk/">Lettmelk</a></article>
  <article><a href="/no/products/123-tine-lettmelk/">Lettmelk igjen</a></article>
  <article><a href="https://oda.com/no/products/456-prior-egg/">Egg</a></article>
</body></html>`;

const PRODUCT_PAGE = `<html><body>
  <h1> Lettmelk 1% </h1>
  <p class="k-text-style--body-s">1% fett, 1,75 l, TINE</p>
  <span class="k-text-style--label-m k-text--weight-bold">kr 25,90</span>
  <p class="k-text-style--label-s k-text-color--subdued">kr 14,80 /l</p>
  <img src="/images/lettmelk.jpg">
</body></html>`;

function fakeFetcher(pages: Record<string, string>): HtmlFetcher & { urls: string[] } {
  const urls: string[] = [];
  return {
    urls,
    async fetchHtml(url: string) {
      urls.push(url);
      const html = pages[url];
      if (html === undefined) throw new ScrapeError("FETCH_FAILED", `HTTP 404 for ${url}`, 404);
      return html;
    },
  };
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("parseOdaProductUrls", () => {
  it("collects article links, absolute and de-duplicated", () => {
    expect(parseOdaProductUrls(LISTING, "https://oda.com")).toEqual([
      "https://oda.com/no/products/123-tine-lettmelk/",
      "https://oda.com/no/products/456-prior-egg/",
    ]);
  });

  it("falls back to product links when there are no articles", () => {
    const html = `<div><a href="/no/products/789-norvegia/">Ost</a><a href="/no/about/">Om</a></div>`;
    expect(parseOdaProductUrls(html, "https://oda.com")).toEqual(["https://oda.com/no/products/789-norvegia/"]);
  });
});

describe("parseOdaProductPage", () => {
  const url = "https://oda.com/no/products/123-tine-lettmelk/";

  it("reads a product page", () => {
    expect(parseOdaProductPage(PRODUCT_PAGE, url, "meieri", scrapedAt)).toEqual({
      id: "123",
      name: "Lettmelk 1%",
      info: "1% fett, 1,75 l, TINE",
      price: 25.9,
      priceText: "kr 25,90",
      unitPrice: "kr 14,80 /l",
      imageUrl: "https://oda.com/images/lettmelk.jpg",
      category: "meieri",
      url,
      scrapedAt,
    });
  });

  it("derives an id when the URL has no product number", () => {
    const product = parseOdaProductPage(PRODUCT_PAGE, "https://oda.com/no/tilbud/", undefined, scrapedAt);
    expect(product?.id).toBe("lettmelk1_1fett175ltine");
  });

  it("skips pages without a name or a price", () => {
    expect(parseOdaProductPage("<html><body><p>kr 10</p></body></html>", url)).toBeNull();
    expect(parseOdaProductPage("<html><body><h1>Lettmelk</h1></body></html>", url)).toBeNull();
  });
});

describe("OdaScraper", () => {
  const listingUrl = "https://oda.com/no/categories/1283-meieri-ost-og-egg/";

  it("scrapes each product page and skips pages that fail", async () => {
    const fetcher = fakeFetcher({
      [listingUrl]: LISTING,
      "https://oda.com/no/products/123-tine-lettmelk/": PRODUCT_PAGE,
    });
    const products = await new OdaScraper(fetcher).getProducts({ name: "meieri", url: listingUrl });

    expect(products.map((p) => p.id)).toEqual(["123"]);
    expect(products[0].category).toBe("meieri");
    expect(fetcher.urls).toEqual([
      listingUrl,
      "https://oda.com/no/products/123-tine-lettmelk/",
      "https://oda.com/no/products/456-prior-egg/",
    ]);
  });

  it("stops at maxProducts", async () => {
    const fetcher = fakeFetcher({
      [listingUrl]: LISTING,
      "https://oda.com/no/products/123-tine-lettmelk/": PRODUCT_PAGE,
    });
    await new OdaScraper(fetcher).getProducts({ name: "meieri", url: listingUrl }, 1);
    expect(fetcher.urls).toHaveLength(2);
  });
});
