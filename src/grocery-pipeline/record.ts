import type { ProductRecord, RawProduct } from "./types.js";

/** Flatten a product into the row shape the storage sinks write. */
export function toProductRecord(product: RawProduct): ProductRecord {
  return {
    product_id: product.id,
    name: product.name,
    brand: product.brand ?? null,
    info: product.info,
    price: product.price,
    price_text: product.priceText,
    unit_price: product.unitPrice ?? null,
    image_url: product.imageUrl ?? null,
    category: product.category ?? null,
    subcategory: product.subcategory ?? null,
    url: product.url ?? null,
    attributes: product.attributes ?? {},
    scraped_at: product.scrapedAt.toISOString(),
    run_id: product.runId ?? null,
  };
}
