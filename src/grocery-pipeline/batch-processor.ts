/**
 * Batch attribute extraction.
 */

import { createLogger, describeError } from "../log.js";
import { createAttributeExtractor, type AttributeExtractor } from "./attribute-extractor.js";
import type { ProcessedProduct, RawProduct } from "./types.js";

const log = createLogger("processor");

/**
 * Run the extractor over every product. A product whose extraction throws is
 * logged and kept as it was; the output always has the input's length and
 * order.
 */
export function processAll(
  products: readonly RawProduct[],
  extractor: AttributeExtractor = createAttributeExtractor()
): Array<RawProduct | ProcessedProduct> {
  log.info(`Processing ${products.length} products (${extractor.profile.site} profile)`);

  let failed = 0;
  const processed = products.map((product) => {
    try {
      return extractor.extract(product);
    } catch (err: unknown) {
      failed++;
      log.error(`Error processing product ${product.id}: ${describeError(err)}`);
      return product;
    }
  });

  log.info(`Processed ${processed.length} products (${failed} kept unprocessed after errors)`);
  return processed;
}
