/**
 * Supabase (PostgREST) sink.
 *
 * Rows go to one table keyed on `product_id`. The table is expected to exist
 * already; it is created through migrations, not from here.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { createLogger } from "../../log.js";
import { toProductRecord } from "../record.js";
import type { ProductRecord, RawProduct } from "../types.js";
import { StorageError, type ProductStorage, type SaveOptions } from "./types.js";

const log = createLogger("supabase");

const BATCH_SIZE = 500;

const productRecordSchema = z.object({
  product_id: z.string(),
  name: z.string(),
  brand: z.string().nullable(),
  info: z.string(),
  price: z.number(),
  price_text: z.string(),
  unit_price: z.string().nullable(),
  image_url: z.string().nullable(),
  category: z.string().nullable(),
  subcategory: z.string().nullable(),
  url: z.string().nullable(),
  attributes: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).nullable(),
  scraped_at: z.string(),
  run_id: z.string().nullable(),
});

export interface SupabaseStorageOptions {
  url: string;
  key: string;
  table: string;
  /** Prebuilt client; one is created from url and key when omitted. */
  client?: SupabaseClient;
}

export interface ProductQuery {
  category?: string;
  subcategory?: string;
  /** Matches run IDs starting with this value, so a base run ID finds every category of the run. */
  runId?: string;
  limit?: number;
}

export class SupabaseStorage implements ProductStorage {
  private readonly client: SupabaseClient;
  private readonly table: string;

  constructor(options: SupabaseStorageOptions) {
    this.table = options.table;
    this.client =
      options.client ??
      createClient(options.url, options.key, {
        auth: { persistSession: false, autoRefreshToken: false },
      });
  }

  /** Checks that the table is reachable. */
  async initialize(): Promise<void> {
    const { error } = await this.client.from(this.table).select("product_id").limit(1);
    if (error) {
      throw new StorageError(`Supabase table ${this.table} is not reachable: ${error.message}`, { cause: error });
    }
    log.info(`Initialized Supabase storage with table ${this.table}`);
  }

  async saveProducts(products: readonly RawProduct[], options: SaveOptions = {}): Promise<number> {
    if (products.length === 0) {
      log.warn("No products to save");
      return 0;
    }

    const records = products.map(toProductRecord);
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);
      const { error } = await this.client.from(this.table).upsert(batch, {
        onConflict: "product_id",
        ignoreDuplicates: !options.replaceExisting,
      });
      if (error) {
        throw new StorageError(`Failed to save products to ${this.table}: ${error.message}`, { cause: error });
      }
    }

    log.info(`Saved ${records.length} products to Supabase (${options.replaceExisting ? "replacing" : "keeping"} existing rows)`);
    return records.length;
  }

  async getProducts(query: ProductQuery = {}): Promise<ProductRecord[]> {
    let request = this.client.from(this.table).select("*");
    if (query.category) request = request.eq("category", query.category);
    if (query.subcategory) request = request.eq("subcategory", query.subcategory);
    if (query.runId) request = request.like("run_id", `${query.runId}%`);
    if (query.limit !== undefined) request = request.limit(query.limit);

    const { data, error } = await request;
    if (error) {
      throw new StorageError(`Failed to read products from ${this.table}: ${error.message}`, { cause: error });
    }

    const parsed = z.array(productRecordSchema).safeParse(data ?? []);
    if (!parsed.success) {
      throw new StorageError(`Unexpected row shape in ${this.table}`, { cause: parsed.error });
    }
    return parsed.data.map((row) => ({ ...row, attributes: row.attributes ?? {} }));
  }

  async clear(): Promise<void> {
    // PostgREST refuses an unfiltered delete.
    const { error } = await this.client.from(this.table).delete().neq("product_id", "");
    if (error) {
      throw new StorageError(`Failed to clear ${this.table}: ${error.message}`, { cause: error });
    }
    log.info(`Cleared all rows from ${this.table}`);
  }

  async close(): Promise<void> {}
}
