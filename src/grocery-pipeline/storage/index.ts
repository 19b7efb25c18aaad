import type { StorageConfig } from "../../config.js";
import { CsvStorage } from "./csv-storage.js";
import { SupabaseStorage } from "./supabase-storage.js";
import type { ProductStorage } from "./types.js";

export { CsvStorage, escapeCsvField, toCsvRow, CSV_COLUMNS } from "./csv-storage.js";
export { SupabaseStorage, type ProductQuery } from "./supabase-storage.js";
export { StorageError, type ProductStorage, type SaveOptions } from "./types.js";

export function createStorage(config: StorageConfig): ProductStorage {
  switch (config.type) {
    case "csv":
      return new CsvStorage({ outputDir: config.outputDir, filenamePrefix: config.filenamePrefix });
    case "supabase":
      return new SupabaseStorage({ url: config.url, key: config.key, table: config.table });
  }
}
