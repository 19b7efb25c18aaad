/**
 * CSV file sink.
 *
 * One file per category per day: `<prefix>_<category>_<YYYY-MM-DD>.csv`.
 * Attributes are written as a JSON column.
 */

import { appendFile, mkdir, readdir, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createLogger, describeError } from "../../log.js";
import { toProductRecord } from "../record.js";
import type { ProductRecord, RawProduct } from "../types.js";
import { StorageError, type ProductStorage, type SaveOptions } from "./types.js";

const log = createLogger("csv");

export const CSV_COLUMNS = [
  "product_id",
  "name",
  "brand",
  "info",
  "price",
  "price_text",
  "unit_price",
  "image_url",
  "category",
  "subcategory",
  "url",
  "attributes",
  "scraped_at",
  "run_id",
] as const satisfies readonly (keyof ProductRecord)[];

export interface CsvStorageOptions {
  outputDir: string;
  filenamePrefix: string;
  /** Clock used for the date in file names. */
  now?: () => Date;
}

/** Quote a field when it holds a comma, quote or line break; inner quotes are doubled. */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) return `"${value.replace(/"/g, '""')}"`;
  return value;
}

function fieldText(record: ProductRecord, column: (typeof CSV_COLUMNS)[number]): string {
  const value = record[column];
  if (value === null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

export function toCsvRow(record: ProductRecord): string {
  return CSV_COLUMNS.map((column) => escapeCsvField(fieldText(record, column))).join(",");
}

function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

export class CsvStorage implements ProductStorage {
  private readonly now: () => Date;

  constructor(private readonly options: CsvStorageOptions) {
    this.now = options.now ?? (() => new Date());
  }

  fileFor(category: string): string {
    return join(this.options.outputDir, `${this.options.filenamePrefix}_${category}_${formatDate(this.now())}.csv`);
  }

  async initialize(): Promise<void> {
    try {
      await mkdir(this.options.outputDir, { recursive: true });
    } catch (err: unknown) {
      throw new StorageError(`Cannot create output directory ${this.options.outputDir}`, { cause: err });
    }
    log.info(`Initialized CSV storage in ${this.options.outputDir}`);
  }

  async saveProducts(products: readonly RawProduct[], options: SaveOptions = {}): Promise<number> {
    if (products.length === 0) {
      log.warn("No products to save");
      return 0;
    }

    const byCategory = new Map<string, ProductRecord[]>();
    for (const product of products) {
      const category = product.category || "uncategorized";
      const rows = byCategory.get(category) ?? [];
      rows.push(toProductRecord(product));
      byCategory.set(category, rows);
    }

    for (const [category, records] of byCategory) {
      const file = this.fileFor(category);
      const body = records.map((record) => `${toCsvRow(record)}\n`).join("");
      try {
        if (options.replaceExisting || !(await fileExists(file))) {
          await writeFile(file, `${CSV_COLUMNS.join(",")}\n${body}`, "utf-8");
        } else {
          await appendFile(file, body, "utf-8");
        }
      } catch (err: unknown) {
        throw new StorageError(`Failed to write ${file}: ${describeError(err)}`, { cause: err });
      }
    }

    log.info(`Saved ${products.length} products to CSV files`);
    return products.length;
  }

  /** Delete every CSV file carrying this storage's prefix. */
  async clear(): Promise<void> {
    let entries: string[];
    try {
      entries = await readdir(this.options.outputDir);
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return;
      throw new StorageError(`Cannot list ${this.options.outputDir}`, { cause: err });
    }

    const files = entries.filter((name) => name.startsWith(this.options.filenamePrefix) && name.endsWith(".csv"));
    for (const name of files) {
      await rm(join(this.options.outputDir, name), { force: true });
    }
    log.info(`Deleted ${files.length} CSV files from ${this.options.outputDir}`);
  }

  async close(): Promise<void> {}
}
