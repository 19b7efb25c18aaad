import type { RawProduct } from "../types.js";

export interface SaveOptions {
  /** Overwrite rows already stored for the same products instead of keeping them. */
  replaceExisting?: boolean;
}

/** A sink for scraped products. */
export interface ProductStorage {
  initialize(): Promise<void>;
  /** Returns the number of products written. */
  saveProducts(products: readonly RawProduct[], options?: SaveOptions): Promise<number>;
  clear(): Promise<void>;
  close(): Promise<void>;
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}
