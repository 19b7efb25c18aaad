/**
 * Runtime configuration.
 *
 * Settings come from environment variables (the CLI loads `.env` through
 * dotenv first); the per-site category lists come from
 * config/categories.json. Both are validated with zod.
 */

import { readFileSync } from 'node:fs';
import { z, ZodError } from 'zod';
import { LOG_LEVELS } from './log.js';
import { SITES, type CategoryTarget, type Site } from './grocery-pipeline/types.js';

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

const DEFAULT_CATEGORIES_URL = new URL('../config/categories.json', import.meta.url);

const envSchema = z
  .object({
    SCRAPER_SITE: z.enum(SITES).default('oda'),
    REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(200),
    MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
    ODA_BASE_URL: z.string().url().default('https://oda.com'),
    MENY_BASE_URL: z.string().url().default('https://meny.no'),
    STORAGE_TYPE: z.enum(['csv', 'supabase']).default('csv'),
    CSV_OUTPUT_DIR: z.string().min(1).default('data'),
    CSV_FILENAME_PREFIX: z.string().min(1).default('products'),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_KEY: z.string().min(1).optional(),
    SUPABASE_TABLE: z.string().min(1).default('products'),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_TYPE === 'supabase' && (!env.SUPABASE_URL || !env.SUPABASE_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'SUPABASE_URL and SUPABASE_KEY must be set when STORAGE_TYPE is supabase',
      });
    }
  });

const categoryFileSchema = z.record(
  z.enum(SITES),
  z.array(z.object({ name: z.string().min(1), url: z.string().min(1) }))
);

export interface ScraperConfig {
  site: Site;
  baseUrl: string;
  userAgent: string;
  requestDelayMs: number;
  maxRetries: number;
  timeoutMs: number;
}

export type StorageConfig =
  | { type: 'csv'; outputDir: string; filenamePrefix: string }
  | { type: 'supabase'; url: string; key: string; table: string };

export interface AppConfig {
  scraper: ScraperConfig;
  storage: StorageConfig;
  logLevel: (typeof LOG_LEVELS)[number];
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function formatZodError(error: ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join(', ');
}

/**
 * Build the app config from an environment map. Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatZodError(parsed.error)}`, { cause: parsed.error });
  }
  const e = parsed.data;

  const storage: StorageConfig =
    e.STORAGE_TYPE === 'supabase' && e.SUPABASE_URL && e.SUPABASE_KEY
      ? { type: 'supabase', url: e.SUPABASE_URL, key: e.SUPABASE_KEY, table: e.SUPABASE_TABLE }
      : { type: 'csv', outputDir: e.CSV_OUTPUT_DIR, filenamePrefix: e.CSV_FILENAME_PREFIX };

  return {
    scraper: {
      site: e.SCRAPER_SITE,
      baseUrl: e.SCRAPER_SITE === 'oda' ? e.ODA_BASE_URL : e.MENY_BASE_URL,
      userAgent: e.USER_AGENT,
      requestDelayMs: e.REQUEST_DELAY_MS,
      maxRetries: e.MAX_RETRIES,
      timeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    storage,
    logLevel: e.LOG_LEVEL,
  };
}

/**
 * Category listings for a site, with relative URLs resolved against the
 * site's base URL.
 */
export function loadCategories(
  site: Site,
  baseUrl: string,
  path: string | URL = DEFAULT_CATEGORIES_URL
): CategoryTarget[] {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read category list from ${String(path)}`, { cause: err });
  }

  const parsed = categoryFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Invalid category list: ${formatZodError(parsed.error)}`, { cause: parsed.error });
  }

  return (parsed.data[site] ?? []).map(({ name, url }) => ({
    name,
    url: new URL(url, baseUrl).toString(),
  }));
}

/**
 * A single category from a URL given on the command line; the name is the
 * last path segment.
 */
export function categoryFromUrl(url: string): CategoryTarget {
  const parts = url.replace(/\/+$/, '').split('/');
  return { name: parts[parts.length - 1] || 'custom-category', url };
}
