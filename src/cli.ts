/**
 * Command-line front end: argument parsing and one scrape run.
 */

import { parseArgs } from 'node:util';
import { categoryFromUrl, ConfigError, loadCategories, loadConfig, type AppConfig } from './config.js';
import { createLogger, describeError, setLogLevel } from './log.js';
import {
  createScraper,
  createStorage,
  formatRunId,
  generateRunId,
  runScrape,
  SITES,
  type CategoryResult,
  type CategoryTarget,
  type HtmlFetcher,
  type ProductStorage,
  type Site,
} from './grocery-pipeline/index.js';

const log = createLogger('cli');

export const USAGE = `Usage: dagligvare-scraper [options]

Options:
  -s, --site <oda|meny>       Store to scrape (default: SCRAPER_SITE or oda)
  -u, --category <url>        Scrape this category URL instead of the configured list
      --category-filter <s>   Only scrape configured categories whose name contains <s>
  -m, --max-products <n>      Maximum products per category
      --run-id <id>           Run ID to stamp on products (default: generated)
      --seed <seed>           Seed for a deterministic generated run ID
      --replace               Replace stored products with the same ID
      --clear                 Clear storage before scraping
      --clear-only            Clear storage and exit
  -d, --debug                 Debug logging
  -h, --help                  Show this help`;

export interface CliOptions {
  site?: Site;
  category?: string;
  categoryFilter?: string;
  maxProducts?: number;
  runId?: string;
  seed?: string;
  replace: boolean;
  clear: boolean;
  clearOnly: boolean;
  debug: boolean;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function isSite(value: string): value is Site {
  return SITES.some((site) => site === value);
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        site: { type: 'string', short: 's' },
        category: { type: 'string', short: 'u' },
        'category-filter': { type: 'string' },
        'max-products': { type: 'string', short: 'm' },
        'run-id': { type: 'string' },
        seed: { type: 'string' },
        replace: { type: 'boolean', default: false },
        clear: { type: 'boolean', default: false },
        'clear-only': { type: 'boolean', default: false },
        debug: { type: 'boolean', short: 'd', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (err: unknown) {
    throw new CliUsageError(describeError(err));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseRawArgs(argv);

  const site = values.site;
  if (site !== undefined && !isSite(site)) {
    throw new CliUsageError(`Unknown site '${site}', expected one of: ${SITES.join(', ')}`);
  }

  let maxProducts: number | undefined;
  const rawMax = values['max-products'];
  if (rawMax !== undefined) {
    maxProducts = Number(rawMax);
    if (!Number.isInteger(maxProducts) || maxProducts <= 0) {
      throw new CliUsageError(`--max-products must be a positive integer, got '${rawMax}'`);
    }
  }

  return {
    site,
    category: values.category,
    categoryFilter: values['category-filter'],
    maxProducts,
    runId: values['run-id'],
    seed: values.seed,
    replace: values.replace ?? false,
    clear: values.clear ?? false,
    clearOnly: values['clear-only'] ?? false,
    debug: values.debug ?? false,
    help: values.help ?? false,
  };
}

/**
 * Categories for this run: the --category URL alone, or the configured list
 * narrowed by --category-filter.
 */
export function selectCategories(
  options: Pick<CliOptions, 'category' | 'categoryFilter'>,
  configured: CategoryTarget[],
  baseUrl: string
): CategoryTarget[] {
  if (options.category) {
    return [categoryFromUrl(new URL(options.category, baseUrl).toString())];
  }
  const filter = options.categoryFilter?.toLowerCase();
  if (!filter) return configured;
  return configured.filter((c) => c.name.toLowerCase().includes(filter));
}

export interface CliDeps {
  env?: Record<string, string | undefined>;
  /** Overrides the configured storage. */
  storage?: ProductStorage;
  /** Overrides HTTP access for the scraper. */
  fetcher?: HtmlFetcher;
  /** Category list file; defaults to config/categories.json. */
  categoriesPath?: string | URL;
  /** Used for usage and summary output. */
  print?: (line: string) => void;
}

function summarize(results: CategoryResult[]): string[] {
  return results.map((r) => {
    const base = `${r.category}: ${r.status}, scraped ${r.scraped}, saved ${r.saved}`;
    return r.error ? `${base} (${r.error})` : base;
  });
}

/**
 * Run the CLI and return the process exit code: 0 when every category
 * succeeded or was empty, 1 otherwise.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.error(line));

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err: unknown) {
    if (err instanceof CliUsageError) {
      print(`Error: ${err.message}\n\n${USAGE}`);
      return 1;
    }
    throw err;
  }
  if (options.help) {
    print(USAGE);
    return 0;
  }

  const env = deps.env ?? process.env;
  let config: AppConfig;
  try {
    config = loadConfig(options.site ? { ...env, SCRAPER_SITE: options.site } : env);
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      print(`Configuration error: ${err.message}`);
      return 1;
    }
    throw err;
  }

  setLogLevel(options.debug ? 'debug' : config.logLevel);

  const { site, baseUrl } = config.scraper;
  let configured: CategoryTarget[] = [];
  if (!options.category) {
    try {
      configured = loadCategories(site, baseUrl, deps.categoriesPath);
    } catch (err: unknown) {
      if (err instanceof ConfigError) {
        print(`Configuration error: ${err.message}`);
        return 1;
      }
      throw err;
    }
  }

  const storage = deps.storage ?? createStorage(config.storage);
  await storage.initialize();
  try {
    if (options.clear || options.clearOnly) {
      log.info('Clearing storage before scraping');
      await storage.clear();
      if (options.clearOnly) {
        log.info('Storage cleared, exiting as requested');
        return 0;
      }
    }

    const categories = selectCategories(options, configured, baseUrl);
    if (categories.length === 0) {
      log.error(
        options.categoryFilter
          ? `No categories match filter: ${options.categoryFilter}`
          : `No categories configured for ${site}`
      );
      return 1;
    }

    const runId = options.runId ?? formatRunId(generateRunId(options.seed));
    log.info(`Starting ${site} scraper, run ID: ${runId}, ${categories.length} categories`);

    const results = await runScrape({
      scraper: createScraper(config.scraper, deps.fetcher),
      storage,
      categories,
      runId,
      maxProducts: options.maxProducts,
      replaceExisting: options.replace,
    });

    for (const line of summarize(results)) print(line);
    return results.some((r) => r.status === 'failed') ? 1 : 0;
  } finally {
    await storage.close();
  }
}
