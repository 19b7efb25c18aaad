import { describe, expect, it } from 'vitest';
import { categoryFromUrl, ConfigError, DEFAULT_USER_AGENT, loadCategories, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      scraper: {
        site: 'oda',
        baseUrl: 'https://oda.com',
        userAgent: DEFAULT_USER_AGENT,
        requestDelayMs: 200,
        maxRetries: 3,
        timeoutMs: 30000,
      },
      storage: { type: 'csv', outputDir: 'data', filenamePrefix: 'products' },
      logLevel: 'info',
    });
  });

  it('picks the base URL for the site', () => {
    expect(loadConfig({ SCRAPER_SITE: 'meny' }).scraper.baseUrl).toBe('https://meny.no');
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ REQUEST_DELAY_MS: '' }).scraper.requestDelayMs).toBe(200);
  });

  it('coerces numbers', () => {
    expect(loadConfig({ MAX_RETRIES: '5' }).scraper.maxRetries).toBe(5);
    expect(() => loadConfig({ REQUEST_DELAY_MS: 'abc' })).toThrow(ConfigError);
  });

  it('requires credentials for supabase storage', () => {
    expect(() => loadConfig({ STORAGE_TYPE: 'supabase' })).toThrow(/SUPABASE_URL and SUPABASE_KEY must be set/);
    expect(
      loadConfig({ STORAGE_TYPE: 'supabase', SUPABASE_URL: 'http://localhost:54321', SUPABASE_KEY: 'test-secret' }).storage
    ).toEqual({ type: 'supabase', url: 'http://localhost:54321', key: 'test-secret', table: 'products' });
  });

  it('rejects an unknown site', () => {
    expect(() => loadConfig({ SCRAPER_SITE: 'coop' })).toThrow(/SCRAPER_SITE/);
  });
});

describe('loadCategories', () => {
  it('resolves configured URLs against the base URL', () => {
    expect(loadCategories('meny', 'https://meny.no')).toEqual([
      { name: 'meieri-egg', url: 'https://meny.no/varer/meieri-egg/' },
    ]);
    expect(loadCategories('oda', 'https://oda.com')).toEqual([
      { name: 'meieri-ost-og-egg', url: 'https://oda.com/no/categories/1283-meieri-ost-og-egg/' },
    ]);
  });

  it('fails with ConfigError for a missing file', () => {
    expect(() => loadCategories('oda', 'https://oda.com', '/nonexistent/categories.json')).toThrow(ConfigError);
  });
});

describe('categoryFromUrl', () => {
  it('names the category after the last path segment', () => {
    expect(categoryFromUrl('https://oda.com/no/categories/1283-meieri-ost-og-egg/')).toEqual({
      name: '1283-meieri-ost-og-egg',
      url: 'https://oda.com/no/categories/1283-meieri-ost-og-egg/',
    });
  });
});
