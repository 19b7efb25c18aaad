/**
 * HTTP access for the store scrapers.
 *
 * One axios instance per scraper, with a polite delay between requests and
 * retries for rate limiting and server errors.
 */

import axios, { type AxiosError, type AxiosInstance } from "axios";
import { createLogger } from "../log.js";

const log = createLogger("http");

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

export interface HttpOptions {
  userAgent: string;
  timeoutMs: number;
  requestDelayMs: number;
  maxRetries: number;
  /** Base wait before the first retry; doubles on each further attempt. */
  backoffMs?: number;
}

export type ScrapeErrorCode = "FETCH_FAILED";

export class ScrapeError extends Error {
  code: ScrapeErrorCode;
  status?: number;

  constructor(code: ScrapeErrorCode, message: string, status?: number) {
    super(message);
    this.name = "ScrapeError";
    this.code = code;
    this.status = status;
  }
}

export function createHttpClient(options: Pick<HttpOptions, "userAgent" | "timeoutMs">): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": options.userAgent,
      "Accept-Language": "nb-NO,nb;q=0.9,no;q=0.8,en;q=0.7",
    },
    timeout: options.timeoutMs,
    maxRedirects: 5,
    responseType: "text",
  });
}

export function formatHttpError(error: AxiosError): string {
  if (error.response) {
    return `HTTP ${error.response.status} (${error.response.statusText || "no status text"})`;
  }
  if (error.request) {
    return `Network error: no response received${error.code ? ` (${error.code})` : ""}`;
  }
  return `Request setup error: ${error.message}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function isRetryable(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;
  if (!error.response) return true;
  return RETRY_STATUSES.has(error.response.status);
}

/** Source of page HTML; the scrapers only depend on this. */
export interface HtmlFetcher {
  fetchHtml(url: string): Promise<string>;
}

export class HttpFetcher implements HtmlFetcher {
  private lastRequestTime = 0;
  private readonly client: AxiosInstance;

  constructor(private readonly options: HttpOptions, client?: AxiosInstance) {
    this.client = client ?? createHttpClient(options);
  }

  private async throttle(): Promise<void> {
    const elapsed = Date.now() - this.lastRequestTime;
    if (elapsed < this.options.requestDelayMs) {
      await sleep(this.options.requestDelayMs - elapsed);
    }
    this.lastRequestTime = Date.now();
  }

  async fetchHtml(url: string): Promise<string> {
    const backoffMs = this.options.backoffMs ?? 1000;

    for (let attempt = 0; ; attempt++) {
      await this.throttle();
      log.debug(`GET ${url}`);
      try {
        const resp = await this.client.get<string>(url);
        const html = resp.data;
        if (typeof html !== "string" || !html.trim()) {
          throw new ScrapeError("FETCH_FAILED", `Empty or invalid response from ${url}`, resp.status);
        }
        return html;
      } catch (err: unknown) {
        if (err instanceof ScrapeError) throw err;
        if (attempt < this.options.maxRetries && isRetryable(err)) {
          const wait = backoffMs * 2 ** attempt;
          log.warn(`Request to ${url} failed, retrying in ${wait} ms (attempt ${attempt + 1}/${this.options.maxRetries})`);
          await sleep(wait);
          continue;
        }
        if (axios.isAxiosError(err)) {
          throw new ScrapeError("FETCH_FAILED", `Request to ${url} failed: ${formatHttpError(err)}`, err.response?.status);
        }
        throw err;
      }
    }
  }
}
