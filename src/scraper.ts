import { Fetcher, createFetcher } from "./core/fetcher";
import { RateLimiter } from "./core/rate-limiter";
import { collectKeyword } from "./product/paginator";
import { KeywordResult, PageProgress, ScrapeConfig } from "./types";

export type ScraperSettings = Pick<
  ScrapeConfig,
  "maxPages" | "maxProducts" | "baseUrl" | "affiliateId"
>;

export interface SearchOptions {
  signal?: AbortSignal;
  onPage?: (progress: PageProgress) => void;
  /** Called when a keyword finishes, before the next one starts */
  onKeywordDone?: (result: KeywordResult) => void;
}

/**
 * Keyword search scraper. Owns one fetcher and one rate limiter for its
 * lifetime; call close() when done (see withScraper).
 */
export class ProductScraper {
  private readonly fetcher: Fetcher;
  private readonly limiter: RateLimiter;
  private readonly settings: ScraperSettings;

  constructor(fetcher: Fetcher, limiter: RateLimiter, settings: ScraperSettings) {
    this.fetcher = fetcher;
    this.limiter = limiter;
    this.settings = settings;
  }

  /** Build a scraper with the fetch strategy and delays from the run config. */
  static fromConfig(config: ScrapeConfig): ProductScraper {
    const fetcher = createFetcher({
      strategy: config.strategy,
      timeout: config.timeout,
      headless: config.headless,
      browserPath: config.browserPath,
    });
    const limiter = new RateLimiter({
      minDelayMs: config.minDelayMs,
      maxDelayMs: config.maxDelayMs,
    });
    return new ProductScraper(fetcher, limiter, config);
  }

  /**
   * Search each keyword in turn. A failing keyword does not stop the
   * others; once `signal` aborts, remaining keywords are reported as
   * cancelled with no records.
   */
  async search(keywords: string[], options: SearchOptions = {}): Promise<KeywordResult[]> {
    const results: KeywordResult[] = [];
    for (const keyword of keywords) {
      const result = await collectKeyword(
        keyword,
        { maxPages: this.settings.maxPages, maxProducts: this.settings.maxProducts },
        {
          fetcher: this.fetcher,
          limiter: this.limiter,
          baseUrl: this.settings.baseUrl,
          affiliateId: this.settings.affiliateId,
          signal: options.signal,
          onPage: options.onPage,
        }
      );
      results.push(result);
      options.onKeywordDone?.(result);
    }
    return results;
  }

  close(): Promise<void> {
    return this.fetcher.close();
  }
}

/**
 * Run `fn` with a scraper and release its fetcher afterwards,
 * whether `fn` resolves or rejects.
 */
export async function withScraper<T>(
  scraper: ProductScraper,
  fn: (scraper: ProductScraper) => Promise<T>
): Promise<T> {
  try {
    return await fn(scraper);
  } finally {
    await scraper.close();
  }
}
