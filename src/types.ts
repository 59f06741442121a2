import type { FetchError } from "./errors";

/** Output formats the exporter can write */
export type OutputFormat = "json" | "txt" | "csv";

/** Which fetch backend a scraper instance uses for its whole lifetime */
export type FetchStrategy = "http" | "browser";

/** CLI configuration after defaults are applied and validated */
export interface ScrapeConfig {
  keywords: string[];
  maxPages: number;
  maxProducts: number;
  formats: OutputFormat[];
  /** Output path without extension, e.g. "./amazon_products" */
  output: string;
  strategy: FetchStrategy;
  headless: boolean;
  browserPath: string | null;
  minDelayMs: number;
  maxDelayMs: number;
  timeout: number;
  affiliateId: string | null;
  dedupe: boolean;
  /** Wall-clock budget for the whole run; null means unlimited */
  maxDurationMs: number | null;
  baseUrl: string;
}

/**
 * One scraped search listing. Missing fields are `null`;
 * only `url` and `search_keyword` are always present.
 */
export interface ProductRecord {
  readonly title: string | null;
  readonly price: string | null;
  readonly rating: number | null;
  readonly reviews_count: number | null;
  readonly url: string;
  readonly image_url: string | null;
  readonly asin: string | null;
  readonly search_keyword: string;
}

/** Why pagination for a keyword ended */
export type StopReason =
  | "max-pages"
  | "max-products"
  | "empty-page"
  | "error"
  | "cancelled";

/** Everything collected for one keyword, including a failure if one stopped it */
export interface KeywordResult {
  keyword: string;
  records: ProductRecord[];
  pagesFetched: number;
  stopReason: StopReason;
  error: FetchError | null;
  cancelled: boolean;
}

/** Reported after each page fetch attempt */
export type PageProgress =
  | { keyword: string; page: number; url: string; success: true; found: number; kept: number; total: number }
  | { keyword: string; page: number; url: string; success: false; error: FetchError };

/** Per-keyword line of the run summary */
export interface KeywordSummary {
  keyword: string;
  records: number;
  pages: number;
  stop_reason: StopReason;
  error: string | null;
}

/** Statistics written to <output>_summary.json after a run */
export interface RunSummary {
  keywords: KeywordSummary[];
  total_records: number;
  total_keywords: number;
  failed_keywords: number;
  deduplicated: boolean;
  cancelled: boolean;
  elapsed_time: string;
  output_files: string[];
  output_errors: string[];
  scraped_at: string;
}
