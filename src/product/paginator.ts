import { FetchError } from "../errors";
import { Fetcher } from "../core/fetcher";
import { RateLimiter } from "../core/rate-limiter";
import { getErrorMessage } from "../core/utils";
import { KeywordResult, PageProgress, ProductRecord, StopReason } from "../types";
import { parseSearchPage } from "./extractor";
import { buildSearchUrl } from "./search";

export interface PaginationLimits {
  maxPages: number;
  /** Cap on records kept for this keyword */
  maxProducts: number;
}

export interface PaginationDeps {
  fetcher: Fetcher;
  limiter: RateLimiter;
  baseUrl: string;
  affiliateId?: string | null;
  signal?: AbortSignal;
  onPage?: (progress: PageProgress) => void;
}

/**
 * Walk the search pages for one keyword, page 1 upward.
 *
 * Stops after `maxPages` pages, once `maxProducts` records are held, on
 * the first page that yields nothing, on a fetch failure or when `signal`
 * aborts. Never rejects for fetch failures: the error is returned next to
 * whatever was collected before it.
 */
export async function collectKeyword(
  keyword: string,
  limits: PaginationLimits,
  deps: PaginationDeps
): Promise<KeywordResult> {
  const records: ProductRecord[] = [];
  let pagesFetched = 0;

  const finish = (stopReason: StopReason, error: FetchError | null = null): KeywordResult => ({
    keyword,
    records,
    pagesFetched,
    stopReason,
    error,
    cancelled: stopReason === "cancelled",
  });

  if (limits.maxProducts <= 0) return finish("max-products");

  for (let page = 1; page <= limits.maxPages; page++) {
    if (deps.signal?.aborted) return finish("cancelled");

    const url = buildSearchUrl(deps.baseUrl, keyword, page);
    const userAgent = await deps.limiter.beforeRequest();
    if (deps.signal?.aborted) return finish("cancelled");

    let html: string;
    try {
      html = await deps.fetcher.fetch(url, userAgent);
    } catch (err) {
      const error =
        err instanceof FetchError
          ? err
          : new FetchError("network", url, getErrorMessage(err), { cause: err });
      deps.onPage?.({ keyword, page, url, success: false, error });
      return finish("error", error);
    }
    pagesFetched++;

    const found = parseSearchPage(html, keyword, {
      baseUrl: deps.baseUrl,
      affiliateId: deps.affiliateId,
    });
    const kept = found.slice(0, limits.maxProducts - records.length);
    records.push(...kept);

    deps.onPage?.({
      keyword,
      page,
      url,
      success: true,
      found: found.length,
      kept: kept.length,
      total: records.length,
    });

    if (found.length === 0) return finish("empty-page");
    if (records.length >= limits.maxProducts) return finish("max-products");
  }

  return finish("max-pages");
}
