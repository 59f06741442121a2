/** Product identifier segments: /dp/<ASIN>, /gp/product/<ASIN>, /product-reviews/<ASIN> */
const ASIN_PATH_PATTERN = /\/(?:dp|gp\/product|product-reviews)\/([A-Z0-9]{10})(?=[/?#]|$)/;

/** Sponsored listings link through a click tracker that carries the real path in `url` */
const SPONSORED_REDIRECT_PATH = /^\/sspa\/click/;

/**
 * Build the search-results URL for a keyword and 1-based page number,
 * e.g. https://www.amazon.com/s?k=usb+hub&page=2&ref=sr_pg_2
 */
export function buildSearchUrl(baseUrl: string, keyword: string, page: number): string {
  const url = new URL("/s", baseUrl);
  url.searchParams.set("k", keyword);
  url.searchParams.set("page", String(page));
  url.searchParams.set("ref", `sr_pg_${page}`);
  return url.href;
}

/**
 * Read the ASIN from a product URL's path. Returns null when the path
 * carries no product segment; the identifier is never guessed.
 */
export function extractAsin(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const match = ASIN_PATH_PATTERN.exec(pathname);
  return match ? match[1] : null;
}

/**
 * Resolve a listing href into an absolute product URL.
 * Sponsored click-tracker links are unwrapped to the product path, and
 * the affiliate `tag` query parameter is set when an affiliate id is given.
 * @returns null when the href cannot be resolved to an http(s) URL
 */
export function resolveProductUrl(
  href: string,
  baseUrl: string,
  affiliateId: string | null = null
): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith("javascript:")) {
    return null;
  }

  let url: URL;
  try {
    url = new URL(trimmed, baseUrl);
    if (SPONSORED_REDIRECT_PATH.test(url.pathname)) {
      const target = url.searchParams.get("url");
      if (target) url = new URL(target, url.origin);
    }
  } catch {
    return null;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") return null;

  if (affiliateId) {
    url.searchParams.set("tag", affiliateId);
  }
  return url.href;
}
