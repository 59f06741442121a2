import { FetchError } from "../../errors";
import { Fetcher } from "../../core/fetcher";
import { ProductRecord } from "../../types";

export const BASE_URL = "https://www.amazon.com";

export interface ListingFixture {
  asin?: string;
  title?: string;
  /** Explicit href; null renders a listing with no link at all */
  href?: string | null;
  price?: string;
  rating?: string;
  reviews?: string;
  image?: string;
}

/** One search-result node in the site's markup */
export function listingHtml(l: ListingFixture): string {
  const parts: string[] = [];
  if (l.href !== null) {
    const href = l.href ?? `/Sample-Widget/dp/${l.asin ?? "B000000000"}/ref=sr_1_1?keywords=widget`;
    parts.push(
      `<h2 class="a-size-mini"><a class="a-link-normal" href="${href}"><span class="a-size-medium a-text-normal">${l.title ?? ""}</span></a></h2>`
    );
  } else if (l.title) {
    parts.push(`<h2><span>${l.title}</span></h2>`);
  }
  if (l.image) parts.push(`<img class="s-image" src="${l.image}">`);
  if (l.price) parts.push(`<span class="a-price"><span class="a-offscreen">${l.price}</span></span>`);
  if (l.rating) {
    parts.push(
      `<i class="a-icon a-icon-star-small a-star-small-4-5"><span class="a-icon-alt">${l.rating}</span></i>`
    );
  }
  if (l.reviews) {
    parts.push(
      `<span aria-label="${l.reviews} ratings"><span class="a-size-base s-underline-text">${l.reviews}</span></span>`
    );
  }
  return `<div data-component-type="s-search-result" data-asin="${l.asin ?? ""}">${parts.join("")}</div>`;
}

export function searchPageHtml(listings: ListingFixture[]): string {
  return `<!doctype html><html><body><div class="s-main-slot">${listings
    .map(listingHtml)
    .join("\n")}</div></body></html>`;
}

/** A page of `count` complete listings with ASINs unique per page */
export function fullPage(page: number, count: number): string {
  const listings: ListingFixture[] = [];
  for (let i = 0; i < count; i++) {
    listings.push({
      asin: `B${String(page).padStart(2, "0")}${String(i).padStart(7, "0")}`,
      title: `Widget ${page}-${i}`,
      price: "$19.99",
      rating: "4.5 out of 5 stars",
      reviews: "1,024",
    });
  }
  return searchPageHtml(listings);
}

/**
 * In-memory fetcher serving search pages by their `page` query parameter.
 * A page mapped to an Error rejects with it.
 */
export class FakeFetcher implements Fetcher {
  readonly strategy = "http" as const;
  readonly requested: Array<{ url: string; userAgent: string }> = [];
  closeCalls = 0;
  private readonly pages: Map<number, string | Error>;

  constructor(pages: Record<number, string | Error>) {
    this.pages = new Map(Object.entries(pages).map(([k, v]) => [Number(k), v]));
  }

  async fetch(url: string, userAgent: string): Promise<string> {
    this.requested.push({ url, userAgent });
    const page = Number(new URL(url).searchParams.get("page"));
    const html = this.pages.get(page);
    if (html instanceof Error) throw html;
    if (html === undefined) throw new FetchError("network", url, "HTTP 404: Not Found", { status: 404 });
    return html;
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

export function record(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    title: "Sample Widget",
    price: "19.99",
    rating: 4.5,
    reviews_count: 1024,
    url: `${BASE_URL}/Sample-Widget/dp/B0863TXGM3`,
    image_url: "https://m.media-amazon.com/images/I/widget.jpg",
    asin: "B0863TXGM3",
    search_keyword: "widget",
    ...overrides,
  };
}
