import * as cheerio from "cheerio";
import { isTag } from "domhandler";
import type { AnyNode, Element } from "domhandler";
import { ProductRecord } from "../types";
import { cleanText } from "../core/utils";
import { extractAsin, resolveProductUrl } from "./search";

type Listing = cheerio.Cheerio<Element>;

export interface ParseOptions {
  /** Origin used to resolve relative links, e.g. https://www.amazon.com */
  baseUrl: string;
  affiliateId?: string | null;
}

/** Listing containers, tried in order until one matches */
const CONTAINER_SELECTORS = [
  "div[data-component-type='s-search-result']",
  "div.s-result-item[data-asin]:not([data-asin=''])",
];

const TITLE_SELECTORS = [
  "h2 a span",
  "h2 span",
  "h2",
  "a.a-link-normal span.a-text-normal",
  "span.a-size-medium.a-text-normal",
  "span.a-size-base-plus.a-text-normal",
];

const LINK_SELECTORS = [
  "h2 a[href]",
  "a[href]:has(h2)",
  "a.a-link-normal.s-no-outline[href]",
  "a[href*='/dp/']",
  "a.a-link-normal[href]",
];

const PRICE_SELECTORS = [
  "span.a-price:not(.a-text-price) span.a-offscreen",
  "span.a-price span.a-offscreen",
  "span.a-price-whole",
];

const RATING_SELECTORS = ["i[class*='a-star'] span.a-icon-alt", "span.a-icon-alt"];

const REVIEW_LABEL_SELECTORS = ["[aria-label$=' ratings']", "[aria-label$=' rating']"];

const REVIEW_TEXT_SELECTORS = [
  "a[href*='customerReviews'] span",
  "span.a-size-base.s-underline-text",
  "span.a-size-small span.a-link-normal",
];

const IMAGE_SELECTORS = ["img.s-image", "img"];

/**
 * Run one field extraction; any failure becomes the missing value
 * so a single odd field never loses the rest of the listing.
 */
function field<T>(extract: () => T | null): T | null {
  try {
    return extract();
  } catch {
    return null;
  }
}

function firstText(node: Listing, selectors: string[]): string | null {
  for (const sel of selectors) {
    const text = cleanText(node.find(sel).first().text());
    if (text) return text;
  }
  return null;
}

/**
 * "$1,299.99" → "1299.99", "1.299,99 €" → "1299.99". Currency symbols
 * and thousands separators are dropped; a comma followed by one or two
 * final digits is the decimal mark. Null when no digits remain.
 */
export function normalizePrice(raw: string): string | null {
  const s = raw.replace(/[^\d.,]/g, "").replace(/^[.,]+|[.,]+$/g, "");
  const decimalComma = /^(.*),(\d{1,2})$/.exec(s);
  const normalized = decimalComma
    ? `${decimalComma[1].replace(/[.,]/g, "")}.${decimalComma[2]}`
    : s.replace(/,/g, "").replace(/\.(?=\d{3}(?:\.|$))/g, "");
  const match = /\d+(?:\.\d+)?/.exec(normalized);
  return match ? match[0] : null;
}

/**
 * "4.6 out of 5 stars" → 4.6. Values outside 0–5 are rejected.
 */
export function parseRating(raw: string): number | null {
  const match = /(\d+(?:\.\d+)?)\s*out of\s*5/i.exec(raw) ?? /^\s*(\d+(?:\.\d+)?)/.exec(raw);
  if (!match) return null;
  const rating = parseFloat(match[1]);
  return rating >= 0 && rating <= 5 ? rating : null;
}

/**
 * "28,453", "(28,453)", "28,453 ratings" → 28453; "(2.1K)" → 2100.
 */
export function parseReviewCount(raw: string): number | null {
  const match = /(\d[\d,]*(?:\.\d+)?)\s*([kKmM])?(?![a-zA-Z])/.exec(raw);
  if (!match) return null;
  const base = parseFloat(match[1].replace(/,/g, ""));
  if (isNaN(base)) return null;
  const suffix = (match[2] ?? "").toLowerCase();
  const multiplier = suffix === "k" ? 1_000 : suffix === "m" ? 1_000_000 : 1;
  const count = Math.round(base * multiplier);
  return Number.isSafeInteger(count) && count >= 0 ? count : null;
}

function extractUrl(node: Listing, options: ParseOptions): string | null {
  for (const sel of LINK_SELECTORS) {
    const href = node.find(sel).first().attr("href");
    if (!href) continue;
    const url = resolveProductUrl(href, options.baseUrl, options.affiliateId ?? null);
    if (url) return url;
  }
  return null;
}

function extractPrice(node: Listing): string | null {
  for (const sel of PRICE_SELECTORS) {
    const price = normalizePrice(node.find(sel).first().text());
    if (price) return price;
  }
  return null;
}

function extractRating(node: Listing): number | null {
  // span.a-icon-alt also carries badges such as "Amazon Prime"
  for (const sel of RATING_SELECTORS) {
    const matches = node.find(sel);
    for (let i = 0; i < matches.length; i++) {
      const rating = parseRating(cleanText(matches.eq(i).text()));
      if (rating !== null) return rating;
    }
  }

  const label = node.find("[aria-label*='out of 5 stars']").first().attr("aria-label");
  return label ? parseRating(label) : null;
}

function extractReviewCount(node: Listing): number | null {
  for (const sel of REVIEW_LABEL_SELECTORS) {
    const label = node.find(sel).first().attr("aria-label");
    if (label) {
      const count = parseReviewCount(label);
      if (count !== null) return count;
    }
  }
  const text = firstText(node, REVIEW_TEXT_SELECTORS);
  return text ? parseReviewCount(text) : null;
}

function extractImage(node: Listing, baseUrl: string): string | null {
  for (const sel of IMAGE_SELECTORS) {
    const src = node.find(sel).first().attr("src")?.trim();
    if (src) return new URL(src, baseUrl).href;
  }
  return null;
}

/**
 * Build one record from a listing node, or null when it has no usable link.
 */
function extractListing(
  node: Listing,
  keyword: string,
  options: ParseOptions
): ProductRecord | null {
  const url = field(() => extractUrl(node, options));
  if (!url) return null;

  return {
    title: field(() => firstText(node, TITLE_SELECTORS)),
    price: field(() => extractPrice(node)),
    rating: field(() => extractRating(node)),
    reviews_count: field(() => extractReviewCount(node)),
    url,
    image_url: field(() => extractImage(node, options.baseUrl)),
    asin: extractAsin(url),
    search_keyword: keyword,
  };
}

const isElement = (_: number, node: AnyNode): node is Element => isTag(node);

function findListings($: cheerio.CheerioAPI): Listing {
  for (const sel of CONTAINER_SELECTORS) {
    const found = $(sel).filter(isElement);
    if (found.length > 0) return found;
  }
  return $(CONTAINER_SELECTORS[0]).filter(isElement);
}

/**
 * Extract every product listing from a search-results page, in page order.
 * Listings without a resolvable link are skipped; every other missing
 * field is kept as null.
 */
export function parseSearchPage(
  html: string,
  keyword: string,
  options: ParseOptions
): ProductRecord[] {
  const $ = cheerio.load(html);
  const records: ProductRecord[] = [];

  findListings($).each((_, el) => {
    const record = extractListing($(el), keyword, options);
    if (record) records.push(record);
  });

  return records;
}
