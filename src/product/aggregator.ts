import { KeywordResult, ProductRecord } from "../types";

/**
 * Concatenate per-keyword results: keyword order, then page order, then
 * listing order. The same product found under two keywords stays twice
 * unless `dedupe` is set, in which case the first occurrence (keyed by
 * ASIN, or URL when there is none) wins.
 */
export function aggregate(
  results: KeywordResult[],
  options: { dedupe?: boolean } = {}
): ProductRecord[] {
  const all = results.flatMap((r) => r.records);
  return options.dedupe ? deduplicateRecords(all) : all;
}

/**
 * Deduplicate records, preserving order of first occurrence.
 */
export function deduplicateRecords(records: ProductRecord[]): ProductRecord[] {
  const seen = new Set<string>();
  const unique: ProductRecord[] = [];
  for (const record of records) {
    const key = record.asin ? `asin:${record.asin}` : `url:${stripQuery(record.url)}`;
    if (!seen.has(key)) {
      seen.add(key);
      unique.push(record);
    }
  }
  return unique;
}

function stripQuery(url: string): string {
  return url.replace(/[?#].*$/, "").replace(/\/$/, "");
}
