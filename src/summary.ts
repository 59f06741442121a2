import { formatDuration } from "./core/utils";
import { KeywordResult, RunSummary } from "./types";

/**
 * Collect run statistics for the console report and <output>_summary.json.
 */
export function buildSummary(
  results: KeywordResult[],
  run: {
    totalRecords: number;
    dedupe: boolean;
    elapsedMs: number;
    outputFiles: string[];
    outputErrors: string[];
  }
): RunSummary {
  return {
    keywords: results.map((r) => ({
      keyword: r.keyword,
      records: r.records.length,
      pages: r.pagesFetched,
      stop_reason: r.stopReason,
      error: r.error ? `${r.error.kind}: ${r.error.message}` : null,
    })),
    total_records: run.totalRecords,
    total_keywords: results.length,
    failed_keywords: results.filter((r) => r.error !== null).length,
    deduplicated: run.dedupe,
    cancelled: results.some((r) => r.cancelled),
    elapsed_time: formatDuration(run.elapsedMs),
    output_files: run.outputFiles,
    output_errors: run.outputErrors,
    scraped_at: new Date().toISOString(),
  };
}

/**
 * 0 for a completed run, even one that found nothing; 1 when every
 * keyword failed to fetch before a single record was collected.
 */
export function exitCodeFor(results: KeywordResult[]): number {
  const fatal =
    results.length > 0 &&
    results.every((r) => r.error !== null && r.records.length === 0);
  return fatal ? 1 : 0;
}
