#!/usr/bin/env node
import { ScrapeConfig, PageProgress, KeywordResult } from "./types";
import { ConfigError } from "./errors";
import { HELP_TEXT, buildConfig, parseArgs } from "./cli";
import { ProductScraper, withScraper } from "./scraper";
import { aggregate } from "./product/aggregator";
import { exportRecords, exportSummary } from "./product/exporter";
import { buildSummary, exitCodeFor } from "./summary";
import { formatDuration, getErrorMessage } from "./core/utils";

/**
 * Parse and validate CLI input. Prints the problem and returns null on
 * a configuration error, before anything touches the network.
 */
function loadConfig(argv: string[]): ScrapeConfig | "help" | null {
  try {
    const args = parseArgs(argv);
    if (args.flags.has("help")) return "help";
    return buildConfig(args);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      return null;
    }
    throw err;
  }
}

function logPage(progress: PageProgress): void {
  if (progress.success) {
    console.log(
      `   + [${progress.keyword}] page ${progress.page}: ${progress.found} found, ${progress.kept} kept (${progress.total} total)`
    );
  } else {
    console.log(
      `   x [${progress.keyword}] page ${progress.page}: ${progress.error.kind} - ${progress.error.message}`
    );
  }
}

function logKeywordDone(result: KeywordResult): void {
  const stop = result.error ? `stopped: ${result.error.kind}` : `stopped: ${result.stopReason}`;
  console.log(`   "${result.keyword}": ${result.records.length} products (${stop})\n`);
}

async function main(): Promise<number> {
  const config = loadConfig(process.argv.slice(2));
  if (config === "help") {
    console.log(HELP_TEXT);
    return 0;
  }
  if (config === null) return 2;

  const strategyLabel = config.strategy === "browser"
    ? `Browser${config.headless ? " (headless)" : ""}`
    : "HTTP";
  console.log(`Product Search Scraper v1.0  [Fetch: ${strategyLabel}]\n`);

  // ── Step 1: Keywords ──────────────────────────────────────────────
  console.log(`Step 1: ${config.keywords.length} keyword(s)`);
  for (const keyword of config.keywords) console.log(`   - ${keyword}`);
  console.log(
    `   Limits: ${config.maxPages} page(s), ${config.maxProducts} product(s) per keyword\n`
  );

  // ── Step 2: Search ────────────────────────────────────────────────
  const controller = new AbortController();
  const onInterrupt = () => {
    console.warn("\n   Interrupted: stopping after the current page, collected products are kept");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  let deadline: NodeJS.Timeout | undefined;
  if (config.maxDurationMs !== null) {
    deadline = setTimeout(() => {
      console.warn(`\n   Time limit reached (${formatDuration(config.maxDurationMs ?? 0)}), stopping`);
      controller.abort();
    }, config.maxDurationMs);
    deadline.unref();
  }

  console.log("Step 2: Searching...");
  const startTime = Date.now();

  let results: KeywordResult[];
  try {
    results = await withScraper(ProductScraper.fromConfig(config), (scraper) =>
      scraper.search(config.keywords, {
        signal: controller.signal,
        onPage: logPage,
        onKeywordDone: logKeywordDone,
      })
    );
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    clearTimeout(deadline);
  }

  const elapsed = Date.now() - startTime;

  // ── Step 3: Export ────────────────────────────────────────────────
  console.log("Step 3: Exporting...");
  const records = aggregate(results, { dedupe: config.dedupe });
  const collected = results.reduce((n, r) => n + r.records.length, 0);
  if (config.dedupe && records.length < collected) {
    console.log(`   After dedupe: ${records.length} of ${collected} products`);
  }
  if (records.length === 0) {
    console.warn("   Warning: no products were collected, output files will be empty");
  }

  const outputFiles: string[] = [];
  const outputErrors: string[] = [];
  for (const outcome of exportRecords(records, config.output, config.formats)) {
    if (outcome.success) {
      outputFiles.push(outcome.path);
      console.log(`   ${outcome.path} (${outcome.count} products)`);
    } else {
      outputErrors.push(`${outcome.format}: ${outcome.error.message}`);
      console.error(`   x ${outcome.format.toUpperCase()} not written: ${outcome.error.message}`);
    }
  }

  const summary = buildSummary(results, {
    totalRecords: records.length,
    dedupe: config.dedupe,
    elapsedMs: elapsed,
    outputFiles,
    outputErrors,
  });
  try {
    const summaryPath = exportSummary(summary, config.output);
    console.log(`   ${summaryPath}`);
  } catch (err) {
    console.error(`   x Summary not written: ${getErrorMessage(err)}`);
  }

  // ── Done ──────────────────────────────────────────────────────────
  console.log(`\nDone in ${formatDuration(elapsed)}${summary.cancelled ? " (cancelled)" : ""}`);
  for (const k of summary.keywords) {
    const icon = k.error ? "x" : "+";
    console.log(`   ${icon} ${k.keyword}: ${k.records} products, ${k.pages} page(s)${k.error ? ` - ${k.error}` : ""}`);
  }
  console.log(`   Products: ${summary.total_records}`);
  console.log(`   Errors:   ${summary.failed_keywords}/${summary.total_keywords} keywords`);

  return exitCodeFor(results);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(`\nFatal: ${getErrorMessage(err)}`);
    process.exitCode = 1;
  }
);
