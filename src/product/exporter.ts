import * as fs from "fs";
import * as path from "path";
import { SerializeError } from "../errors";
import { BOM, toCsvLine } from "../core/csv";
import { getErrorMessage } from "../core/utils";
import { OutputFormat, ProductRecord, RunSummary } from "../types";

export const CSV_HEADERS = ["Title", "URL", "Price", "Rating", "Search Keyword"];

const TXT_RULE = "=".repeat(50);
const TXT_DIVIDER = "-".repeat(50);

/** Unpaired UTF-16 surrogates cannot be written as UTF-8 */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

export type ExportOutcome =
  | { format: OutputFormat; success: true; path: string; count: number }
  | { format: OutputFormat; success: false; path: string; error: SerializeError };

/**
 * File written for a format, e.g. "out/run" → "out/run_links.csv".
 */
export function outputPath(base: string, format: OutputFormat): string {
  switch (format) {
    case "json":
      return `${base}.json`;
    case "txt":
      return `${base}_links.txt`;
    case "csv":
      return `${base}_links.csv`;
  }
}

/** Pretty-printed array of full records; missing fields stay null. */
export function renderJson(records: readonly ProductRecord[]): string {
  return JSON.stringify(records, null, 2) + "\n";
}

/** Numbered, human-readable link list. */
export function renderTxt(records: readonly ProductRecord[]): string {
  const show = (value: string | number | null) => (value == null ? "N/A" : String(value));
  const blocks = records.map((r, i) =>
    [
      `${i + 1}. ${show(r.title)}`,
      `   Link: ${r.url}`,
      `   Price: ${show(r.price)}`,
      `   Rating: ${show(r.rating)}`,
      `   Keyword: ${r.search_keyword}`,
      TXT_DIVIDER,
      "",
    ].join("\n")
  );
  return ["PRODUCT LINKS", TXT_RULE, "", ...blocks].join("\n") + "\n";
}

/**
 * Link/price export: Title, URL, Price, Rating, Search Keyword.
 * ASIN, image and review count are left to the JSON file.
 */
export function renderCsv(records: readonly ProductRecord[]): string {
  const lines = [
    BOM + toCsvLine(CSV_HEADERS),
    ...records.map((r) => toCsvLine([r.title, r.url, r.price, r.rating, r.search_keyword])),
  ];
  return lines.join("\n") + "\n";
}

function render(records: readonly ProductRecord[], format: OutputFormat): string {
  switch (format) {
    case "json":
      return renderJson(records);
    case "txt":
      return renderTxt(records);
    case "csv":
      return renderCsv(records);
  }
}

/**
 * Write a whole file or nothing: content goes to a temporary sibling
 * that is renamed over the target once fully written.
 * @throws SerializeError
 */
export function writeFileAtomic(filePath: string, content: string): void {
  if (LONE_SURROGATE.test(content)) {
    throw new SerializeError(
      "encoding",
      filePath,
      `Cannot encode ${path.basename(filePath)} as UTF-8: unpaired surrogate in text`
    );
  }

  const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmpPath, content, "utf-8");
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    let message = `Failed to write ${filePath}: ${getErrorMessage(err)}`;
    try {
      fs.rmSync(tmpPath, { force: true });
    } catch (rmErr) {
      message += ` (temporary file ${tmpPath} left behind: ${getErrorMessage(rmErr)})`;
    }
    throw new SerializeError("io", filePath, message, { cause: err });
  }
}

/**
 * Serialize records in one format to `filePath`.
 * @throws SerializeError
 */
export function writeRecords(
  records: readonly ProductRecord[],
  filePath: string,
  format: OutputFormat
): void {
  writeFileAtomic(filePath, render(records, format));
}

/**
 * Write every requested format next to `base`. Each format succeeds or
 * fails on its own; one failure does not stop the others.
 */
export function exportRecords(
  records: readonly ProductRecord[],
  base: string,
  formats: readonly OutputFormat[]
): ExportOutcome[] {
  return formats.map((format): ExportOutcome => {
    const filePath = outputPath(base, format);
    try {
      writeRecords(records, filePath, format);
      return { format, success: true, path: filePath, count: records.length };
    } catch (err) {
      const error =
        err instanceof SerializeError
          ? err
          : new SerializeError("io", filePath, getErrorMessage(err), { cause: err });
      return { format, success: false, path: filePath, error };
    }
  });
}

/**
 * Write run statistics to <base>_summary.json.
 * @returns Path to the written file
 */
export function exportSummary(summary: RunSummary, base: string): string {
  const filePath = `${base}_summary.json`;
  writeFileAtomic(filePath, JSON.stringify(summary, null, 2) + "\n");
  return filePath;
}
