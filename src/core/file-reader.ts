import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";
import { parseCsv } from "./csv";
import { deduplicateKeywords } from "./utils";

const KEYWORD_COLUMN_NAMES = ["keyword", "keywords", "search", "query", "term"];

/**
 * Read search keywords from a TXT, CSV or XLSX file.
 * @param filePath  Absolute or relative path to the file.
 * @param columnName  Optional header name of the keyword column (CSV/XLSX).
 */
export function readKeywordsFromFile(filePath: string, columnName?: string): string[] {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".txt") {
    return readTxt(filePath);
  } else if (ext === ".csv") {
    return readCsv(filePath, columnName);
  } else if (ext === ".xlsx" || ext === ".xls") {
    return readXlsx(filePath, columnName);
  } else {
    throw new Error(
      `Unsupported file type "${ext}". Only .txt, .csv and .xlsx/.xls are supported.`
    );
  }
}

// ── Internals ────────────────────────────────────────────────────────────────

function findKeywordColumn(headers: string[], preferred?: string): number {
  if (preferred) {
    const idx = headers.findIndex(
      (h) => h.trim().toLowerCase() === preferred.trim().toLowerCase()
    );
    if (idx === -1) {
      throw new Error(
        `Column "${preferred}" not found.\n` +
          `   Available headers: ${headers.map((h) => `"${h}"`).join(", ")}`
      );
    }
    return idx;
  }

  for (const name of KEYWORD_COLUMN_NAMES) {
    const idx = headers.findIndex((h) => h.trim().toLowerCase() === name);
    if (idx !== -1) return idx;
  }

  throw new Error(
    `No keyword column found automatically.\n` +
      `   Headers present: ${headers.map((h) => `"${h}"`).join(", ")}\n` +
      `   Re-run with --column=<name> to specify the correct column.`
  );
}

function readTxt(filePath: string): string[] {
  const raw = fs.readFileSync(filePath, "utf-8");
  const lines = raw
    .split(/\r?\n/)
    .map((l) => l.replace(/^\uFEFF/, "").trim())
    .filter((l) => l !== "" && !l.startsWith("#"));
  return deduplicateKeywords(lines);
}

function readCsv(filePath: string, columnName?: string): string[] {
  const rows = parseCsv(fs.readFileSync(filePath, "utf-8"));
  if (rows.length === 0) {
    throw new Error(`File "${filePath}" is empty.`);
  }

  const colIdx = findKeywordColumn(rows[0], columnName);
  return deduplicateKeywords(rows.slice(1).map((fields) => fields[colIdx] ?? ""));
}

function readXlsx(filePath: string, columnName?: string): string[] {
  const wb = XLSX.readFile(filePath);
  const sheetName = wb.SheetNames[0];
  const ws = sheetName ? wb.Sheets[sheetName] : undefined;
  if (!ws) {
    throw new Error(`File "${filePath}" has no sheets.`);
  }

  // header:1 → array of arrays; first row is headers
  const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1 });
  if (rows.length === 0) {
    throw new Error(`File "${filePath}" is empty or has no sheet data.`);
  }

  const headers = rows[0].map((h) => String(h ?? ""));
  const colIdx = findKeywordColumn(headers, columnName);
  return deduplicateKeywords(rows.slice(1).map((row) => String(row[colIdx] ?? "")));
}
