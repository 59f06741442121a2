import * as path from "path";
import { ConfigError } from "./errors";
import { readKeywordsFromFile } from "./core/file-reader";
import { deduplicateKeywords, getErrorMessage } from "./core/utils";
import { OutputFormat, ScrapeConfig } from "./types";

export const DEFAULT_CONFIG = {
  maxPages: 3,
  maxProducts: 50,
  output: "amazon_products",
  minDelaySeconds: 1,
  maxDelaySeconds: 3,
  timeoutSeconds: 30,
  baseUrl: "https://www.amazon.com",
} as const;

const ALL_FORMATS: OutputFormat[] = ["json", "txt", "csv"];

const BOOLEAN_FLAGS = new Set(["selenium", "headless", "dedupe", "help"]);

const VALUE_OPTIONS = new Set([
  "input",
  "column",
  "max-pages",
  "max-products",
  "format",
  "output",
  "browser-path",
  "min-delay",
  "max-delay",
  "timeout",
  "affiliate-id",
  "max-duration",
  "base-url",
]);

export const HELP_TEXT = `Usage: amazon-search-scraper [keywords...] [options]

Search keywords and export the product listings found.

Options:
  --keywords <kw...>      Keywords to search (same as positional arguments)
  --input=<file>          Read keywords from a .txt, .csv or .xlsx file
  --column=<name>         Keyword column in a .csv/.xlsx input file
  --max-pages=<n>         Result pages per keyword (default ${DEFAULT_CONFIG.maxPages})
  --max-products=<n>      Products kept per keyword (default ${DEFAULT_CONFIG.maxProducts})
  --format=<fmt>          json, txt, csv, all, or a comma list (default all)
  --output=<base>         Output path without extension (default ${DEFAULT_CONFIG.output})
  --selenium              Fetch pages through a real browser
  --headless              Hide the browser window (with --selenium only)
  --browser-path=<path>   Chrome/Chromium executable for --selenium
  --min-delay=<s>         Minimum delay before each request (default ${DEFAULT_CONFIG.minDelaySeconds})
  --max-delay=<s>         Maximum delay before each request (default ${DEFAULT_CONFIG.maxDelaySeconds})
  --timeout=<s>           Request / navigation timeout (default ${DEFAULT_CONFIG.timeoutSeconds})
  --affiliate-id=<tag>    Set the affiliate tag on every product link
  --dedupe                Drop products already found under an earlier keyword
  --max-duration=<s>      Stop starting new pages after this many seconds
  --base-url=<url>        Site origin (default ${DEFAULT_CONFIG.baseUrl})
  --help                  Show this message
`;

export interface ParsedArgs {
  positionals: string[];
  options: Record<string, string>;
  flags: Set<string>;
}

/**
 * Split argv into positional keywords, `--key=value` / `--key value`
 * options and boolean flags.
 * @throws ConfigError on unknown options or a missing value
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const options: Record<string, string> = {};
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    const eqIdx = arg.indexOf("=");
    const key = eqIdx === -1 ? arg.slice(2) : arg.slice(2, eqIdx);
    const inline = eqIdx === -1 ? undefined : arg.slice(eqIdx + 1);

    if (BOOLEAN_FLAGS.has(key)) {
      if (inline !== undefined) throw new ConfigError(`--${key} does not take a value`);
      flags.add(key);
    } else if (key === "keywords") {
      if (inline) positionals.push(inline);
      while (i + 1 < argv.length && !argv[i + 1].startsWith("--")) {
        positionals.push(argv[++i]);
      }
    } else if (VALUE_OPTIONS.has(key)) {
      let value = inline;
      if (value === undefined) {
        const next = argv[i + 1];
        if (next === undefined || next.startsWith("--")) {
          throw new ConfigError(`--${key} needs a value`);
        }
        value = next;
        i++;
      }
      options[key] = value;
    } else {
      throw new ConfigError(`Unknown option --${key} (see --help)`);
    }
  }

  return { positionals, options, flags };
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw.trim()) || parseInt(raw, 10) < 1) {
    throw new ConfigError(`--${name} must be a positive integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function parseSeconds(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`--${name} must be a non-negative number of seconds, got "${raw}"`);
  }
  return value;
}

function parseFormats(raw: string | undefined): OutputFormat[] {
  if (raw === undefined || raw === "all") return [...ALL_FORMATS];
  const formats: OutputFormat[] = [];
  for (const part of raw.split(",").map((p) => p.trim().toLowerCase())) {
    if (part === "all") return [...ALL_FORMATS];
    const format = ALL_FORMATS.find((f) => f === part);
    if (!format) {
      throw new ConfigError(`--format must be json, txt, csv or all, got "${part}"`);
    }
    if (!formats.includes(format)) formats.push(format);
  }
  return formats;
}

function parseBaseUrl(raw: string | undefined): string {
  if (raw === undefined) return DEFAULT_CONFIG.baseUrl;
  if (URL.canParse(raw)) {
    const url = new URL(raw);
    if (url.protocol === "http:" || url.protocol === "https:") return url.origin;
  }
  throw new ConfigError(`--base-url must be an http(s) URL, got "${raw}"`);
}

/**
 * Turn parsed arguments into a validated ScrapeConfig.
 * @param readKeywords - Keyword file reader, replaceable in tests
 * @throws ConfigError
 */
export function buildConfig(
  args: ParsedArgs,
  readKeywords: (file: string, column?: string) => string[] = readKeywordsFromFile
): ScrapeConfig {
  const { options, flags } = args;

  const keywords = [...args.positionals];
  if (options.input) {
    try {
      keywords.push(...readKeywords(options.input, options.column));
    } catch (err) {
      throw new ConfigError(`Could not read keywords from ${options.input}: ${getErrorMessage(err)}`);
    }
  } else if (options.column) {
    throw new ConfigError("--column only applies together with --input");
  }

  const uniqueKeywords = deduplicateKeywords(keywords);
  if (uniqueKeywords.length === 0) {
    throw new ConfigError("No keywords given. Pass them as arguments or with --input=<file>.");
  }

  const selenium = flags.has("selenium");
  if (flags.has("headless") && !selenium) {
    throw new ConfigError("--headless only applies together with --selenium");
  }
  if (options["browser-path"] && !selenium) {
    throw new ConfigError("--browser-path only applies together with --selenium");
  }

  const minDelay = parseSeconds("min-delay", options["min-delay"], DEFAULT_CONFIG.minDelaySeconds);
  const maxDelay = parseSeconds(
    "max-delay",
    options["max-delay"],
    Math.max(minDelay, DEFAULT_CONFIG.maxDelaySeconds)
  );
  if (minDelay > maxDelay) {
    throw new ConfigError(`--min-delay (${minDelay}) is greater than --max-delay (${maxDelay})`);
  }

  const timeout = parseSeconds("timeout", options.timeout, DEFAULT_CONFIG.timeoutSeconds);
  if (timeout === 0) {
    throw new ConfigError("--timeout must be greater than 0");
  }

  const maxDuration =
    options["max-duration"] === undefined
      ? null
      : parseSeconds("max-duration", options["max-duration"], 0);

  const output = options.output?.trim();
  if (options.output !== undefined && !output) {
    throw new ConfigError("--output must not be empty");
  }

  return {
    keywords: uniqueKeywords,
    maxPages: parsePositiveInt("max-pages", options["max-pages"], DEFAULT_CONFIG.maxPages),
    maxProducts: parsePositiveInt("max-products", options["max-products"], DEFAULT_CONFIG.maxProducts),
    formats: parseFormats(options.format),
    output: path.resolve(output || DEFAULT_CONFIG.output),
    strategy: selenium ? "browser" : "http",
    headless: flags.has("headless"),
    browserPath: options["browser-path"] ?? null,
    minDelayMs: Math.round(minDelay * 1000),
    maxDelayMs: Math.round(maxDelay * 1000),
    timeout: Math.round(timeout * 1000),
    affiliateId: options["affiliate-id"]?.trim() || null,
    dedupe: flags.has("dedupe"),
    maxDurationMs: maxDuration === null ? null : Math.round(maxDuration * 1000),
    baseUrl: parseBaseUrl(options["base-url"]),
  };
}
