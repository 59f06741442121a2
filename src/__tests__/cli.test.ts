import * as path from "path";
import { describe, test, expect } from "vitest";
import { buildConfig, parseArgs, DEFAULT_CONFIG } from "../cli";
import { ConfigError } from "../errors";

function configFor(argv: string[], readKeywords?: (file: string, column?: string) => string[]) {
  return buildConfig(parseArgs(argv), readKeywords);
}

function configError(argv: string[]): string {
  try {
    configFor(argv);
  } catch (err) {
    if (err instanceof ConfigError) return err.message;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("parseArgs", () => {
  test("accepts --key=value, --key value, flags and positionals", () => {
    const args = parseArgs(["usb hub", "--max-pages=2", "--output", "out/run", "--dedupe", "mouse"]);
    expect(args.positionals).toEqual(["usb hub", "mouse"]);
    expect(args.options).toEqual({ "max-pages": "2", output: "out/run" });
    expect([...args.flags]).toEqual(["dedupe"]);
  });

  test("--keywords collects values up to the next option", () => {
    const args = parseArgs(["--keywords", "usb hub", "mouse", "--format=csv"]);
    expect(args.positionals).toEqual(["usb hub", "mouse"]);
    expect(args.options.format).toBe("csv");
  });

  test("rejects unknown options, valued flags and missing values", () => {
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown option --verbose (see --help)");
    expect(() => parseArgs(["--selenium=yes"])).toThrow("--selenium does not take a value");
    expect(() => parseArgs(["kw", "--output"])).toThrow("--output needs a value");
    expect(() => parseArgs(["--output", "--dedupe"])).toThrow("--output needs a value");
  });
});

describe("buildConfig", () => {
  test("applies defaults", () => {
    expect(configFor(["usb hub"])).toEqual({
      keywords: ["usb hub"],
      maxPages: DEFAULT_CONFIG.maxPages,
      maxProducts: DEFAULT_CONFIG.maxProducts,
      formats: ["json", "txt", "csv"],
      output: path.resolve("amazon_products"),
      strategy: "http",
      headless: false,
      browserPath: null,
      minDelayMs: 1000,
      maxDelayMs: 3000,
      timeout: 30_000,
      affiliateId: null,
      dedupe: false,
      maxDurationMs: null,
      baseUrl: "https://www.amazon.com",
    });
  });

  test("reads every option", () => {
    const config = configFor([
      "mouse",
      "--max-pages=5",
      "--max-products=100",
      "--format=csv,json",
      "--output=out/run",
      "--selenium",
      "--headless",
      "--browser-path=/usr/bin/chromium",
      "--min-delay=0.5",
      "--max-delay=2",
      "--timeout=10",
      "--affiliate-id=test-tag",
      "--dedupe",
      "--max-duration=90",
      "--base-url=https://www.amazon.co.uk/",
    ]);
    expect(config).toMatchObject({
      maxPages: 5,
      maxProducts: 100,
      formats: ["csv", "json"],
      output: path.resolve("out/run"),
      strategy: "browser",
      headless: true,
      browserPath: "/usr/bin/chromium",
      minDelayMs: 500,
      maxDelayMs: 2000,
      timeout: 10_000,
      affiliateId: "test-tag",
      dedupe: true,
      maxDurationMs: 90_000,
      baseUrl: "https://www.amazon.co.uk",
    });
  });

  test("raises the default max delay to a larger min delay", () => {
    const config = configFor(["mouse", "--min-delay=5"]);
    expect(config.minDelayMs).toBe(5000);
    expect(config.maxDelayMs).toBe(5000);
  });

  test("merges keyword files with positionals and drops repeats", () => {
    const seen: Array<[string, string | undefined]> = [];
    const config = configFor(["mouse", "--input=kw.csv", "--column=term"], (file, column) => {
      seen.push([file, column]);
      return ["keyboard", "Mouse", "monitor"];
    });
    expect(seen).toEqual([["kw.csv", "term"]]);
    expect(config.keywords).toEqual(["mouse", "keyboard", "monitor"]);
  });

  test("wraps keyword file failures", () => {
    expect(() =>
      configFor(["--input=missing.txt"], () => {
        throw new Error("ENOENT: no such file or directory");
      })
    ).toThrow("Could not read keywords from missing.txt: ENOENT: no such file or directory");
  });

  test("rejects invalid combinations before anything runs", () => {
    expect(configError([])).toBe("No keywords given. Pass them as arguments or with --input=<file>.");
    expect(configError(["  "])).toBe("No keywords given. Pass them as arguments or with --input=<file>.");
    expect(configError(["kw", "--headless"])).toBe("--headless only applies together with --selenium");
    expect(configError(["kw", "--browser-path=/bin/chrome"])).toBe(
      "--browser-path only applies together with --selenium"
    );
    expect(configError(["kw", "--column=term"])).toBe("--column only applies together with --input");
  });

  test("rejects bad numbers", () => {
    expect(configError(["kw", "--max-pages=0"])).toBe('--max-pages must be a positive integer, got "0"');
    expect(configError(["kw", "--max-products=ten"])).toBe(
      '--max-products must be a positive integer, got "ten"'
    );
    expect(configError(["kw", "--min-delay=-1"])).toBe(
      '--min-delay must be a non-negative number of seconds, got "-1"'
    );
    expect(configError(["kw", "--min-delay=4", "--max-delay=2"])).toBe(
      "--min-delay (4) is greater than --max-delay (2)"
    );
    expect(configError(["kw", "--timeout=0"])).toBe("--timeout must be greater than 0");
  });

  test("rejects unknown formats and non-http base URLs", () => {
    expect(configError(["kw", "--format=xml"])).toBe('--format must be json, txt, csv or all, got "xml"');
    expect(configError(["kw", "--base-url=ftp://example.com"])).toBe(
      '--base-url must be an http(s) URL, got "ftp://example.com"'
    );
  });

  test("--format=all and repeated formats", () => {
    expect(configFor(["kw", "--format=all"]).formats).toEqual(["json", "txt", "csv"]);
    expect(configFor(["kw", "--format=txt,txt"]).formats).toEqual(["txt"]);
  });
});
