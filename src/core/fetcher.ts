import { AxiosInstance } from "axios";
import { chromium } from "playwright-core";
import { FetchError } from "../errors";
import { FetchStrategy } from "../types";
import { createHttpClient, getErrorMessage, getErrorStatus } from "./utils";

/** Retrieves raw HTML for a URL. One strategy per scraper instance. */
export interface Fetcher {
  readonly strategy: FetchStrategy;
  /** @throws FetchError */
  fetch(url: string, userAgent: string): Promise<string>;
  /** Release held resources. Safe to call more than once. */
  close(): Promise<void>;
}

/** Status codes the site uses to throttle scrapers */
const BLOCKED_STATUSES = new Set([429, 503]);

/** Text fragments that only appear on robot-check pages */
const CAPTCHA_MARKERS = [
  "/errors/validateCaptcha",
  "Enter the characters you see below",
  "Type the characters you see in this image",
  "To discuss automated access to Amazon data",
];

/** Selector whose presence means search results have rendered */
export const RESULTS_READY_SELECTOR = "div[data-component-type='s-search-result']";

/**
 * Return the matched robot-check marker, or null for a normal page.
 */
export function detectCaptcha(html: string): string | null {
  return CAPTCHA_MARKERS.find((marker) => html.includes(marker)) ?? null;
}

function assertNotBlocked(html: string, url: string): void {
  const marker = detectCaptcha(html);
  if (marker) {
    throw new FetchError("blocked", url, `Robot check page served ("${marker}")`);
  }
}

// ── Direct strategy ──────────────────────────────────────────────────────────

/**
 * Plain GET through axios. Non-2xx and transport failures become
 * FetchError("network"); 429/503 become FetchError("blocked").
 */
export class HttpFetcher implements Fetcher {
  readonly strategy = "http" as const;
  private readonly http: AxiosInstance;

  constructor(http: AxiosInstance) {
    this.http = http;
  }

  async fetch(url: string, userAgent: string): Promise<string> {
    let html: string;
    try {
      const response = await this.http.get<string>(url, {
        headers: { "User-Agent": userAgent },
        responseType: "text",
      });
      html = typeof response.data === "string" ? response.data : String(response.data);
    } catch (err) {
      const status = getErrorStatus(err);
      const kind = status !== null && BLOCKED_STATUSES.has(status) ? "blocked" : "network";
      throw new FetchError(kind, url, getErrorMessage(err), { status, cause: err });
    }
    assertNotBlocked(html, url);
    return html;
  }

  async close(): Promise<void> {
    // nothing held between requests
  }
}

// ── Rendered strategy ────────────────────────────────────────────────────────

/** The slice of a Playwright page the fetcher drives */
export interface BrowserPage {
  setExtraHTTPHeaders(headers: Record<string, string>): Promise<void>;
  goto(
    url: string,
    options?: { timeout?: number; waitUntil?: "load" | "domcontentloaded" }
  ): Promise<{ status(): number } | null>;
  waitForSelector(selector: string, options?: { timeout?: number }): Promise<unknown>;
  content(): Promise<string>;
}

export interface BrowserContextHandle {
  newPage(): Promise<BrowserPage>;
}

export interface BrowserHandle {
  newContext(options?: {
    viewport?: { width: number; height: number };
    locale?: string;
  }): Promise<BrowserContextHandle>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserHandle>;

export interface BrowserFetcherOptions {
  headless: boolean;
  /** Chrome/Chromium executable; null uses the installed Chrome channel */
  browserPath: string | null;
  /** Navigation timeout in milliseconds */
  timeout: number;
  /** How long to wait for result listings after navigation */
  readyTimeout?: number;
}

const CHROME_ARGS = [
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-blink-features=AutomationControlled",
];

interface BrowserSession {
  browser: BrowserHandle;
  page: BrowserPage;
}

function launchChromium(options: BrowserFetcherOptions): BrowserLauncher {
  return () =>
    chromium.launch({
      headless: options.headless,
      ...(options.browserPath
        ? { executablePath: options.browserPath }
        : { channel: "chrome" }),
      args: CHROME_ARGS,
      ignoreDefaultArgs: ["--enable-automation"],
    });
}

/**
 * Drives a real browser for JavaScript-rendered result pages.
 * The browser is launched on the first fetch and kept until close().
 */
export class BrowserFetcher implements Fetcher {
  readonly strategy = "browser" as const;
  private readonly options: BrowserFetcherOptions;
  private readonly launch: BrowserLauncher;
  private session: Promise<BrowserSession> | null = null;
  private closed = false;

  constructor(options: BrowserFetcherOptions, launch?: BrowserLauncher) {
    this.options = options;
    this.launch = launch ?? launchChromium(options);
  }

  async fetch(url: string, userAgent: string): Promise<string> {
    if (this.closed) {
      throw new FetchError("render", url, "Browser session already closed");
    }

    let session: BrowserSession;
    try {
      session = await this.acquire();
    } catch (err) {
      throw new FetchError("render", url, `Browser failed to start: ${getErrorMessage(err)}`, {
        cause: err,
      });
    }
    const { page } = session;

    let status: number | null = null;
    try {
      await page.setExtraHTTPHeaders({ "User-Agent": userAgent });
      const response = await page.goto(url, {
        timeout: this.options.timeout,
        waitUntil: "domcontentloaded",
      });
      status = response ? response.status() : null;
    } catch (err) {
      throw new FetchError("render", url, `Navigation failed: ${getErrorMessage(err)}`, {
        cause: err,
      });
    }

    if (status !== null && BLOCKED_STATUSES.has(status)) {
      throw new FetchError("blocked", url, `HTTP ${status}`, { status });
    }

    // A page without listings is a valid end of results, so a miss here is not fatal.
    await page
      .waitForSelector(RESULTS_READY_SELECTOR, {
        timeout: this.options.readyTimeout ?? 10_000,
      })
      .catch(() => null);

    let html: string;
    try {
      html = await page.content();
    } catch (err) {
      throw new FetchError("render", url, `Browser session lost: ${getErrorMessage(err)}`, {
        cause: err,
      });
    }
    assertNotBlocked(html, url);
    return html;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const pending = this.session;
    this.session = null;
    if (!pending) return;

    // A session that never started has nothing to release.
    const session = await pending.catch(() => null);
    if (session) await session.browser.close();
  }

  private acquire(): Promise<BrowserSession> {
    if (!this.session) {
      this.session = this.open();
    }
    return this.session;
  }

  private async open(): Promise<BrowserSession> {
    const browser = await this.launch();
    try {
      const context = await browser.newContext({
        viewport: { width: 1366, height: 900 },
        locale: "en-US",
      });
      const page = await context.newPage();
      return { browser, page };
    } catch (err) {
      await browser.close();
      throw err;
    }
  }
}

/**
 * Build the fetcher for a run. The strategy is fixed for the fetcher's lifetime.
 */
export function createFetcher(options: {
  strategy: FetchStrategy;
  timeout: number;
  headless: boolean;
  browserPath: string | null;
}): Fetcher {
  if (options.strategy === "browser") {
    return new BrowserFetcher({
      headless: options.headless,
      browserPath: options.browserPath,
      timeout: options.timeout,
    });
  }
  return new HttpFetcher(createHttpClient(options.timeout));
}
