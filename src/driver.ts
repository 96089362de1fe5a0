// driver.ts — Browser engine seam
// The dispatcher only talks to PageHandle / BrowserDriver; PlaywrightDriver is the
// production implementation on playwright-core.

import { existsSync } from "node:fs";
import { chromium, errors, type Browser, type BrowserContext, type Page } from "playwright-core";
import { DriverError, errorMessage } from "./errors.js";
import type { TabHandle } from "./registry.js";
import type { PageContent } from "./types.js";

export interface PageHandle extends TabHandle {
  navigate(url: string, timeoutMs: number): Promise<void>;
  click(selector: string, timeoutMs: number): Promise<void>;
  fill(selector: string, text: string, timeoutMs: number): Promise<void>;
  getText(selector: string, timeoutMs: number): Promise<string>;
  waitFor(selector: string, timeoutMs: number): Promise<void>;
  screenshot(path: string, fullPage: boolean): Promise<void>;
  executeScript(code: string): Promise<unknown>;
  getContent(): Promise<PageContent>;
  title(): Promise<string>;
  url(): string;
  bringToFront(): Promise<void>;
  close(): Promise<void>;
}

export interface BrowserDriver<H extends PageHandle = PageHandle> {
  readonly connected: boolean;
  start(): Promise<void>;
  newPage(): Promise<H>;
  stop(): Promise<void>;
}

export const CONTENT_LIMITS = { text: 5000, links: 20, images: 10 } as const;

// --- Error mapping ---

/** Translate a playwright failure into a DriverError with a message a person can act on. */
export function toDriverError(error: unknown, selector: string): DriverError {
  if (error instanceof DriverError) return error;
  const message = errorMessage(error);

  if (error instanceof errors.TimeoutError) {
    return new DriverError(
      "timeout",
      `Element "${selector}" not found or not visible before timeout`,
      { cause: error },
    );
  }

  if (message.includes("strict mode violation")) {
    const countMatch = message.match(/resolved to (\d+) elements/);
    const count = countMatch?.[1] ?? "multiple";
    return new DriverError(
      "failed",
      `Selector "${selector}" matched ${count} elements. Use a more specific selector.`,
      { cause: error },
    );
  }

  if (
    message.includes("intercepts pointer events") ||
    message.includes("not visible") ||
    message.includes("not receive pointer events")
  ) {
    return new DriverError(
      "failed",
      `Element "${selector}" is not interactable (hidden or covered). Try scrolling first.`,
      { cause: error },
    );
  }

  return new DriverError("failed", message, { cause: error });
}

// --- Chrome executable discovery ---

const CHROME_PATHS = [
  "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
  "/Applications/Chromium.app/Contents/MacOS/Chromium",
  "/usr/bin/google-chrome",
  "/usr/bin/google-chrome-stable",
  "/usr/bin/chromium-browser",
  "/usr/bin/chromium",
];

export function findChrome(): string {
  for (const p of CHROME_PATHS) {
    if (existsSync(p)) return p;
  }
  throw new DriverError(
    "failed",
    "Chrome/Chromium not found. Set CHROME_PATH or 'nlbrowse config set executable-path <path>'.",
  );
}

const CHROME_ARGS = [
  "--no-first-run",
  "--no-default-browser-check",
  "--disable-sync",
  "--disable-background-networking",
  "--disable-component-update",
  "--disable-features=Translate,MediaRouter",
  "--disable-blink-features=AutomationControlled",
  "--password-store=basic",
];

const CDP_CONNECT_TIMEOUT_MS = 10_000;

// --- Playwright implementation ---

export class PlaywrightPage implements PageHandle {
  constructor(private readonly page: Page) {}

  async navigate(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { timeout: timeoutMs, waitUntil: "domcontentloaded" });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new DriverError("timeout", `Navigation to "${url}" timed out after ${timeoutMs}ms`, {
          cause: error,
        });
      }
      throw new DriverError("navigation", `Navigation to "${url}" failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async click(selector: string, timeoutMs: number): Promise<void> {
    const locator = this.page.locator(selector).first();
    try {
      await locator.click({ timeout: timeoutMs });
    } catch (error) {
      throw toDriverError(error, selector);
    }
  }

  async fill(selector: string, text: string, timeoutMs: number): Promise<void> {
    const locator = this.page.locator(selector).first();
    try {
      await locator.fill(text, { timeout: timeoutMs });
    } catch (error) {
      throw toDriverError(error, selector);
    }
  }

  async getText(selector: string, timeoutMs: number): Promise<string> {
    const locator = this.page.locator(selector).first();
    try {
      return await locator.innerText({ timeout: timeoutMs });
    } catch (error) {
      throw toDriverError(error, selector);
    }
  }

  async waitFor(selector: string, timeoutMs: number): Promise<void> {
    const locator = this.page.locator(selector).first();
    try {
      await locator.waitFor({ state: "visible", timeout: timeoutMs });
    } catch (error) {
      throw toDriverError(error, selector);
    }
  }

  async screenshot(path: string, fullPage: boolean): Promise<void> {
    try {
      await this.page.screenshot({ path, fullPage });
    } catch (error) {
      throw new DriverError("failed", `Screenshot failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async executeScript(code: string): Promise<unknown> {
    try {
      const value: unknown = await this.page.evaluate(code);
      return value;
    } catch (error) {
      throw new DriverError("failed", `Script failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async getContent(): Promise<PageContent> {
    try {
      const body = await this.page.evaluate((limits) => {
        const text = (document.body?.innerText ?? "").slice(0, limits.text);
        const links = Array.from(document.querySelectorAll<HTMLAnchorElement>("a[href]"))
          .slice(0, limits.links)
          .map((a) => ({ text: (a.textContent ?? "").trim(), href: a.href }));
        const images = Array.from(document.querySelectorAll<HTMLImageElement>("img"))
          .slice(0, limits.images)
          .map((img) => ({ alt: img.alt, src: img.src }));
        return { text, links, images };
      }, CONTENT_LIMITS);
      return { title: await this.page.title(), url: this.page.url(), ...body };
    } catch (error) {
      throw new DriverError("failed", `Reading page content failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  title(): Promise<string> {
    return this.page.title();
  }

  url(): string {
    return this.page.url();
  }

  async bringToFront(): Promise<void> {
    await this.page.bringToFront();
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) await this.page.close();
  }
}

export type PlaywrightDriverOptions = {
  headless: boolean;
  /** Attach over CDP instead of launching. */
  cdpUrl?: string;
  executablePath?: string;
};

export class PlaywrightDriver implements BrowserDriver<PlaywrightPage> {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;

  constructor(private readonly opts: PlaywrightDriverOptions) {}

  get connected(): boolean {
    return this.browser?.isConnected() ?? false;
  }

  async start(): Promise<void> {
    if (this.browser?.isConnected()) return;
    let browser: Browser;
    let context: BrowserContext;
    try {
      if (this.opts.cdpUrl) {
        browser = await chromium.connectOverCDP(this.opts.cdpUrl, { timeout: CDP_CONNECT_TIMEOUT_MS });
        context = browser.contexts()[0] ?? (await browser.newContext());
      } else {
        browser = await chromium.launch({
          headless: this.opts.headless,
          executablePath: this.opts.executablePath || process.env.CHROME_PATH || findChrome(),
          args: CHROME_ARGS,
        });
        context = await browser.newContext();
      }
    } catch (error) {
      if (error instanceof DriverError) throw error;
      throw new DriverError("failed", `Browser failed to start: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    browser.on("disconnected", () => {
      this.browser = null;
      this.context = null;
    });
    this.browser = browser;
    this.context = context;
  }

  async newPage(): Promise<PlaywrightPage> {
    if (!this.context) throw new DriverError("failed", "Browser is not running");
    return new PlaywrightPage(await this.context.newPage());
  }

  async stop(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.context = null;
    if (browser?.isConnected()) await browser.close();
  }
}
