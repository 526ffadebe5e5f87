// lib/scrapping/browser/session.ts
import fs from "fs";
import path from "path";
import { chromium, type BrowserContext, type Page } from "playwright-core";

/**
 * The browser primitives the acquisition code needs. Kept narrow so a fake
 * page can stand in during tests.
 */
export interface BrowserPage {
  goto(url: string, timeoutMs: number): Promise<void>;
  goBack(timeoutMs: number): Promise<void>;
  evaluate(script: string): Promise<void>;
  hasElement(selector: string): Promise<boolean>;
  /** Clicks the first match; false when nothing matches. */
  click(selector: string): Promise<boolean>;
  typeInto(selector: string, text: string, delayMs: number): Promise<boolean>;
  press(key: string): Promise<void>;
  bodyText(): Promise<string>;
  content(): Promise<string>;
  /** href values of anchors whose href starts with the prefix, in page order. */
  linkHrefs(prefix: string): Promise<string[]>;
  clickLink(href: string): Promise<boolean>;
  close(): Promise<void>;
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export const STEALTH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--disable-dev-shm-usage",
  "--no-sandbox",
  "--disable-infobars",
];

const DESKTOP_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36";

function cssString(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

class PlaywrightPage implements BrowserPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
  }

  async goBack(timeoutMs: number): Promise<void> {
    await this.page.goBack({ waitUntil: "domcontentloaded", timeout: timeoutMs });
  }

  async evaluate(script: string): Promise<void> {
    await this.page.evaluate(script);
  }

  async hasElement(selector: string): Promise<boolean> {
    return (await this.page.locator(selector).count()) > 0;
  }

  async click(selector: string): Promise<boolean> {
    const target = this.page.locator(selector).first();
    if ((await target.count()) === 0) return false;
    await target.click({ timeout: 5_000 });
    return true;
  }

  async typeInto(selector: string, text: string, delayMs: number): Promise<boolean> {
    const target = this.page.locator(selector).first();
    if ((await target.count()) === 0) return false;
    await target.click();
    await target.pressSequentially(text, { delay: delayMs });
    return true;
  }

  async press(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async bodyText(): Promise<string> {
    return this.page.innerText("body");
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async linkHrefs(prefix: string): Promise<string[]> {
    const links = this.page.locator(`a[href^="${cssString(prefix)}"]`);
    const count = await links.count();
    const hrefs: string[] = [];
    for (let i = 0; i < count; i++) {
      const href = await links.nth(i).getAttribute("href");
      if (href) hrefs.push(href);
    }
    return hrefs;
  }

  async clickLink(href: string): Promise<boolean> {
    return this.click(`a[href="${cssString(href)}"]`);
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

export interface PlaywrightSessionOptions {
  profileDir: string;
  headless: boolean;
  executablePath: string | null;
}

/**
 * One persistent, profile-backed browser context, launched on first use and
 * reused for every fetch until close().
 */
export class PlaywrightBrowserSession implements BrowserSession {
  private launching: Promise<BrowserContext> | null = null;

  constructor(private readonly options: PlaywrightSessionOptions) {}

  private context(): Promise<BrowserContext> {
    if (!this.launching) {
      const userDataDir = path.resolve(this.options.profileDir);
      fs.mkdirSync(userDataDir, { recursive: true });
      console.log(`🌐 Launching browser (headless=${this.options.headless}, profile=${userDataDir})`);

      this.launching = chromium
        .launchPersistentContext(userDataDir, {
          headless: this.options.headless,
          ...(this.options.executablePath
            ? { executablePath: this.options.executablePath }
            : { channel: "chrome" }),
          args: STEALTH_ARGS,
          viewport: { width: 1920, height: 1080 },
          userAgent: DESKTOP_USER_AGENT,
        })
        .catch((error: unknown) => {
          this.launching = null;
          throw error;
        });
    }
    return this.launching;
  }

  async newPage(): Promise<BrowserPage> {
    const context = await this.context();
    return new PlaywrightPage(await context.newPage());
  }

  async close(): Promise<void> {
    if (!this.launching) return;
    const context = await this.launching;
    this.launching = null;
    await context.close();
  }
}
