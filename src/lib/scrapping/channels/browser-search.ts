// lib/scrapping/channels/browser-search.ts
import { errorMessage } from "../../errors/sourcing-errors";
import type { CircuitBreaker } from "../../utils/circuit-breaker";
import { randomBetween, sleep } from "../../utils/concurrency";
import { ChallengeWaiter } from "../browser/challenge-waiter";
import type { BrowserPage, BrowserSession } from "../browser/session";
import { ProfileChannel, profileUsername, type ProfileTarget } from "./types";

const SEARCH_BOX = 'textarea[name="q"], input[name="q"]';

export type DelayRange = [minMs: number, maxMs: number];

export interface BrowserPolicy {
  searchUrl: string;
  profileLinkPrefix: string;
  navigationTimeoutMs: number;
  /** Retries after an exception, each preceded by retryBackoff. */
  maxRetries: number;
  retryBackoff: DelayRange;
  /** Navigations to the chosen profile link before giving up. */
  linkAttempts: number;
  minHtmlLength: number;
  typeDelay: DelayRange;
  shortPause: DelayRange;
  settlePause: DelayRange;
  overlaySelectors: string[];
  signInMarkers: string[];
}

export const DEFAULT_BROWSER_POLICY: BrowserPolicy = {
  searchUrl: "https://www.google.com",
  profileLinkPrefix: "https://www.linkedin.com/in/",
  navigationTimeoutMs: 30_000,
  maxRetries: 2,
  retryBackoff: [3_000, 6_000],
  linkAttempts: 3,
  minHtmlLength: 15_000,
  typeDelay: [30, 80],
  shortPause: [500, 1_500],
  settlePause: [3_000, 5_000],
  overlaySelectors: [
    'button[aria-label="Dismiss"]',
    'button[data-tracking-control-name="public_profile_contextual-sign-in-modal_modal_dismiss"]',
    "button.contextual-sign-in-modal__modal-dismiss-btn",
    "button.modal__dismiss",
    'button[aria-label="Close"]',
    "button.artdeco-modal__dismiss",
    '[data-tracking-control-name*="dismiss"]',
    ".contextual-sign-in-modal button",
    ".modal__dismiss",
    "button.dismiss-icon",
  ],
  signInMarkers: ["sign in", "join now", "join linkedin"],
};

export interface BrowserSearchOptions {
  enabled: boolean;
  session: BrowserSession;
  breaker: CircuitBreaker;
  waiter?: ChallengeWaiter;
  policy?: Partial<BrowserPolicy>;
  wait?: (ms: number) => Promise<void>;
}

export function buildPivotQuery(target: ProfileTarget): string {
  if (target.name && target.title) return `"${target.name}" "${target.title}" site:linkedin.com/in/`;
  if (target.name) return `"${target.name}" site:linkedin.com/in/`;
  return `"${profileUsername(target.url) ?? target.url}" site:linkedin.com/in/`;
}

/** Exact username match first, else the first profile link. */
export function pickProfileLink(hrefs: string[], profileUrl: string): string | null {
  const username = profileUsername(profileUrl);
  if (username) {
    const exact = hrefs.find((href) => profileUsername(href) === username);
    if (exact) return exact;
  }
  return hrefs[0] ?? null;
}

/**
 * Browser pivot: search the target on a general search engine from a
 * persistent session, open the best profile link and read the rendered page.
 */
export class BrowserSearchChannel extends ProfileChannel {
  readonly name = "browser_search" as const;
  readonly minContentLength = 5_000;

  private readonly policy: BrowserPolicy;
  private readonly waiter: ChallengeWaiter;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: BrowserSearchOptions) {
    super();
    this.policy = { ...DEFAULT_BROWSER_POLICY, ...options.policy };
    this.waiter = options.waiter ?? new ChallengeWaiter();
    this.wait = options.wait ?? sleep;
  }

  isAvailable(): boolean {
    if (!this.options.enabled) return false;
    if (this.options.breaker.isOpen()) {
      console.warn(`⚠️ Browser channel skipped, ${this.options.breaker.failureCount} consecutive failures`);
      return false;
    }
    return true;
  }

  protected async fetchContent(target: ProfileTarget): Promise<string | null> {
    const { breaker } = this.options;

    for (let attempt = 0; attempt <= this.policy.maxRetries; attempt++) {
      if (attempt > 0) {
        if (breaker.isOpen()) {
          console.warn(`⚠️ Browser breaker opened, no more retries for ${target.url}`);
          return null;
        }
        await this.pause(this.policy.retryBackoff);
        console.log(`🔄 Browser retry ${attempt}/${this.policy.maxRetries} for ${target.url}`);
      }

      try {
        const html = await this.pivot(target);
        if (html) {
          breaker.recordSuccess();
          return html;
        }
        breaker.recordFailure();
        return null;
      } catch (error) {
        breaker.recordFailure();
        console.warn(`⚠️ Browser error for ${target.url}: ${errorMessage(error)}`);
      }
    }

    return null;
  }

  private pause([min, max]: DelayRange): Promise<void> {
    return this.wait(randomBetween(min, max));
  }

  private async pivot(target: ProfileTarget): Promise<string | null> {
    const page = await this.options.session.newPage();
    try {
      return await this.searchAndOpen(page, target);
    } finally {
      await page.close().catch((error: unknown) => {
        console.warn(`⚠️ Could not close browser page: ${errorMessage(error)}`);
      });
    }
  }

  private async searchAndOpen(page: BrowserPage, target: ProfileTarget): Promise<string | null> {
    const query = buildPivotQuery(target);
    console.log(`🔍 Browser search: ${query}`);

    await page.goto(this.policy.searchUrl, this.policy.navigationTimeoutMs);
    await this.pause(this.policy.shortPause);

    if ((await this.waiter.waitUntilReady(page)).state === "failed") return null;

    const typed = await page.typeInto(
      SEARCH_BOX,
      query,
      Math.round(randomBetween(...this.policy.typeDelay))
    );
    if (!typed) {
      console.error("❌ Could not find the search box");
      return null;
    }

    await this.pause(this.policy.shortPause);
    await page.press("Enter");
    await this.pause(this.policy.settlePause);

    if ((await this.waiter.waitUntilReady(page)).state === "failed") return null;

    const hrefs = await page.linkHrefs(this.policy.profileLinkPrefix);
    const link = pickProfileLink(hrefs, target.url);
    if (!link) {
      console.warn("⚠️ No profile links in search results");
      return null;
    }
    console.log(`   Found ${hrefs.length} profile link(s), using ${link}`);

    return this.openProfile(page, link);
  }

  private async openProfile(page: BrowserPage, link: string): Promise<string | null> {
    const lastAttempt = this.policy.linkAttempts - 1;

    for (let attempt = 0; attempt <= lastAttempt; attempt++) {
      try {
        if (attempt === 0) {
          await this.pause(this.policy.shortPause);
          await page.goto(link, this.policy.navigationTimeoutMs);
        } else {
          await page.goBack(this.policy.navigationTimeoutMs);
          await this.pause(this.policy.shortPause);
          if (!(await page.clickLink(link))) {
            await page.goto(link, this.policy.navigationTimeoutMs);
          }
        }
        await this.pause(this.policy.settlePause);

        for (let i = 0; i < 2; i++) {
          await page.evaluate("window.scrollBy(0, 300)");
          await this.pause(this.policy.shortPause);
        }

        if (await this.hasSignInWall(page)) {
          await this.dismissOverlay(page);
          if ((await this.hasSignInWall(page)) && attempt < lastAttempt) {
            console.log("   Sign-in overlay still present, retrying...");
            continue;
          }
        }

        const html = await page.content();
        if (html.length > this.policy.minHtmlLength) {
          const text = (await page.bodyText()).toLowerCase();
          if (text.includes("experience") || text.includes("about")) {
            console.log(`✅ Browser got ${html.length} chars with profile content`);
            return html;
          }
        }
        console.log(`   Attempt ${attempt + 1} got ${html.length} chars, retrying...`);
      } catch (error) {
        console.warn(`⚠️ Profile attempt ${attempt + 1} failed: ${errorMessage(error)}`);
      }
    }

    console.warn(`⚠️ Could not read profile content after ${this.policy.linkAttempts} attempts`);
    return null;
  }

  private async hasSignInWall(page: BrowserPage): Promise<boolean> {
    const text = (await page.bodyText()).toLowerCase();
    return this.policy.signInMarkers.some((marker) => text.includes(marker));
  }

  /** First matching close button, else Escape. */
  private async dismissOverlay(page: BrowserPage): Promise<void> {
    for (const selector of this.policy.overlaySelectors) {
      try {
        if (await page.click(selector)) {
          await this.pause(this.policy.shortPause);
          return;
        }
      } catch {
        continue;
      }
    }
    await page.press("Escape");
    await this.pause(this.policy.shortPause);
  }
}
