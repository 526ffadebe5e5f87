// lib/scrapping/browser/challenge-waiter.ts
import { sleep } from "../../utils/concurrency";
import type { BrowserPage } from "./session";

export type ChallengeState = "loading" | "challenge-detected" | "ready" | "failed";

export interface ChallengePolicy {
  maxPolls: number;
  /** Delay between polls while a challenge is on screen. */
  challengeDelayMs: number;
  /** Delay between polls while the page is neither challenged nor ready. */
  loadingDelayMs: number;
  keywords: string[];
  readySelector: string;
}

export const DEFAULT_CHALLENGE_POLICY: ChallengePolicy = {
  maxPolls: 30,
  challengeDelayMs: 2_000,
  loadingDelayMs: 1_000,
  keywords: [
    "unusual traffic",
    "not a robot",
    "verify you're human",
    "captcha",
    "recaptcha",
    "prove you're not a robot",
  ],
  readySelector: 'textarea[name="q"], input[name="q"]',
};

export interface ChallengeOutcome {
  state: "ready" | "failed";
  polls: number;
  transitions: ChallengeState[];
}

/**
 * Polls a search-engine page until a live search box shows up (ready) or
 * the poll budget runs out (failed). A challenge keyword in the page text
 * holds the machine in challenge-detected.
 */
export class ChallengeWaiter {
  constructor(
    private readonly policy: ChallengePolicy = DEFAULT_CHALLENGE_POLICY,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  async waitUntilReady(page: BrowserPage): Promise<ChallengeOutcome> {
    let state: ChallengeState = "loading";
    const transitions: ChallengeState[] = [state];

    const moveTo = (next: ChallengeState) => {
      if (next === state) return;
      if (next === "challenge-detected") {
        console.warn("⚠️ Search engine challenge detected, waiting for it to clear...");
      }
      state = next;
      transitions.push(next);
    };

    for (let poll = 1; poll <= this.policy.maxPolls; poll++) {
      let text: string;
      try {
        text = (await page.bodyText()).toLowerCase();
      } catch {
        moveTo("loading");
        await this.wait(this.policy.loadingDelayMs);
        continue;
      }

      if (this.policy.keywords.some((keyword) => text.includes(keyword))) {
        moveTo("challenge-detected");
        await this.wait(this.policy.challengeDelayMs);
        continue;
      }

      if (await page.hasElement(this.policy.readySelector)) {
        moveTo("ready");
        return { state: "ready", polls: poll, transitions };
      }

      moveTo("loading");
      await this.wait(this.policy.loadingDelayMs);
    }

    moveTo("failed");
    console.error(`❌ Challenge not cleared after ${this.policy.maxPolls} polls`);
    return { state: "failed", polls: this.policy.maxPolls, transitions };
  }
}
