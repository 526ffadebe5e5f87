import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ChallengeWaiter, DEFAULT_CHALLENGE_POLICY } from "./challenge-waiter";
import type { BrowserPage } from "./session";

function scriptedPage(texts: Array<string | Error>): BrowserPage {
  let poll = -1;
  const current = () => texts[Math.min(poll, texts.length - 1)];
  return {
    goto: async () => undefined,
    goBack: async () => undefined,
    evaluate: async () => undefined,
    hasElement: async () => current() === "Search",
    click: async () => false,
    typeInto: async () => false,
    press: async () => undefined,
    bodyText: async () => {
      poll++;
      const text = current();
      if (text instanceof Error) throw text;
      return text;
    },
    content: async () => "",
    linkHrefs: async () => [],
    clickLink: async () => false,
    close: async () => undefined,
  };
}

describe("ChallengeWaiter", () => {
  let waits: number[];
  const wait = async (ms: number) => {
    waits.push(ms);
  };

  beforeEach(() => {
    waits = [];
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("waits out a challenge until the search box appears", async () => {
    const waiter = new ChallengeWaiter({ ...DEFAULT_CHALLENGE_POLICY, maxPolls: 5 }, wait);
    const page = scriptedPage(["", "Our systems have detected unusual traffic", "unusual traffic", "Search"]);

    const outcome = await waiter.waitUntilReady(page);

    expect(outcome).toEqual({
      state: "ready",
      polls: 4,
      transitions: ["loading", "challenge-detected", "ready"],
    });
    expect(waits).toEqual([1_000, 2_000, 2_000]);
  });

  it("fails once the poll budget is used", async () => {
    const waiter = new ChallengeWaiter({ ...DEFAULT_CHALLENGE_POLICY, maxPolls: 3 }, wait);

    const outcome = await waiter.waitUntilReady(scriptedPage(["Please solve this CAPTCHA"]));

    expect(outcome).toEqual({
      state: "failed",
      polls: 3,
      transitions: ["loading", "challenge-detected", "failed"],
    });
  });

  it("treats an unreadable page as still loading", async () => {
    const waiter = new ChallengeWaiter({ ...DEFAULT_CHALLENGE_POLICY, maxPolls: 3 }, wait);

    const outcome = await waiter.waitUntilReady(scriptedPage([new Error("navigating"), "Search"]));

    expect(outcome.state).toBe("ready");
    expect(outcome.transitions).toEqual(["loading", "ready"]);
    expect(waits).toEqual([1_000]);
  });
});
