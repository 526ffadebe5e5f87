import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { SearchServiceFailure } from "../errors/sourcing-errors";
import { SerpApiSearchService, createSearchService, filterProfileResults, isProfileUrl } from "./search-client";

describe("isProfileUrl", () => {
  it("accepts public profile paths", () => {
    expect(isProfileUrl("https://www.linkedin.com/in/jane-doe")).toBe(true);
    expect(isProfileUrl("https://uk.linkedin.com/pub/jane-doe/1/2/3")).toBe(true);
  });

  it("rejects job postings and other sites", () => {
    expect(isProfileUrl("https://www.linkedin.com/jobs/view/123")).toBe(false);
    expect(isProfileUrl("https://www.linkedin.com/company/acme")).toBe(false);
    expect(isProfileUrl("https://boards.greenhouse.io/acme/jobs/1")).toBe(false);
    expect(isProfileUrl("https://example.com/in/jane")).toBe(false);
  });
});

describe("filterProfileResults", () => {
  it("keeps profile results in order up to the limit", () => {
    const results = [
      { url: "https://www.linkedin.com/in/a", title: "A", snippet: "" },
      { url: "https://www.linkedin.com/jobs/view/1", title: "Job", snippet: "" },
      { url: "", title: "Empty", snippet: "" },
      { url: "https://www.linkedin.com/in/b", title: "B", snippet: "" },
      { url: "https://www.linkedin.com/in/c", title: "C", snippet: "" },
    ];

    expect(filterProfileResults(results, 2).map((r) => r.title)).toEqual(["A", "B"]);
  });
});

describe("SerpApiSearchService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps organic results and filters non-profiles", async () => {
    const requested: string[] = [];
    const fakeFetch: typeof fetch = async (input) => {
      requested.push(String(input));
      return new Response(
        JSON.stringify({
          organic_results: [
            { link: "https://www.linkedin.com/in/jane", title: "Jane Doe - Director", snippet: "Behavioral health" },
            { link: "https://www.linkedin.com/jobs/view/9", title: "Job", snippet: null },
            { link: "https://www.linkedin.com/in/sam", title: "Sam Roe - Manager" },
          ],
        }),
        { status: 200 }
      );
    };

    const service = new SerpApiSearchService("test-key", fakeFetch);
    const results = await service.search('"Director" site:linkedin.com/in/', 5);

    expect(results).toEqual([
      { url: "https://www.linkedin.com/in/jane", title: "Jane Doe - Director", snippet: "Behavioral health" },
      { url: "https://www.linkedin.com/in/sam", title: "Sam Roe - Manager", snippet: "" },
    ]);
    const params = new URL(requested[0]).searchParams;
    expect(params.get("engine")).toBe("google");
    expect(params.get("num")).toBe("10");
    expect(params.get("api_key")).toBe("test-key");
  });

  it("wraps rate limits and bad responses in SearchServiceFailure", async () => {
    const limited = new SerpApiSearchService(
      "test-key",
      async () => new Response("", { status: 429, headers: { "Retry-After": "120" } })
    );
    const failure = await limited.search("q", 5).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(SearchServiceFailure);
    expect(failure).toMatchObject({
      message: "SerpAPI rate limit exceeded, retry after 120s",
      retryAfter: 120,
      query: "q",
    });

    const down = new SerpApiSearchService("test-key", async () => new Response("", { status: 500 }));
    await expect(down.search("q", 5)).rejects.toMatchObject({ message: "SerpAPI returned 500", retryAfter: null });

    const malformed = new SerpApiSearchService(
      "test-key",
      async () => new Response(JSON.stringify({ organic_results: "nope" }), { status: 200 })
    );
    await expect(malformed.search("q", 5)).rejects.toThrow("Unexpected SerpAPI response shape");
  });
});

describe("createSearchService", () => {
  it("prefers SerpAPI and returns null without credentials", () => {
    expect(
      createSearchService({ serpApiKey: "test-key", apifyToken: "test-token", searchActorId: "actor" })?.provider
    ).toBe("serpapi");
    expect(createSearchService({ serpApiKey: null, apifyToken: "test-token", searchActorId: "actor" })?.provider).toBe(
      "apify"
    );
    expect(createSearchService({ serpApiKey: null, apifyToken: null, searchActorId: "actor" })).toBeNull();
  });
});
