// lib/search/search-client.ts
import { ApifyClient } from "apify-client";
import { z } from "zod";
import type { AppConfig } from "../config";
import { parseRetryAfter } from "../errors/rate-limit-error";
import { SearchServiceFailure, errorMessage } from "../errors/sourcing-errors";

export interface SearchResult {
  url: string;
  title: string;
  snippet: string;
}

export interface SearchService {
  readonly provider: string;
  /** Profile results only, at most numResults. Throws SearchServiceFailure. */
  search(query: string, numResults: number): Promise<SearchResult[]>;
}

const PROFILE_URL_PATTERNS = [/linkedin\.com\/in\//, /linkedin\.com\/pub\//];

const JOB_BOARD_DOMAINS = [
  "jobs.lever.co",
  "boards.greenhouse.io",
  "apply.workable.com",
  "jobs.ashbyhq.com",
  "jobs.smartrecruiters.com",
];

export function isProfileUrl(url: string): boolean {
  const lower = url.toLowerCase();
  if (!lower.includes("linkedin.com")) return false;
  if (lower.includes("linkedin.com/jobs")) return false;
  if (JOB_BOARD_DOMAINS.some((domain) => lower.includes(domain))) return false;
  return PROFILE_URL_PATTERNS.some((pattern) => pattern.test(lower));
}

export function filterProfileResults(results: SearchResult[], numResults: number): SearchResult[] {
  return results.filter((r) => r.url && isProfileUrl(r.url)).slice(0, numResults);
}

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

// ============================================
// SerpAPI (Google engine)
// ============================================

const serpResponseSchema = z.object({
  organic_results: z
    .array(
      z.object({
        link: text,
        title: text,
        snippet: text,
      })
    )
    .default([]),
});

export class SerpApiSearchService implements SearchService {
  readonly provider = "serpapi";

  constructor(
    private readonly apiKey: string,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly timeoutMs: number = 10_000
  ) {}

  async search(query: string, numResults: number): Promise<SearchResult[]> {
    const params = new URLSearchParams({
      q: query,
      api_key: this.apiKey,
      engine: "google",
      num: String(numResults * 2),
    });

    let res: Response;
    try {
      res = await this.fetchImpl(`https://serpapi.com/search?${params.toString()}`, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new SearchServiceFailure(this.provider, query, errorMessage(error), { cause: error });
    }

    if (res.status === 429) {
      const retryAfter = parseRetryAfter(res.headers.get("retry-after"), 60);
      throw new SearchServiceFailure(this.provider, query, `SerpAPI rate limit exceeded, retry after ${retryAfter}s`, {
        retryAfter,
      });
    }
    if (!res.ok) {
      throw new SearchServiceFailure(this.provider, query, `SerpAPI returned ${res.status}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (error) {
      throw new SearchServiceFailure(this.provider, query, errorMessage(error), { cause: error });
    }

    const parsed = serpResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SearchServiceFailure(this.provider, query, "Unexpected SerpAPI response shape");
    }

    const raw = parsed.data.organic_results.map((item) => ({
      url: item.link,
      title: item.title,
      snippet: item.snippet,
    }));
    const cleaned = filterProfileResults(raw, numResults);

    console.log(`🔍 SerpAPI "${query}": ${raw.length} raw results, ${cleaned.length} after filtering`);
    return cleaned;
  }
}

// ============================================
// Apify Google search actor
// ============================================

const apifySearchPageSchema = z.object({
  organicResults: z
    .array(
      z.object({
        url: text,
        title: text,
        description: text,
      })
    )
    .default([]),
});

export class ApifySearchService implements SearchService {
  readonly provider = "apify";

  constructor(
    private readonly client: ApifyClient,
    private readonly actorId: string
  ) {}

  async search(query: string, numResults: number): Promise<SearchResult[]> {
    try {
      const run = await this.client.actor(this.actorId).call({
        queries: query,
        resultsPerPage: Math.min(100, numResults * 2),
        maxPagesPerQuery: 1,
      });

      if (run.status === "FAILED") {
        throw new Error(run.statusMessage || "Search actor run failed");
      }

      const { items } = await this.client.dataset(run.defaultDatasetId).listItems();

      const raw: SearchResult[] = [];
      for (const item of items) {
        const page = apifySearchPageSchema.safeParse(item);
        if (!page.success) continue;
        for (const result of page.data.organicResults) {
          raw.push({ url: result.url, title: result.title, snippet: result.description });
        }
      }

      const cleaned = filterProfileResults(raw, numResults);
      console.log(`🔍 Apify search "${query}": ${raw.length} raw results, ${cleaned.length} after filtering`);
      return cleaned;
    } catch (error) {
      throw new SearchServiceFailure(this.provider, query, errorMessage(error), { cause: error });
    }
  }
}

/**
 * SerpAPI when its key is set, otherwise the Apify actor, otherwise null.
 */
export function createSearchService(config: AppConfig["search"]): SearchService | null {
  if (config.serpApiKey) {
    return new SerpApiSearchService(config.serpApiKey);
  }
  if (config.apifyToken) {
    return new ApifySearchService(new ApifyClient({ token: config.apifyToken }), config.searchActorId);
  }
  return null;
}
