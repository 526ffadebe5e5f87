// lib/services.ts
import { createOpenAI } from "@ai-sdk/openai";
import type { AppConfig } from "./config";
import { createDatabase } from "./db/client";
import { SourcingStore } from "./db/store";
import { OpenAIEmbedder, type Embedder } from "./ai/embedder";
import { OpenAIExtractionService, type ExtractionService } from "./ai/llm-client";
import { PlaywrightBrowserSession } from "./scrapping/browser/session";
import { buildChannelChain } from "./scrapping/channel-chain";
import { ProfileFetcher } from "./scrapping/profile-fetcher";
import { createSearchService, type SearchService } from "./search/search-client";
import { CircuitBreaker } from "./utils/circuit-breaker";
import { Semaphore } from "./utils/concurrency";
import { RateLimiter } from "./utils/rate-limiter";

export const BROWSER_BREAKER_THRESHOLD = 5;
export const BROWSER_BREAKER_COOLDOWN_MS = 5 * 60 * 1000;

export interface Services {
  config: AppConfig;
  store: SourcingStore;
  llm: ExtractionService;
  embedder: Embedder;
  /** Null when neither SerpAPI nor Apify credentials are configured. */
  search: SearchService | null;
  fetcher: ProfileFetcher;
  /**
   * Fetcher for one run. Overriding the browser switch builds a new chain
   * over the same browser session, rate limiter and breaker, and the new
   * fetcher takes its slots from the shared semaphore.
   */
  fetcherFor(useBrowser?: boolean): ProfileFetcher;
  close(): Promise<void>;
}

/**
 * Builds every external handle once. Call at startup and pass the result
 * down; nothing below this holds its own client.
 */
export function createServices(config: AppConfig): Services {
  const openai = createOpenAI({ apiKey: config.llm.apiKey });
  const llm = new OpenAIExtractionService(openai, config.llm.model);
  const embedder = new OpenAIEmbedder(openai, config.llm.embeddingModel);

  const { db, sqlite } = createDatabase(config.databaseUrl);
  const store = new SourcingStore(db);

  const acquisition = config.acquisition;
  const chainDeps = {
    session: new PlaywrightBrowserSession({
      profileDir: acquisition.browserProfileDir,
      headless: acquisition.browserHeadless,
      executablePath: acquisition.browserExecutablePath,
    }),
    rateLimiter: new RateLimiter(acquisition.requestDelayMs),
    breaker: new CircuitBreaker("browser_search", {
      threshold: BROWSER_BREAKER_THRESHOLD,
      cooldownMs: BROWSER_BREAKER_COOLDOWN_MS,
    }),
  };
  const fetchSlots = new Semaphore(acquisition.maxConcurrent);

  const makeFetcher = (useBrowser?: boolean) =>
    new ProfileFetcher({
      store,
      llm,
      embedder,
      chain: buildChannelChain(acquisition, chainDeps, { useBrowser }),
      semaphore: fetchSlots,
      options: {
        maxConcurrent: acquisition.maxConcurrent,
        ttlDays: acquisition.profileTtlDays,
        refreshEmbeddingsOnRefetch: acquisition.refreshEmbeddingsOnRefetch,
      },
    });

  const fetcher = makeFetcher();

  return {
    config,
    store,
    llm,
    embedder,
    search: createSearchService(config.search),
    fetcher,
    fetcherFor: (useBrowser) =>
      useBrowser === undefined || useBrowser === acquisition.useBrowser ? fetcher : makeFetcher(useBrowser),
    close: async () => {
      await chainDeps.session.close();
      sqlite.close();
    },
  };
}
