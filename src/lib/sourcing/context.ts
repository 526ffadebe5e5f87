// lib/sourcing/context.ts
import type { ExtractionService } from "../ai/llm-client";
import type { SourcingStore } from "../db/store";
import type { SearchMetadata } from "../ai/profile-enricher";
import type { FetchedCandidate } from "../scrapping/profile-fetcher";
import type { SearchService } from "../search/search-client";
import type { RunTrace } from "./trace";

export interface ProfileSource {
  fetchBatch(requests: SearchMetadata[]): Promise<FetchedCandidate[]>;
}

/** Collaborators shared by every run. */
export interface SourcingServices {
  llm: Pick<ExtractionService, "proposeQueries" | "refineQueries">;
  search: SearchService;
  fetcher: ProfileSource;
  store: Pick<SourcingStore, "checkpointRun">;
}

/** Per-run context the graph nodes close over. */
export interface SourcingContext extends SourcingServices {
  trace: RunTrace;
}
