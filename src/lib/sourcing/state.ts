// lib/sourcing/state.ts
import { Annotation } from "@langchain/langgraph";
import type { SourcingOutcome } from "../db/schema";
import type { SearchResult } from "../search/search-client";
import { emptyDomainHits, type DomainHits } from "./coverage";

export interface SourcingJob {
  id: number;
  title: string;
  seniority: string;
  domain: string[];
  mustHaveSkills: string[];
  location: string | null;
}

export const SourcingStateAnnotation = Annotation.Root({
  // === Run Identity ===
  runId: Annotation<number>(),
  jd: Annotation<SourcingJob>(),
  targetProfiles: Annotation<number>(),
  maxRounds: Annotation<number>(),

  // === Search ===
  queries: Annotation<string[]>({
    reducer: (current, update) => update ?? current,
    default: () => [],
  }),

  round: Annotation<number>({
    reducer: (current, update) => update ?? current,
    default: () => 0,
  }),

  // Grows only; a URL is seen at most once per run
  seenUrls: Annotation<Set<string>>({
    reducer: (current, update) => {
      if (!update) return current;
      return new Set([...Array.from(current), ...Array.from(update)]);
    },
    default: () => new Set(),
  }),

  // New URLs selected for this round's fetch batch
  pendingResults: Annotation<SearchResult[]>({
    reducer: (current, update) => update ?? current,
    default: () => [],
  }),

  // === Acquisition ===
  candidateIds: Annotation<number[]>({
    reducer: (current, update) => {
      const known = new Set(current);
      return [...current, ...update.filter((id) => !known.has(id))];
    },
    default: () => [],
  }),

  profilesFromCache: Annotation<number>({
    reducer: (current, update) => current + update,
    default: () => 0,
  }),

  domainHits: Annotation<DomainHits>({
    reducer: (current, update) => update ?? current,
    default: () => emptyDomainHits(),
  }),

  // Set once; any value routes to the terminal node
  outcome: Annotation<SourcingOutcome | null>({
    reducer: (current, update) => update ?? current,
    default: () => null,
  }),
});

export type SourcingState = typeof SourcingStateAnnotation.State;
export type SourcingStateUpdate = typeof SourcingStateAnnotation.Update;
