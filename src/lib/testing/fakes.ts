// lib/testing/fakes.ts
import type { Embedder } from "../ai/embedder";
import type { ExtractionService, PlacementPromptInput, QueryContext } from "../ai/llm-client";
import { createDatabase } from "../db/client";
import type { Candidate } from "../db/schema";
import { SourcingStore } from "../db/store";
import { DatasetApiChannel } from "../scrapping/channels/dataset-api";
import { ProfileChannel, type ChannelName, type ProfileTarget } from "../scrapping/channels/types";
import { ExtractionFailure } from "../errors/sourcing-errors";
import {
  EMPTY_ENRICHMENT,
  type ParsedJobDescription,
  type PlacementProfileDraft,
  type ProfileEnrichment,
} from "../validations/extraction";

export function createMemoryStore(): { store: SourcingStore; close: () => void } {
  const { db, sqlite } = createDatabase(":memory:");
  return { store: new SourcingStore(db), close: () => sqlite.close() };
}

export const SAMPLE_JD: ParsedJobDescription = {
  title: "Program Director",
  seniority: "Director",
  domain: ["behavioral health"],
  mustHaveSkills: ["Program Management", "Budgeting", "Compliance"],
  niceToHaveSkills: ["EHR"],
  minYearsExperience: 8,
  location: "Ohio",
};

export function makeCandidate(id: number, overrides: Partial<Candidate> = {}): Candidate {
  return {
    id,
    profileUrl: `https://www.linkedin.com/in/candidate-${id}`,
    name: `Candidate ${id}`,
    headline: null,
    currentTitle: null,
    currentCompany: null,
    location: null,
    yearsExperience: null,
    skills: [],
    domains: [],
    experience: [],
    education: [],
    rawText: "",
    source: "linkedin",
    lastFetchedAt: new Date("2025-01-01T00:00:00Z"),
    ...overrides,
  };
}

/**
 * Scripted extraction service. Each contract answers from its field; set a
 * field to an Error to make that contract fail.
 */
export class FakeExtractionService implements ExtractionService {
  jobDescription: ParsedJobDescription | Error = SAMPLE_JD;
  enrichment: ProfileEnrichment | Error = EMPTY_ENRICHMENT;
  initialQueries: string[] | Error = ['"Program Director" site:linkedin.com/in/'];
  refinedQueries: string[] | Error = [];
  placementProfile: PlacementProfileDraft | Error = {
    headline: "Program Director at Acme Health",
    summary: "Leads residential programs.",
    history: [],
    skills: ["Budgeting"],
    totalYearsExperience: 10,
  };

  readonly calls: { enrich: string[]; refine: string[]; placements: PlacementPromptInput[] } = {
    enrich: [],
    refine: [],
    placements: [],
  };

  async parseJobDescription(): Promise<ParsedJobDescription> {
    return answer("job_description", this.jobDescription);
  }

  async enrichProfile(profileText: string): Promise<ProfileEnrichment> {
    this.calls.enrich.push(profileText);
    return answer("profile_enrichment", this.enrichment);
  }

  async proposeQueries(_jd: QueryContext): Promise<string[]> {
    return answer("initial_queries", this.initialQueries);
  }

  async refineQueries(_jd: QueryContext, coverageSummary: string): Promise<string[]> {
    this.calls.refine.push(coverageSummary);
    return answer("refine_queries", this.refinedQueries);
  }

  async synthesizePlacementProfile(input: PlacementPromptInput): Promise<PlacementProfileDraft> {
    this.calls.placements.push(input);
    return answer("placement_profile", this.placementProfile);
  }
}

function answer<T>(contract: string, value: T | Error): T {
  if (value instanceof Error) throw new ExtractionFailure(contract, value.message);
  return value;
}

/** Returns a fixed vector per text, [1, 0] unless mapped. */
export class FakeEmbedder implements Embedder {
  readonly modelName = "test-embedding";
  readonly texts: string[] = [];
  failWith: Error | null = null;

  constructor(private readonly vectors: Map<string, number[]> = new Map()) {}

  async embedText(text: string): Promise<number[]> {
    this.texts.push(text);
    if (this.failWith) throw this.failWith;
    return this.vectors.get(text) ?? [1, 0];
  }
}

/**
 * Channel that answers from a per-URL map, falling back to a default.
 */
export class ScriptedChannel extends ProfileChannel {
  readonly requested: string[] = [];
  available = true;

  constructor(
    readonly name: ChannelName,
    readonly minContentLength: number,
    private readonly fallback: string | null,
    private readonly byUrl: Map<string, string | null> = new Map()
  ) {
    super();
  }

  get calls(): number {
    return this.requested.length;
  }

  isAvailable(): boolean {
    return this.available;
  }

  protected async fetchContent(target: ProfileTarget): Promise<string | null> {
    this.requested.push(target.url);
    return this.byUrl.has(target.url) ? this.byUrl.get(target.url) ?? null : this.fallback;
  }
}

/**
 * Dataset API stand-in: records every batch it is sent and answers from a
 * per-URL map, null when unmapped.
 */
export class ScriptedBatchChannel extends DatasetApiChannel {
  readonly batches: string[][] = [];

  constructor(private readonly byUrl: Map<string, string | null> = new Map()) {
    super({ apiKey: "test-key", datasetId: "gd_test", pollIntervalMs: 0, maxPolls: 1, requestTimeoutMs: 1_000 });
  }

  async fetchBatch(urls: string[]): Promise<Map<string, string | null>> {
    this.batches.push(urls);
    return new Map<string, string | null>(urls.map((url) => [url, this.byUrl.get(url) ?? null]));
  }
}
