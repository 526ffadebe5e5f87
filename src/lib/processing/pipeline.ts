// lib/processing/pipeline.ts
import type { Embedder } from "../ai/embedder";
import { createJobDescription } from "../ai/job-description-parser";
import type { ExtractionService } from "../ai/llm-client";
import type { JobDescription, Run } from "../db/schema";
import type { SourcingStore } from "../db/store";
import { ConfigurationError, errorMessage } from "../errors/sourcing-errors";
import { scoreRun } from "../scoring/score-run";
import type { SearchService } from "../search/search-client";
import type { ProfileSource } from "../sourcing/context";
import type { SourcingJob } from "../sourcing/state";
import { runSourcing } from "../sourcing/workflow";

export interface PipelineServices {
  store: SourcingStore;
  llm: ExtractionService;
  embedder: Embedder;
  search: SearchService | null;
  fetcherFor(useBrowser?: boolean): ProfileSource;
}

export interface MatchingRequest {
  jobDescription: string;
  targetProfiles: number;
  useBrowser?: boolean;
  /** Defaults to 2 rounds for targets up to 10, else 3. */
  maxRounds?: number;
}

export function requireSearch(services: Pick<PipelineServices, "search">): SearchService {
  if (!services.search) {
    throw new ConfigurationError("SEARCH_API_KEY", "No search provider configured: set SEARCH_API_KEY or APIFY_API_TOKEN");
  }
  return services.search;
}

export function toSourcingJob(jd: JobDescription): SourcingJob {
  return {
    id: jd.id,
    title: jd.title,
    seniority: jd.seniority,
    domain: jd.domain,
    mustHaveSkills: jd.mustHaveSkills,
    location: jd.location,
  };
}

/**
 * Parses the JD and creates the run. Fails before any work when no search
 * provider is configured.
 */
export async function prepareRun(
  services: PipelineServices,
  request: Pick<MatchingRequest, "jobDescription" | "targetProfiles">
): Promise<{ run: Run; jd: JobDescription }> {
  requireSearch(services);
  const jd = await createJobDescription(services.store, services.llm, services.embedder, request.jobDescription);
  const run = await services.store.createRun(jd.id, request.targetProfiles);
  console.log(`✨ Created run ${run.id} for JD ${jd.id} (target ${request.targetProfiles})`);
  return { run, jd };
}

/**
 * Sourcing then scoring for a prepared run. Status moves
 * SOURCING → SCORING → COMPLETED; any error marks the run FAILED and is
 * rethrown.
 */
export async function executeRun(
  services: PipelineServices,
  run: Run,
  jd: JobDescription,
  options: Pick<MatchingRequest, "useBrowser" | "maxRounds"> = {}
): Promise<Run> {
  const { store } = services;

  try {
    const search = requireSearch(services);
    await store.updateRun(run.id, { status: "SOURCING" });

    const result = await runSourcing(
      { llm: services.llm, search, fetcher: services.fetcherFor(options.useBrowser), store },
      { runId: run.id, jd: toSourcingJob(jd), targetProfiles: run.targetProfiles, maxRounds: options.maxRounds }
    );

    await store.completeSourcing(
      run.id,
      {
        urlsFound: result.urlsFound,
        profilesParsed: result.profilesParsed,
        profilesFromCache: result.profilesFromCache,
        roundsCompleted: result.roundsCompleted,
        sourcingTimeMs: result.sourcingTimeMs,
        outcome: result.outcome,
      },
      result.candidateIds,
      result.trace
    );

    await scoreRun(store, run.id);
  } catch (error) {
    console.error(`❌ Run ${run.id} failed: ${errorMessage(error)}`);
    await store.updateRun(run.id, { status: "FAILED", errorMessage: errorMessage(error), completedAt: new Date() });
    throw error;
  }

  const finished = await store.getRun(run.id);
  if (!finished) throw new Error(`Run ${run.id} disappeared`);
  return finished;
}

/** JD → run → sourcing → scoring, in one call. */
export async function runMatchingPipeline(services: PipelineServices, request: MatchingRequest): Promise<Run> {
  const { run, jd } = await prepareRun(services, request);
  return executeRun(services, run, jd, request);
}
