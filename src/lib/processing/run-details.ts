// lib/processing/run-details.ts
import type { AgentLog, Run } from "../db/schema";
import type { SourcingStore } from "../db/store";
import { buildExplanation } from "../scoring/explain";
import { fromBreakdown, type FeatureVector } from "../scoring/features";

export interface RankedCandidate {
  rank: number;
  candidateId: number;
  name: string;
  profileUrl: string;
  headline: string | null;
  currentTitle: string | null;
  currentCompany: string | null;
  yearsExperience: number | null;
  score: number;
  features: FeatureVector | null;
  placementSimilarity: number;
  closestPlacement: { id: number; name: string; jobTitle: string; company: string } | null;
  explanation: string[];
}

export interface RunDetails {
  run: Run;
  jobDescription: {
    id: number;
    title: string;
    seniority: string;
    domain: string[];
    mustHaveSkills: string[];
    minYearsExperience: number;
    location: string | null;
  };
  candidates: RankedCandidate[];
}

/**
 * Ranked view of a run, score descending. Candidates that were never scored
 * carry no features and no explanation.
 */
export async function getRunDetails(store: SourcingStore, runId: number): Promise<RunDetails | null> {
  const run = await store.getRun(runId);
  if (!run) return null;

  const jd = await store.getJobDescription(run.jdId);
  if (!jd) return null;

  const rows = await store.listRunCandidates(runId);
  const candidates = new Map((await store.getCandidatesByIds(rows.map((r) => r.candidateId))).map((c) => [c.id, c]));
  const placements = await store.getPlacementsByIds(
    rows.map((r) => r.closestPlacementId).filter((id): id is number => id !== null)
  );

  const ranked: RankedCandidate[] = [];
  for (const row of rows) {
    const candidate = candidates.get(row.candidateId);
    if (!candidate) continue;

    const features = fromBreakdown(row.featureBreakdown);
    const placement = row.closestPlacementId !== null ? placements.get(row.closestPlacementId) ?? null : null;

    ranked.push({
      rank: ranked.length + 1,
      candidateId: candidate.id,
      name: candidate.name,
      profileUrl: candidate.profileUrl,
      headline: candidate.headline,
      currentTitle: candidate.currentTitle,
      currentCompany: candidate.currentCompany,
      yearsExperience: candidate.yearsExperience,
      score: row.score,
      features,
      placementSimilarity: row.placementSimilarity,
      closestPlacement: placement
        ? { id: placement.id, name: placement.name, jobTitle: placement.jobTitle, company: placement.company }
        : null,
      explanation: features ? buildExplanation(jd, candidate, features, placement) : [],
    });
  }

  return {
    run,
    jobDescription: {
      id: jd.id,
      title: jd.title,
      seniority: jd.seniority,
      domain: jd.domain,
      mustHaveSkills: jd.mustHaveSkills,
      minYearsExperience: jd.minYearsExperience,
      location: jd.location,
    },
    candidates: ranked,
  };
}

export async function getRunLogs(store: SourcingStore, runId: number): Promise<AgentLog[] | null> {
  const run = await store.getRun(runId);
  if (!run) return null;
  return store.getAgentLogs(runId);
}
