// lib/scoring/score-run.ts
import type { SourcingStore, ScoredRow } from "../db/store";
import { computeFeatures, computeScore, toBreakdown } from "./features";
import { computeIdealEmbedding, findClosestPlacement } from "./similarity";

export interface ScoreRunResult {
  scored: number;
  skipped: number;
  rankingTimeMs: number;
  idealPlacementId: number | null;
}

/**
 * Score every run-candidate of a run against the JD and the placement
 * anchors, then persist scores and mark the run COMPLETED.
 */
export async function scoreRun(store: SourcingStore, runId: number): Promise<ScoreRunResult> {
  const run = await store.getRun(runId);
  if (!run) throw new Error(`Run ${runId} not found`);

  const jd = await store.getJobDescription(run.jdId);
  const jdEmbedding = await store.getJdEmbedding(run.jdId);
  if (!jd || !jdEmbedding) {
    throw new Error(`Job description ${run.jdId} has no embedding`);
  }

  const startedAt = performance.now();

  const anchors = await store.listPlacementAnchors();
  const ideal = computeIdealEmbedding(jdEmbedding, anchors, 3);
  if (ideal.vector) {
    console.log(`🎯 Ideal embedding built from ${Math.min(3, anchors.length)} placement profile(s)`);
  } else {
    console.log("ℹ️ No placement profiles with embeddings, sim_ideal will be 0");
  }

  const runCandidates = await store.listRunCandidates(runId);
  const candidateIds = runCandidates.map((rc) => rc.candidateId);
  const candidates = new Map((await store.getCandidatesByIds(candidateIds)).map((c) => [c.id, c]));
  const embeddings = await store.getCandidateEmbeddings(candidateIds);

  const rows: ScoredRow[] = [];
  let skipped = 0;

  for (const rc of runCandidates) {
    const candidate = candidates.get(rc.candidateId);
    const embedding = embeddings.get(rc.candidateId);
    if (!candidate || !embedding) {
      skipped++;
      continue;
    }

    const features = computeFeatures(jd, jdEmbedding, ideal.vector, candidate, embedding);
    const closest = findClosestPlacement(embedding, anchors);

    rows.push({
      runCandidateId: rc.id,
      score: computeScore(features),
      featureBreakdown: toBreakdown(features),
      placementSimilarity: closest?.similarity ?? 0,
      closestPlacementId: closest?.placementId ?? null,
    });
  }

  const rankingTimeMs = Math.round(performance.now() - startedAt);
  await store.saveScores(runId, rows, rankingTimeMs, ideal.bestPlacementId);

  console.log(`✅ Scored ${rows.length} candidates for run ${runId} (${skipped} without embedding) in ${rankingTimeMs}ms`);

  return { scored: rows.length, skipped, rankingTimeMs, idealPlacementId: ideal.bestPlacementId };
}
