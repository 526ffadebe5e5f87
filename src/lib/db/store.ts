import { and, asc, desc, eq, inArray, isNull } from "drizzle-orm";
import type { SourcingDatabase } from "./client";
import {
  agentLogs,
  candidateEmbeddings,
  candidates,
  jdEmbeddings,
  jobDescriptions,
  placementProfiles,
  placements,
  runCandidates,
  runs,
  type AgentLog,
  type Candidate,
  type JobDescription,
  type NewCandidate,
  type Placement,
  type Run,
  type RunCandidate,
} from "./schema";
import type { ParsedJobDescription, PlacementRecord } from "../validations/extraction";
import type { TraceEntry } from "../sourcing/trace";

export interface PlacementAnchor {
  placementId: number;
  candidateId: number;
  embedding: number[];
}

export interface RunCounters {
  urlsFound: number;
  profilesParsed: number;
  profilesFromCache: number;
  roundsCompleted: number;
  sourcingTimeMs: number;
  outcome: Run["outcome"];
}

export interface ScoredRow {
  runCandidateId: number;
  score: number;
  featureBreakdown: Record<string, number>;
  placementSimilarity: number;
  closestPlacementId: number | null;
}

/**
 * Single writer over the SQLite database. Every persistence concern of the
 * sourcing engine goes through here.
 */
export class SourcingStore {
  constructor(private readonly db: SourcingDatabase) {}

  // === Job descriptions ===

  async createJobDescription(rawText: string, parsed: ParsedJobDescription): Promise<JobDescription> {
    return this.db
      .insert(jobDescriptions)
      .values({
        rawText,
        title: parsed.title,
        seniority: parsed.seniority,
        domain: parsed.domain,
        mustHaveSkills: parsed.mustHaveSkills,
        niceToHaveSkills: parsed.niceToHaveSkills,
        minYearsExperience: parsed.minYearsExperience,
        location: parsed.location,
      })
      .returning()
      .get();
  }

  async getJobDescription(id: number): Promise<JobDescription | null> {
    return this.db.select().from(jobDescriptions).where(eq(jobDescriptions.id, id)).get() ?? null;
  }

  async saveJdEmbedding(jdId: number, embedding: number[], modelName: string): Promise<void> {
    this.db
      .insert(jdEmbeddings)
      .values({ jdId, embedding, modelName })
      .onConflictDoUpdate({ target: jdEmbeddings.jdId, set: { embedding, modelName } })
      .run();
  }

  async getJdEmbedding(jdId: number): Promise<number[] | null> {
    const row = this.db.select().from(jdEmbeddings).where(eq(jdEmbeddings.jdId, jdId)).get();
    return row?.embedding ?? null;
  }

  // === Candidates ===

  async findCandidatesByUrls(urls: string[]): Promise<Candidate[]> {
    if (urls.length === 0) return [];
    return this.db.select().from(candidates).where(inArray(candidates.profileUrl, urls)).all();
  }

  async getCandidatesByIds(ids: number[]): Promise<Candidate[]> {
    if (ids.length === 0) return [];
    return this.db.select().from(candidates).where(inArray(candidates.id, ids)).all();
  }

  async insertCandidate(values: NewCandidate): Promise<Candidate> {
    return this.db.insert(candidates).values(values).returning().get();
  }

  async updateCandidate(id: number, values: Partial<Omit<NewCandidate, "id" | "profileUrl">>): Promise<Candidate> {
    return this.db.update(candidates).set(values).where(eq(candidates.id, id)).returning().get();
  }

  async getCandidateEmbedding(candidateId: number): Promise<number[] | null> {
    const row = this.db
      .select()
      .from(candidateEmbeddings)
      .where(eq(candidateEmbeddings.candidateId, candidateId))
      .get();
    return row?.embedding ?? null;
  }

  async saveCandidateEmbedding(candidateId: number, embedding: number[], modelName: string): Promise<void> {
    this.db
      .insert(candidateEmbeddings)
      .values({ candidateId, embedding, modelName })
      .onConflictDoUpdate({ target: candidateEmbeddings.candidateId, set: { embedding, modelName } })
      .run();
  }

  async getCandidateEmbeddings(candidateIds: number[]): Promise<Map<number, number[]>> {
    if (candidateIds.length === 0) return new Map();
    const rows = this.db
      .select()
      .from(candidateEmbeddings)
      .where(inArray(candidateEmbeddings.candidateId, candidateIds))
      .all();
    return new Map(rows.map((row) => [row.candidateId, row.embedding]));
  }

  // === Placements ===

  async insertPlacements(records: PlacementRecord[]): Promise<number> {
    if (records.length === 0) return 0;
    this.db.transaction((tx) => {
      for (const record of records) {
        tx.insert(placements)
          .values({
            name: record.name,
            company: record.company,
            jobTitle: record.jobTitle,
            positionId: record.positionId ?? null,
            placementType: record.placementType ?? null,
            datePosted: record.datePosted ?? null,
            placementDate: record.placementDate ?? null,
            startDate: record.startDate ?? null,
          })
          .run();
      }
    });
    return records.length;
  }

  async getPlacement(id: number): Promise<Placement | null> {
    return this.db.select().from(placements).where(eq(placements.id, id)).get() ?? null;
  }

  async getPlacementsByIds(ids: number[]): Promise<Map<number, Placement>> {
    if (ids.length === 0) return new Map();
    const rows = this.db.select().from(placements).where(inArray(placements.id, ids)).all();
    return new Map(rows.map((row) => [row.id, row]));
  }

  async listPlacementsWithoutProfile(limit: number): Promise<Placement[]> {
    const rows = this.db
      .select({ placement: placements })
      .from(placements)
      .leftJoin(placementProfiles, eq(placementProfiles.placementId, placements.id))
      .where(isNull(placementProfiles.id))
      .orderBy(asc(placements.id))
      .limit(limit)
      .all();
    return rows.map((row) => row.placement);
  }

  async linkPlacementProfile(placementId: number, candidateId: number): Promise<void> {
    this.db.insert(placementProfiles).values({ placementId, candidateId }).run();
  }

  /**
   * Placement-linked candidates that carry an embedding, in link order.
   */
  async listPlacementAnchors(): Promise<PlacementAnchor[]> {
    return this.db
      .select({
        placementId: placementProfiles.placementId,
        candidateId: placementProfiles.candidateId,
        embedding: candidateEmbeddings.embedding,
      })
      .from(placementProfiles)
      .innerJoin(candidateEmbeddings, eq(candidateEmbeddings.candidateId, placementProfiles.candidateId))
      .orderBy(asc(placementProfiles.id))
      .all();
  }

  // === Runs ===

  async createRun(jdId: number, targetProfiles: number): Promise<Run> {
    return this.db.insert(runs).values({ jdId, targetProfiles, status: "CREATED" }).returning().get();
  }

  async getRun(id: number): Promise<Run | null> {
    return this.db.select().from(runs).where(eq(runs.id, id)).get() ?? null;
  }

  async listRuns(limit: number, offset: number): Promise<Run[]> {
    return this.db.select().from(runs).orderBy(desc(runs.createdAt), desc(runs.id)).limit(limit).offset(offset).all();
  }

  async updateRun(id: number, values: Partial<Omit<Run, "id" | "jdId" | "createdAt">>): Promise<void> {
    this.db.update(runs).set(values).where(eq(runs.id, id)).run();
  }

  /**
   * Round-end checkpoint: counters only.
   */
  async checkpointRun(id: number, urlsFound: number, profilesParsed: number, roundsCompleted: number): Promise<void> {
    this.db.update(runs).set({ urlsFound, profilesParsed, roundsCompleted }).where(eq(runs.id, id)).run();
  }

  /**
   * Run-end write: counters, one run-candidate row per acquired candidate
   * and the trace, appended in the order it was recorded.
   */
  async completeSourcing(
    runId: number,
    counters: RunCounters,
    candidateIds: number[],
    trace: TraceEntry[]
  ): Promise<void> {
    this.db.transaction((tx) => {
      tx.update(runs)
        .set({ ...counters, status: "SCORING" })
        .where(eq(runs.id, runId))
        .run();

      for (const candidateId of candidateIds) {
        tx.insert(runCandidates)
          .values({ runId, candidateId, score: 0, featureBreakdown: null, placementSimilarity: 0, closestPlacementId: null })
          .onConflictDoNothing()
          .run();
      }

      trace.forEach((entry, seq) => {
        tx.insert(agentLogs)
          .values({
            runId,
            seq,
            agentName: entry.agentName,
            action: entry.action,
            reasoning: entry.reasoning,
            status: entry.status,
            timestamp: entry.timestamp,
          })
          .run();
      });
    });
  }

  async listRunCandidates(runId: number): Promise<RunCandidate[]> {
    return this.db
      .select()
      .from(runCandidates)
      .where(eq(runCandidates.runId, runId))
      .orderBy(desc(runCandidates.score), asc(runCandidates.id))
      .all();
  }

  async saveScores(
    runId: number,
    rows: ScoredRow[],
    rankingTimeMs: number,
    idealPlacementId: number | null
  ): Promise<void> {
    this.db.transaction((tx) => {
      for (const row of rows) {
        tx.update(runCandidates)
          .set({
            score: row.score,
            featureBreakdown: row.featureBreakdown,
            placementSimilarity: row.placementSimilarity,
            closestPlacementId: row.closestPlacementId,
          })
          .where(and(eq(runCandidates.id, row.runCandidateId), eq(runCandidates.runId, runId)))
          .run();
      }
      tx.update(runs)
        .set({ rankingTimeMs, idealPlacementId, status: "COMPLETED", completedAt: new Date() })
        .where(eq(runs.id, runId))
        .run();
    });
  }

  async getAgentLogs(runId: number): Promise<AgentLog[]> {
    return this.db.select().from(agentLogs).where(eq(agentLogs.runId, runId)).orderBy(asc(agentLogs.seq)).all();
  }
}
