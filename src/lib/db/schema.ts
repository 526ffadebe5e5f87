import { sqliteTable, text, integer, real } from "drizzle-orm/sqlite-core";
import type { EducationEntry, RoleEntry } from "../validations/extraction";

export const jobDescriptions = sqliteTable("job_descriptions", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  rawText: text("raw_text").notNull(),
  title: text("title").notNull(),
  seniority: text("seniority").notNull(),
  domain: text("domain", { mode: "json" }).$type<string[]>().notNull(),
  mustHaveSkills: text("must_have_skills", { mode: "json" }).$type<string[]>().notNull(),
  niceToHaveSkills: text("nice_to_have_skills", { mode: "json" }).$type<string[]>().notNull(),
  minYearsExperience: integer("min_years_experience").notNull().default(0),
  location: text("location"),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
});

export const jdEmbeddings = sqliteTable("jd_embeddings", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  jdId: integer("jd_id").notNull().references(() => jobDescriptions.id),
  embedding: text("embedding", { mode: "json" }).$type<number[]>().notNull(),
  modelName: text("model_name").notNull(),
});

export const candidates = sqliteTable("candidates", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  profileUrl: text("profile_url").notNull().unique(),
  name: text("name").notNull(),
  headline: text("headline"),
  currentTitle: text("current_title"),
  currentCompany: text("current_company"),
  location: text("location"),
  yearsExperience: real("years_experience"),
  skills: text("skills", { mode: "json" }).$type<string[]>().notNull(),
  domains: text("domains", { mode: "json" }).$type<string[]>().notNull(),
  experience: text("experience", { mode: "json" }).$type<RoleEntry[]>().notNull(),
  education: text("education", { mode: "json" }).$type<EducationEntry[]>().notNull(),
  rawText: text("raw_text").notNull(),
  source: text("source").notNull(), // linkedin | synthetic_placement
  lastFetchedAt: integer("last_fetched_at", { mode: "timestamp_ms" }).notNull(),
});

export const candidateEmbeddings = sqliteTable("candidate_embeddings", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  candidateId: integer("candidate_id").notNull().references(() => candidates.id),
  embedding: text("embedding", { mode: "json" }).$type<number[]>().notNull(),
  modelName: text("model_name").notNull(),
});

export const placements = sqliteTable("placements", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  name: text("name").notNull(),
  company: text("company").notNull(),
  jobTitle: text("job_title").notNull(),
  positionId: text("position_id"),
  placementType: text("placement_type"),
  datePosted: text("date_posted"),
  placementDate: text("placement_date"),
  startDate: text("start_date"),
});

export const placementProfiles = sqliteTable("placement_profiles", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  placementId: integer("placement_id").notNull().references(() => placements.id),
  candidateId: integer("candidate_id").notNull().references(() => candidates.id),
});

export const runs = sqliteTable("runs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  jdId: integer("jd_id").notNull().references(() => jobDescriptions.id),
  status: text("status").$type<RunStatus>().notNull().default("CREATED"),
  outcome: text("outcome").$type<SourcingOutcome>(),
  targetProfiles: integer("target_profiles").notNull(),
  roundsCompleted: integer("rounds_completed").notNull().default(0),
  urlsFound: integer("urls_found").notNull().default(0),
  profilesParsed: integer("profiles_parsed").notNull().default(0),
  profilesFromCache: integer("profiles_from_cache").notNull().default(0),
  sourcingTimeMs: integer("sourcing_time_ms").notNull().default(0),
  rankingTimeMs: integer("ranking_time_ms").notNull().default(0),
  /** Placement most similar to the JD, kept as the run's label. */
  idealPlacementId: integer("ideal_placement_id").references(() => placements.id),
  errorMessage: text("error_message"),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
  completedAt: integer("completed_at", { mode: "timestamp_ms" }),
});

export const runCandidates = sqliteTable("run_candidates", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  runId: integer("run_id").notNull().references(() => runs.id),
  candidateId: integer("candidate_id").notNull().references(() => candidates.id),
  score: real("score").notNull().default(0),
  featureBreakdown: text("feature_breakdown", { mode: "json" }).$type<Record<string, number>>(),
  placementSimilarity: real("placement_similarity").notNull().default(0),
  closestPlacementId: integer("closest_placement_id").references(() => placements.id),
});

export const agentLogs = sqliteTable("agent_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  runId: integer("run_id").notNull().references(() => runs.id),
  seq: integer("seq").notNull(),
  agentName: text("agent_name").notNull(),
  action: text("action").notNull(),
  reasoning: text("reasoning").notNull(),
  status: text("status").notNull(),
  timestamp: integer("timestamp", { mode: "timestamp_ms" }).notNull(),
});

export type RunStatus = "CREATED" | "SOURCING" | "SCORING" | "COMPLETED" | "FAILED";
export type SourcingOutcome = "SATISFIED" | "TARGET_REACHED" | "MAX_ROUNDS";

export type JobDescription = typeof jobDescriptions.$inferSelect;
export type Candidate = typeof candidates.$inferSelect;
export type NewCandidate = typeof candidates.$inferInsert;
export type Placement = typeof placements.$inferSelect;
export type Run = typeof runs.$inferSelect;
export type RunCandidate = typeof runCandidates.$inferSelect;
export type AgentLog = typeof agentLogs.$inferSelect;
