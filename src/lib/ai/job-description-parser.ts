// lib/ai/job-description-parser.ts
import type { SourcingStore } from "../db/store";
import type { JobDescription } from "../db/schema";
import type { ParsedJobDescription } from "../validations/extraction";
import type { ExtractionService } from "./llm-client";
import type { Embedder } from "./embedder";

/**
 * Condensed text that gets embedded for the JD:
 * "title | seniority | domains | min N years experience | Must-have: ..."
 */
export function buildJobSummary(jd: ParsedJobDescription): string {
  return [
    jd.title,
    jd.seniority,
    jd.domain.join(", "),
    `min ${jd.minYearsExperience} years experience`,
    `Must-have: ${jd.mustHaveSkills.slice(0, 10).join(", ")}`,
  ].join(" | ");
}

/**
 * Parse, persist and embed a job description.
 * Extraction errors propagate: a run cannot start without a parsed JD.
 */
export async function createJobDescription(
  store: SourcingStore,
  llm: ExtractionService,
  embedder: Embedder,
  rawText: string
): Promise<JobDescription> {
  console.log("🎨 Parsing job description...");
  const parsed = await llm.parseJobDescription(rawText);

  const jd = await store.createJobDescription(rawText, parsed);
  const embedding = await embedder.embedText(buildJobSummary(parsed));
  await store.saveJdEmbedding(jd.id, embedding, embedder.modelName);

  console.log(`✅ JD ${jd.id} parsed: "${jd.title}" (${jd.seniority}, ${jd.domain.length} domains)`);
  return jd;
}
