// lib/scoring/features.ts
import { cosineSimilarity } from "./similarity";

export interface ScoringJobDescription {
  title: string;
  mustHaveSkills: string[];
  domain: string[];
  minYearsExperience: number;
}

export interface ScoringCandidate {
  currentTitle: string | null;
  yearsExperience: number | null;
  skills: string[];
  rawText: string;
}

export interface FeatureVector {
  sim_JD: number;
  sim_ideal: number;
  experience_ok: number;
  skills_overlap: number;
  domain_match: number;
  level_match: number;
  tenure_score: number;
}

export const SCORE_WEIGHTS: FeatureVector = {
  sim_JD: 0.7,
  sim_ideal: 0.3,
  experience_ok: 0.15,
  skills_overlap: 0.15,
  domain_match: 0.1,
  level_match: 0.1,
  tenure_score: 0.05,
};

const LEVEL_RULES: Array<{ level: number; keywords: string[] }> = [
  { level: 4, keywords: ["vp", "vice president", "chief", "cmo", "ceo"] },
  { level: 3, keywords: ["director"] },
  { level: 2, keywords: ["manager", "lead", "supervisor"] },
];

/**
 * Seniority ladder used by level_match: 4 executive, 3 director,
 * 2 manager/lead, 1 everything else. Substring match on the lowercased title.
 */
export function titleToLevel(title: string | null | undefined): number {
  const t = (title ?? "").toLowerCase();
  for (const rule of LEVEL_RULES) {
    if (rule.keywords.some((keyword) => t.includes(keyword))) {
      return rule.level;
    }
  }
  return 1;
}

export function matchedSkills(mustHave: string[], skills: string[]): string[] {
  const owned = new Set(skills);
  return Array.from(new Set(mustHave)).filter((skill) => owned.has(skill));
}

export function computeFeatures(
  jd: ScoringJobDescription,
  jdEmbedding: number[],
  idealEmbedding: number[] | null,
  candidate: ScoringCandidate,
  candidateEmbedding: number[]
): FeatureVector {
  const experience_ok =
    candidate.yearsExperience !== null && jd.minYearsExperience > 0
      ? Math.min(1, candidate.yearsExperience / jd.minYearsExperience)
      : 0.5;

  const mustHave = new Set(jd.mustHaveSkills);
  const skills_overlap =
    mustHave.size > 0 ? matchedSkills(jd.mustHaveSkills, candidate.skills).length / mustHave.size : 0.5;

  const text = candidate.rawText.toLowerCase();
  const domain_match =
    jd.domain.length > 0
      ? jd.domain.filter((term) => text.includes(term.toLowerCase())).length / jd.domain.length
      : 0.5;

  const levelGap = Math.abs(titleToLevel(jd.title) - titleToLevel(candidate.currentTitle));

  return {
    sim_JD: cosineSimilarity(jdEmbedding, candidateEmbedding),
    sim_ideal: idealEmbedding ? cosineSimilarity(idealEmbedding, candidateEmbedding) : 0,
    experience_ok,
    skills_overlap,
    domain_match,
    level_match: Math.max(0, 1 - levelGap / 3),
    tenure_score: 0.5,
  };
}

/**
 * Weighted sum of the similarity and heuristic groups. Not renormalized, so
 * the total can exceed 1.
 */
export function computeScore(features: FeatureVector): number {
  const similarity = SCORE_WEIGHTS.sim_JD * features.sim_JD + SCORE_WEIGHTS.sim_ideal * features.sim_ideal;
  const heuristics =
    SCORE_WEIGHTS.experience_ok * features.experience_ok +
    SCORE_WEIGHTS.skills_overlap * features.skills_overlap +
    SCORE_WEIGHTS.domain_match * features.domain_match +
    SCORE_WEIGHTS.level_match * features.level_match +
    SCORE_WEIGHTS.tenure_score * features.tenure_score;
  return similarity + heuristics;
}

export function toBreakdown(features: FeatureVector): Record<string, number> {
  return { ...features };
}

export function fromBreakdown(breakdown: Record<string, number> | null): FeatureVector | null {
  if (!breakdown) return null;
  const keys = Object.keys(SCORE_WEIGHTS);
  if (!keys.every((key) => typeof breakdown[key] === "number")) return null;
  return {
    sim_JD: breakdown.sim_JD,
    sim_ideal: breakdown.sim_ideal,
    experience_ok: breakdown.experience_ok,
    skills_overlap: breakdown.skills_overlap,
    domain_match: breakdown.domain_match,
    level_match: breakdown.level_match,
    tenure_score: breakdown.tenure_score,
  };
}
