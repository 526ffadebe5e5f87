// lib/scoring/explain.ts
import { matchedSkills, type FeatureVector } from "./features";

export interface ExplainCandidate {
  currentTitle: string | null;
  currentCompany: string | null;
  yearsExperience: number | null;
  skills: string[];
}

export interface ExplainJobDescription {
  mustHaveSkills: string[];
  domain: string[];
}

export interface ExplainPlacement {
  jobTitle: string;
  company: string;
}

/**
 * Human-readable bullets for one scored candidate, derived only from the
 * feature vector and the records it was computed from.
 */
export function buildExplanation(
  jd: ExplainJobDescription,
  candidate: ExplainCandidate,
  features: FeatureVector,
  closestPlacement: ExplainPlacement | null
): string[] {
  const bullets: string[] = [];
  const role = `${candidate.currentTitle || "Unknown"} at ${candidate.currentCompany || "Unknown"}`;

  if (candidate.yearsExperience !== null) {
    bullets.push(`${candidate.yearsExperience.toFixed(1)} years experience; current role: ${role}.`);
  } else {
    bullets.push(`Current role: ${role}.`);
  }

  if (jd.mustHaveSkills.length > 0) {
    const matched = matchedSkills(jd.mustHaveSkills, candidate.skills);
    const sample = matched.length > 0 ? ` (${matched.slice(0, 4).join(", ")}…)` : ".";
    bullets.push(`Matches ${matched.length}/${jd.mustHaveSkills.length} required skills${sample}`);
  }

  if (features.domain_match > 0.4 && jd.domain.length > 0) {
    bullets.push(`Domain alignment in: ${jd.domain.join(", ")}`);
  }

  if (closestPlacement && features.sim_ideal > 0.5) {
    bullets.push(`Profile is similar to past hire: ${closestPlacement.jobTitle} at ${closestPlacement.company}.`);
  }

  return bullets;
}
