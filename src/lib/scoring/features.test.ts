import { describe, expect, it } from "vitest";
import {
  computeFeatures,
  computeScore,
  fromBreakdown,
  matchedSkills,
  titleToLevel,
  toBreakdown,
  type FeatureVector,
  type ScoringCandidate,
  type ScoringJobDescription,
} from "./features";

const jd: ScoringJobDescription = {
  title: "Director of Operations",
  mustHaveSkills: ["A", "B", "C", "D"],
  domain: ["behavioral health", "residential"],
  minYearsExperience: 8,
};

const candidate: ScoringCandidate = {
  currentTitle: "Registered Nurse",
  yearsExperience: 4,
  skills: ["A", "B", "Z"],
  rawText: "Registered Nurse with Behavioral Health experience",
};

describe("computeFeatures", () => {
  it("scores half the required skills as 0.5 overlap", () => {
    const features = computeFeatures(jd, [1, 0], null, candidate, [1, 0]);
    expect(features.skills_overlap).toBe(0.5);
  });

  it("scores a director JD against a nurse title as 1/3 level match", () => {
    const features = computeFeatures(jd, [1, 0], null, candidate, [1, 0]);
    expect(features.level_match).toBeCloseTo(1 / 3, 10);
  });

  it("derives experience, domain and similarity features", () => {
    const features = computeFeatures(jd, [1, 0], [0, 1], candidate, [1, 0]);

    expect(features.experience_ok).toBe(0.5);
    expect(features.domain_match).toBe(0.5);
    expect(features.sim_JD).toBeCloseTo(1, 10);
    expect(features.sim_ideal).toBe(0);
    expect(features.tenure_score).toBe(0.5);
  });

  it("caps experience at 1", () => {
    const features = computeFeatures(jd, [1, 0], null, { ...candidate, yearsExperience: 20 }, [1, 0]);
    expect(features.experience_ok).toBe(1);
  });

  it("falls back to 0.5 when the JD gives nothing to compare", () => {
    const empty: ScoringJobDescription = { title: "Analyst", mustHaveSkills: [], domain: [], minYearsExperience: 0 };
    const features = computeFeatures(empty, [1, 0], null, candidate, [0, 1]);

    expect(features.experience_ok).toBe(0.5);
    expect(features.skills_overlap).toBe(0.5);
    expect(features.domain_match).toBe(0.5);
    expect(features.sim_JD).toBe(0);
  });
});

describe("titleToLevel", () => {
  it("maps titles onto the seniority ladder", () => {
    expect(titleToLevel("VP of Clinical Services")).toBe(4);
    expect(titleToLevel("Chief Nursing Officer")).toBe(4);
    expect(titleToLevel("Program Director")).toBe(3);
    expect(titleToLevel("Team Lead")).toBe(2);
    expect(titleToLevel("Case Worker")).toBe(1);
    expect(titleToLevel(null)).toBe(1);
  });
});

describe("matchedSkills", () => {
  it("keeps JD order and drops duplicates", () => {
    expect(matchedSkills(["C", "A", "C", "Q"], ["A", "C"])).toEqual(["C", "A"]);
  });
});

describe("computeScore", () => {
  const ones: FeatureVector = {
    sim_JD: 1,
    sim_ideal: 1,
    experience_ok: 1,
    skills_overlap: 1,
    domain_match: 1,
    level_match: 1,
    tenure_score: 1,
  };

  it("adds both groups without renormalizing", () => {
    expect(computeScore(ones)).toBeCloseTo(1.55, 10);
  });

  it("is deterministic for identical inputs", () => {
    const features = computeFeatures(jd, [0.2, 0.9], [0.4, 0.1], candidate, [0.7, 0.3]);
    expect(computeScore(features)).toBe(computeScore({ ...features }));
  });

  it("weights each feature", () => {
    const features: FeatureVector = { ...ones, sim_ideal: 0, experience_ok: 0, level_match: 0 };
    // 0.7 + 0.15 + 0.10 + 0.05
    expect(computeScore(features)).toBeCloseTo(1.0, 10);
  });
});

describe("fromBreakdown", () => {
  it("restores a stored breakdown", () => {
    const features = computeFeatures(jd, [1, 0], null, candidate, [1, 0]);
    expect(fromBreakdown(toBreakdown(features))).toEqual(features);
  });

  it("rejects missing or partial breakdowns", () => {
    expect(fromBreakdown(null)).toBeNull();
    expect(fromBreakdown({ sim_JD: 0.4 })).toBeNull();
  });
});
