// lib/sourcing/coverage.ts

export type DomainKey = "behavioral_health" | "residential" | "idd" | "nursing";
export type DomainHits = Record<DomainKey, number>;

/** The satisfaction predicate reads this domain's ratio. */
export const PRIMARY_DOMAIN: DomainKey = "behavioral_health";

/**
 * Lowercase keywords per tracked domain. "nursing" is listed on its own
 * because it does not contain "nurse", and "rn" matches only as a whole word
 * so that words like "learn" or "governance" do not count as nursing.
 */
export const DOMAIN_KEYWORDS: Record<DomainKey, string[]> = {
  behavioral_health: ["behavioral health"],
  residential: ["residential"],
  idd: ["i/dd", "intellectual and developmental"],
  nursing: ["nurse", "nursing", "rn"],
};

export const SATISFACTION_PROFILE_RATIO = 0.8;
export const SATISFACTION_DOMAIN_RATIO = 0.4;

export function emptyDomainHits(): DomainHits {
  return { behavioral_health: 0, residential: 0, idd: 0, nursing: 0 };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

const DOMAIN_KEYS: DomainKey[] = ["behavioral_health", "residential", "idd", "nursing"];

// Keywords of three characters or fewer ("rn") only count as whole words
const KEYWORD_PATTERNS = new Map<DomainKey, RegExp[]>(
  DOMAIN_KEYS.map((domain) => [
    domain,
    DOMAIN_KEYWORDS[domain].map((keyword) =>
      keyword.length <= 3
        ? new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword)}(?![a-z0-9])`)
        : new RegExp(escapeRegExp(keyword))
    ),
  ])
);

export function matchDomains(rawText: string): DomainKey[] {
  const text = rawText.toLowerCase();
  return DOMAIN_KEYS.filter((domain) =>
    (KEYWORD_PATTERNS.get(domain) ?? []).some((pattern) => pattern.test(text))
  );
}

/** One increment per tracked domain whose keywords appear in the text. */
export function addDomainHits(hits: DomainHits, rawText: string): DomainHits {
  const next = { ...hits };
  for (const domain of matchDomains(rawText)) {
    next[domain] += 1;
  }
  return next;
}

export function isSatisfied(totalProfiles: number, targetProfiles: number, hits: DomainHits): boolean {
  if (totalProfiles < targetProfiles * SATISFACTION_PROFILE_RATIO) return false;
  const total = Math.max(totalProfiles, 1);
  return hits[PRIMARY_DOMAIN] / total >= SATISFACTION_DOMAIN_RATIO;
}

/** 2 rounds for targets up to 10, otherwise 3. */
export function roundBudget(targetProfiles: number): number {
  return targetProfiles <= 10 ? 2 : 3;
}

export function summarizeCoverage(jdTitle: string, targetProfiles: number, totalProfiles: number, hits: DomainHits): string {
  const total = Math.max(totalProfiles, 1);
  const domainHits: Record<string, string> = {};
  for (const [domain, count] of Object.entries(hits)) {
    domainHits[domain] = `${count} (${(count / total).toFixed(2)} ratio)`;
  }
  return JSON.stringify({
    jd_title: jdTitle,
    target_profiles: targetProfiles,
    total_profiles: totalProfiles,
    domain_hits: domainHits,
  });
}
