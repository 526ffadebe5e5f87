// lib/placements/build-placement-profiles.ts
import type { Embedder } from "../ai/embedder";
import type { ExtractionService } from "../ai/llm-client";
import type { NewCandidate, Placement } from "../db/schema";
import type { SourcingStore } from "../db/store";
import { errorMessage } from "../errors/sourcing-errors";
import type { PlacementProfileDraft } from "../validations/extraction";

export const SYNTHETIC_SOURCE = "synthetic_placement";

export function placementProfileUrl(placementId: number): string {
  return `placement://${placementId}`;
}

export function buildPlacementRawText(draft: PlacementProfileDraft): string {
  const history = draft.history
    .map((h) => `${h.title} at ${h.company} (${h.years ?? ""} years): ${h.description}`)
    .join("\n");
  return [draft.summary, history, `Skills: ${draft.skills.join(", ")}`].join("\n\n");
}

export interface BuildPlacementProfilesDeps {
  store: SourcingStore;
  llm: Pick<ExtractionService, "synthesizePlacementProfile">;
  embedder: Embedder;
  now?: () => Date;
}

/**
 * Gives each placement without a profile a synthetic candidate that acts as
 * a similarity anchor. A placement whose synthesis or embedding fails is
 * skipped and picked up again on the next call.
 */
export async function buildPlacementProfiles(deps: BuildPlacementProfilesDeps, limit: number): Promise<number> {
  const { store } = deps;
  const now = deps.now ?? (() => new Date());

  const pending = await store.listPlacementsWithoutProfile(limit);
  console.log(`🧬 Building profiles for ${pending.length} placements`);

  let created = 0;
  for (const [index, placement] of pending.entries()) {
    if (index === 0 || (index + 1) % 10 === 0) {
      console.log(`   Processing ${index + 1}/${pending.length}...`);
    }
    if (await buildOne(deps, placement, now())) created++;
  }

  console.log(`✅ Created ${created} placement profiles`);
  return created;
}

async function buildOne(
  { store, llm, embedder }: BuildPlacementProfilesDeps,
  placement: Placement,
  fetchedAt: Date
): Promise<boolean> {
  let draft: PlacementProfileDraft;
  try {
    draft = await llm.synthesizePlacementProfile({
      name: placement.name,
      jobTitle: placement.jobTitle,
      company: placement.company,
    });
  } catch (error) {
    console.error(`❌ Placement ${placement.id}: ${errorMessage(error)}`);
    return false;
  }

  const rawText = buildPlacementRawText(draft);

  let embedding: number[];
  try {
    embedding = await embedder.embedText(rawText);
  } catch (error) {
    console.error(`❌ Embedding failed for placement ${placement.id}: ${errorMessage(error)}`);
    return false;
  }

  const profileUrl = placementProfileUrl(placement.id);
  const fields: NewCandidate = {
    profileUrl,
    name: placement.name,
    headline: draft.headline ?? `${placement.jobTitle} at ${placement.company}`,
    currentTitle: placement.jobTitle,
    currentCompany: placement.company,
    location: null,
    yearsExperience: draft.totalYearsExperience,
    skills: draft.skills,
    domains: [],
    experience: draft.history.map((h, i) => ({
      title: h.title,
      company: h.company,
      location: null,
      startDate: null,
      endDate: null,
      isCurrent: i === 0,
      years: h.years,
      description: h.description,
    })),
    education: [],
    rawText,
    source: SYNTHETIC_SOURCE,
    lastFetchedAt: fetchedAt,
  };

  // A candidate left over from an interrupted build is reused
  const [existing] = await store.findCandidatesByUrls([profileUrl]);
  const candidate = existing ? await store.updateCandidate(existing.id, fields) : await store.insertCandidate(fields);
  await store.saveCandidateEmbedding(candidate.id, embedding, embedder.modelName);
  await store.linkPlacementProfile(placement.id, candidate.id);
  return true;
}
