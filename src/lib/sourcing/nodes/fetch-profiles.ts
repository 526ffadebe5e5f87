// lib/sourcing/nodes/fetch-profiles.ts
import type { SourcingOutcome } from "../../db/schema";
import { addDomainHits, isSatisfied, summarizeCoverage } from "../coverage";
import type { SourcingContext } from "../context";
import type { SourcingState, SourcingStateUpdate } from "../state";

export function createFetchProfilesNode({ fetcher, store, trace }: SourcingContext) {
  return async function fetchProfiles(state: SourcingState): Promise<SourcingStateUpdate> {
    const batch = state.pendingResults;
    const needed = state.targetProfiles - state.candidateIds.length;
    trace.log("Scout", "FetchBatch", `Fetching ${batch.length} profiles (${needed} still needed)`, "Acting");

    const fetched = batch.length > 0 ? await fetcher.fetchBatch(batch) : [];

    const known = new Set(state.candidateIds);
    const newIds: number[] = [];
    let domainHits = state.domainHits;
    let fromCache = 0;

    for (const { candidate, fromCache: cached } of fetched) {
      if (known.has(candidate.id)) continue;
      known.add(candidate.id);
      newIds.push(candidate.id);
      domainHits = addDomainHits(domainHits, candidate.rawText);
      if (cached) fromCache++;
    }

    const total = state.candidateIds.length + newIds.length;
    trace.log(
      "Scout",
      "FetchComplete",
      `Acquired ${newIds.length}/${batch.length} (${fromCache} from cache), ${total}/${state.targetProfiles} in total`,
      "Done"
    );
    trace.log(
      "Manager",
      "CoverageUpdate",
      summarizeCoverage(state.jd.title, state.targetProfiles, total, domainHits),
      "Done"
    );

    await store.checkpointRun(state.runId, state.seenUrls.size, total, state.round);

    let outcome: SourcingOutcome | null = null;
    if (isSatisfied(total, state.targetProfiles, domainHits)) {
      outcome = "SATISFIED";
      trace.log("Manager", "Stop", `Coverage satisfied with ${total}/${state.targetProfiles} profiles`, "Done");
    } else if (state.round >= state.maxRounds) {
      outcome = "MAX_ROUNDS";
      trace.log(
        "Manager",
        "Stop",
        `Round budget of ${state.maxRounds} used with ${total}/${state.targetProfiles} profiles`,
        "Done"
      );
    }

    return { candidateIds: newIds, profilesFromCache: fromCache, domainHits, outcome };
  };
}
