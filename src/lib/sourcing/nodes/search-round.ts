// lib/sourcing/nodes/search-round.ts
import { errorMessage } from "../../errors/sourcing-errors";
import type { SearchResult } from "../../search/search-client";
import type { SourcingContext } from "../context";
import type { SourcingState, SourcingStateUpdate } from "../state";

export const RESULTS_PER_QUERY = 20;

/**
 * Runs the current query set, keeps URLs not seen earlier in the run and
 * caps the fetch batch to what is still needed (plus one spare).
 */
export function createSearchRoundNode({ search, trace }: SourcingContext) {
  return async function searchRound(state: SourcingState): Promise<SourcingStateUpdate> {
    const round = state.round + 1;
    console.log(`\n🔍 SEARCH ROUND ${round}/${state.maxRounds}`);
    trace.log("Manager", "RoundStart", `Round ${round}/${state.maxRounds} with ${state.queries.length} queries`, "Acting");

    const seen = new Set(state.seenUrls);
    const fresh: SearchResult[] = [];

    for (const query of state.queries) {
      let results: SearchResult[] = [];
      try {
        results = await search.search(query, RESULTS_PER_QUERY);
      } catch (error) {
        console.warn(`⚠️ Search failed for "${query}": ${errorMessage(error)}`);
      }
      trace.log("Scout", "Search", `"${query}" returned ${results.length} profile results`, "Done");

      for (const result of results) {
        if (seen.has(result.url)) continue;
        seen.add(result.url);
        fresh.push(result);
      }
    }

    trace.log("Scout", "URLCollection", `${fresh.length} new URLs this round, ${seen.size} seen in total`, "Done");

    const needed = state.targetProfiles - state.candidateIds.length;
    if (needed <= 0) {
      return { round, seenUrls: seen, pendingResults: [], outcome: "TARGET_REACHED" };
    }

    return { round, seenUrls: seen, pendingResults: fresh.slice(0, needed + 1) };
  };
}
