// lib/sourcing/nodes/refine-queries.ts
import { errorMessage } from "../../errors/sourcing-errors";
import { summarizeCoverage } from "../coverage";
import type { SourcingContext } from "../context";
import type { SourcingState, SourcingStateUpdate } from "../state";

export function createRefineQueriesNode({ llm, trace }: SourcingContext) {
  return async function refineQueries(state: SourcingState): Promise<SourcingStateUpdate> {
    const summary = summarizeCoverage(
      state.jd.title,
      state.targetProfiles,
      state.candidateIds.length,
      state.domainHits
    );

    let refined: string[] = [];
    try {
      refined = await llm.refineQueries(state.jd, summary);
    } catch (error) {
      console.warn(`⚠️ Query refinement failed, reusing current queries: ${errorMessage(error)}`);
    }

    // Previously seen URLs are filtered anyway, so reusing queries is harmless
    const queries = refined.length > 0 ? refined : state.queries;
    trace.log(
      "Manager",
      "RefineQueries",
      refined.length > 0 ? `Refined queries: ${queries.join(" | ")}` : "No refined queries, keeping the current set",
      "Acting"
    );
    return { queries };
  };
}
