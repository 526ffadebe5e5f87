// lib/sourcing/nodes/plan-queries.ts
import { errorMessage } from "../../errors/sourcing-errors";
import type { SourcingContext } from "../context";
import type { SourcingJob, SourcingState, SourcingStateUpdate } from "../state";

/** Used when the extraction service returns nothing usable. */
export function fallbackQuery(jd: Pick<SourcingJob, "title" | "domain">): string {
  const domain = jd.domain[0];
  return domain ? `"${jd.title}" "${domain}" site:linkedin.com/in/` : `"${jd.title}" site:linkedin.com/in/`;
}

export function createPlanQueriesNode({ llm, trace }: SourcingContext) {
  return async function planQueries(state: SourcingState): Promise<SourcingStateUpdate> {
    trace.log(
      "Manager",
      "Start",
      `Sourcing "${state.jd.title}": target ${state.targetProfiles} profiles within ${state.maxRounds} rounds`,
      "Thinking"
    );

    let queries: string[] = [];
    try {
      queries = await llm.proposeQueries(state.jd);
    } catch (error) {
      console.warn(`⚠️ Query generation failed, using fallback query: ${errorMessage(error)}`);
    }
    if (queries.length === 0) queries = [fallbackQuery(state.jd)];

    trace.log("Scout", "GenerateQueries", `Generated ${queries.length} queries: ${queries.join(" | ")}`, "Done");
    return { queries };
  };
}
