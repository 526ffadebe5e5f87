// lib/sourcing/workflow.ts
import { StateGraph, START, END } from "@langchain/langgraph";
import type { SourcingOutcome } from "../db/schema";
import { roundBudget } from "./coverage";
import type { SourcingContext, SourcingServices } from "./context";
import { SourcingStateAnnotation } from "./state";
import type { SourcingJob, SourcingState } from "./state";
import { RunTrace, type TraceEntry } from "./trace";

import { createPlanQueriesNode } from "./nodes/plan-queries";
import { createSearchRoundNode } from "./nodes/search-round";
import { createFetchProfilesNode } from "./nodes/fetch-profiles";
import { createRefineQueriesNode } from "./nodes/refine-queries";
import { createFinishSourcingNode } from "./nodes/finish-sourcing";

export function createSourcingWorkflow(context: SourcingContext) {
  const graph = new StateGraph(SourcingStateAnnotation)
    .addNode("plan_queries", createPlanQueriesNode(context))
    .addNode("search_round", createSearchRoundNode(context))
    .addNode("fetch_profiles", createFetchProfilesNode(context))
    .addNode("refine_queries", createRefineQueriesNode(context))
    .addNode("finish_sourcing", createFinishSourcingNode(context));

  graph.addEdge(START, "plan_queries");
  graph.addEdge("plan_queries", "search_round");

  graph.addConditionalEdges(
    "search_round",
    (state: SourcingState) => (state.outcome ? "finish" : "fetch"),
    {
      finish: "finish_sourcing",
      fetch: "fetch_profiles",
    }
  );

  // Loop back through refinement until satisfied or out of rounds
  graph.addConditionalEdges(
    "fetch_profiles",
    (state: SourcingState) => {
      if (state.outcome) return "finish";
      console.log(
        `🔄 Coverage not satisfied (${state.candidateIds.length}/${state.targetProfiles}) - refining for round ${
          state.round + 1
        }/${state.maxRounds}`
      );
      return "refine";
    },
    {
      finish: "finish_sourcing",
      refine: "refine_queries",
    }
  );

  graph.addEdge("refine_queries", "search_round");
  graph.addEdge("finish_sourcing", END);

  return graph.compile();
}

export interface SourcingRequest {
  runId: number;
  jd: SourcingJob;
  targetProfiles: number;
  /** Defaults to the round budget for the target. */
  maxRounds?: number;
}

export interface SourcingResult {
  outcome: SourcingOutcome;
  candidateIds: number[];
  urlsFound: number;
  profilesParsed: number;
  profilesFromCache: number;
  roundsCompleted: number;
  sourcingTimeMs: number;
  trace: TraceEntry[];
}

/**
 * Runs the round loop for one run. Always resolves with whatever was
 * acquired; an unsatisfied run at the round budget is a normal result.
 */
export async function runSourcing(services: SourcingServices, request: SourcingRequest): Promise<SourcingResult> {
  const startedAt = Date.now();
  const trace = new RunTrace(request.runId);
  const maxRounds = request.maxRounds ?? roundBudget(request.targetProfiles);
  const workflow = createSourcingWorkflow({ ...services, trace });

  const final = await workflow.invoke(
    {
      runId: request.runId,
      jd: request.jd,
      targetProfiles: request.targetProfiles,
      maxRounds,
    },
    // plan + three nodes per round + finish
    { recursionLimit: maxRounds * 3 + 5 }
  );

  return {
    outcome: final.outcome ?? "MAX_ROUNDS",
    candidateIds: final.candidateIds,
    urlsFound: final.seenUrls.size,
    profilesParsed: final.candidateIds.length,
    profilesFromCache: final.profilesFromCache,
    roundsCompleted: final.round,
    sourcingTimeMs: Date.now() - startedAt,
    trace: trace.drain(),
  };
}
