// lib/sourcing/nodes/finish-sourcing.ts
import type { SourcingContext } from "../context";
import type { SourcingState, SourcingStateUpdate } from "../state";

export function createFinishSourcingNode({ store, trace }: SourcingContext) {
  return async function finishSourcing(state: SourcingState): Promise<SourcingStateUpdate> {
    const outcome = state.outcome ?? "MAX_ROUNDS";
    const total = state.candidateIds.length;

    await store.checkpointRun(state.runId, state.seenUrls.size, total, state.round);
    trace.log(
      "Manager",
      "SourcingComplete",
      `${outcome}: ${total}/${state.targetProfiles} profiles from ${state.seenUrls.size} URLs in ${state.round} rounds`,
      "Done"
    );
    console.log(`✅ Sourcing finished (${outcome}): ${total}/${state.targetProfiles} profiles`);
    return { outcome };
  };
}
