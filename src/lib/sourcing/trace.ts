// lib/sourcing/trace.ts

export type AgentName = "Manager" | "Scout";
export type TraceStatus = "Thinking" | "Acting" | "Done";

export interface TraceEntry {
  agentName: AgentName;
  action: string;
  reasoning: string;
  status: TraceStatus;
  timestamp: Date;
}

/**
 * Append-only trace of one run. Buffered in memory and handed to the store
 * in a single ordered write when the run ends.
 */
export class RunTrace {
  private readonly buffer: TraceEntry[] = [];

  constructor(
    readonly runId: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  log(agentName: AgentName, action: string, reasoning: string, status: TraceStatus): void {
    this.buffer.push({ agentName, action, reasoning, status, timestamp: this.now() });
    console.log(`🤖 [run ${this.runId}] ${agentName}.${action} (${status}): ${reasoning}`);
  }

  get entries(): readonly TraceEntry[] {
    return this.buffer;
  }

  /** Empties the buffer and returns its entries in insertion order. */
  drain(): TraceEntry[] {
    return this.buffer.splice(0, this.buffer.length);
  }
}
