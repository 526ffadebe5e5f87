import { afterEach, describe, expect, it, vi } from "vitest";
import { RunTrace } from "./trace";

describe("RunTrace", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drains entries in the order they were logged", () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    let tick = 0;
    const trace = new RunTrace(7, () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++)));

    trace.log("Manager", "Start", "begin", "Thinking");
    trace.log("Scout", "Search", "query one", "Done");
    trace.log("Manager", "Stop", "enough", "Done");

    const entries = trace.drain();
    expect(entries.map((e) => e.action)).toEqual(["Start", "Search", "Stop"]);
    expect(entries.map((e) => e.timestamp.getUTCSeconds())).toEqual([0, 1, 2]);
    expect(entries[1]).toMatchObject({ agentName: "Scout", reasoning: "query one", status: "Done" });
    expect(trace.entries).toHaveLength(0);
  });
});
