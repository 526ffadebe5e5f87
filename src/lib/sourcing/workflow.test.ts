import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { SearchMetadata } from "../ai/profile-enricher";
import type { SearchResult, SearchService } from "../search/search-client";
import type { FetchedCandidate } from "../scrapping/profile-fetcher";
import { FakeExtractionService, makeCandidate } from "../testing/fakes";
import type { ProfileSource, SourcingServices } from "./context";
import type { SourcingJob } from "./state";
import { runSourcing } from "./workflow";

const JOB: SourcingJob = {
  id: 1,
  title: "Program Director",
  seniority: "Director",
  domain: ["behavioral health"],
  mustHaveSkills: ["Budgeting"],
  location: null,
};

function result(slug: string): SearchResult {
  return { url: `https://www.linkedin.com/in/${slug}`, title: `${slug} - Director`, snippet: "" };
}

class ScriptedSearch implements SearchService {
  readonly provider = "scripted";
  readonly queries: string[] = [];

  constructor(private readonly answers: (query: string) => SearchResult[]) {}

  async search(query: string): Promise<SearchResult[]> {
    this.queries.push(query);
    return this.answers(query);
  }
}

/** Assigns ids in first-seen order; rawText decides domain coverage. */
class FakeFetcher implements ProfileSource {
  readonly batches: string[][] = [];
  private readonly ids = new Map<string, number>();

  constructor(private readonly rawText: string) {}

  async fetchBatch(requests: SearchMetadata[]): Promise<FetchedCandidate[]> {
    this.batches.push(requests.map((r) => r.url));
    return requests.map((request) => {
      const id = this.ids.get(request.url) ?? this.ids.size + 1;
      this.ids.set(request.url, id);
      return {
        candidate: makeCandidate(id, { profileUrl: request.url, rawText: this.rawText }),
        fromCache: id % 2 === 0,
        channel: null,
      };
    });
  }
}

describe("runSourcing", () => {
  let llm: FakeExtractionService;
  let checkpoints: number[][];

  beforeEach(() => {
    llm = new FakeExtractionService();
    llm.initialQueries = ["q1"];
    checkpoints = [];
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function services(search: SearchService, fetcher: ProfileSource): SourcingServices {
    return {
      llm,
      search,
      fetcher,
      store: {
        checkpointRun: async (runId, urlsFound, profilesParsed, roundsCompleted) => {
          checkpoints.push([runId, urlsFound, profilesParsed, roundsCompleted]);
        },
      },
    };
  }

  it("stops at the round budget when coverage never satisfies", async () => {
    const search = new ScriptedSearch(() => [result("a"), result("b"), result("c")]);
    const fetcher = new FakeFetcher("Operations leader");

    const outcome = await runSourcing(services(search, fetcher), { runId: 7, jd: JOB, targetProfiles: 10 });

    expect(outcome).toMatchObject({
      outcome: "MAX_ROUNDS",
      candidateIds: [1, 2, 3],
      urlsFound: 3,
      profilesParsed: 3,
      profilesFromCache: 1,
      roundsCompleted: 2,
    });
    expect(search.queries).toEqual(["q1", "q1"]);
    expect(fetcher.batches).toHaveLength(1);
    expect(checkpoints).toEqual([
      [7, 3, 3, 1],
      [7, 3, 3, 2],
      [7, 3, 3, 2],
    ]);
    expect(outcome.trace.map((e) => `${e.agentName}.${e.action}`)).toEqual([
      "Manager.Start",
      "Scout.GenerateQueries",
      "Manager.RoundStart",
      "Scout.Search",
      "Scout.URLCollection",
      "Scout.FetchBatch",
      "Scout.FetchComplete",
      "Manager.CoverageUpdate",
      "Manager.RefineQueries",
      "Manager.RoundStart",
      "Scout.Search",
      "Scout.URLCollection",
      "Scout.FetchBatch",
      "Scout.FetchComplete",
      "Manager.CoverageUpdate",
      "Manager.Stop",
      "Manager.SourcingComplete",
    ]);
  });

  it("finishes after one round once coverage is satisfied", async () => {
    const search = new ScriptedSearch(() => ["a", "b", "c", "d", "e", "f", "g"].map(result));
    const fetcher = new FakeFetcher("Director of behavioral health programs");

    const outcome = await runSourcing(services(search, fetcher), { runId: 1, jd: JOB, targetProfiles: 5 });

    expect(outcome.outcome).toBe("SATISFIED");
    expect(outcome.roundsCompleted).toBe(1);
    // needed plus one spare
    expect(fetcher.batches).toEqual([["a", "b", "c", "d", "e", "f"].map((s) => result(s).url)]);
    expect(outcome.candidateIds).toEqual([1, 2, 3, 4, 5, 6]);
    expect(outcome.urlsFound).toBe(7);
  });

  it("never fetches a URL twice across refined rounds", async () => {
    llm.refinedQueries = ["q2"];
    const search = new ScriptedSearch((query) =>
      query === "q1" ? [result("a"), result("b")] : [result("b"), result("c")]
    );
    const fetcher = new FakeFetcher("Operations leader");

    const outcome = await runSourcing(services(search, fetcher), { runId: 1, jd: JOB, targetProfiles: 10 });

    expect(search.queries).toEqual(["q1", "q2"]);
    expect(fetcher.batches).toEqual([[result("a").url, result("b").url], [result("c").url]]);
    expect(outcome.urlsFound).toBe(3);
    expect(llm.calls.refine).toHaveLength(1);
  });

  it("reports TARGET_REACHED when the next search finds the target already met", async () => {
    const search = new ScriptedSearch(() => [result("a"), result("b"), result("c")]);
    const fetcher = new FakeFetcher("Operations leader");

    const outcome = await runSourcing(services(search, fetcher), { runId: 1, jd: JOB, targetProfiles: 2 });

    expect(outcome.outcome).toBe("TARGET_REACHED");
    expect(outcome.roundsCompleted).toBe(2);
    expect(fetcher.batches).toHaveLength(1);
    expect(outcome.candidateIds).toEqual([1, 2, 3]);
  });

  it("falls back to a title query when query generation fails", async () => {
    llm.initialQueries = new Error("model unavailable");
    const search = new ScriptedSearch(() => []);
    const fetcher = new FakeFetcher("");

    const outcome = await runSourcing(services(search, fetcher), {
      runId: 1,
      jd: JOB,
      targetProfiles: 5,
      maxRounds: 1,
    });

    expect(search.queries).toEqual(['"Program Director" "behavioral health" site:linkedin.com/in/']);
    expect(outcome.outcome).toBe("MAX_ROUNDS");
    expect(outcome.candidateIds).toEqual([]);
  });

  it("treats a failing search as an empty result", async () => {
    const search = new ScriptedSearch(() => {
      throw new Error("quota exhausted");
    });

    const outcome = await runSourcing(services(search, new FakeFetcher("")), {
      runId: 1,
      jd: JOB,
      targetProfiles: 5,
      maxRounds: 1,
    });

    expect(outcome.outcome).toBe("MAX_ROUNDS");
    expect(outcome.urlsFound).toBe(0);
  });
});
