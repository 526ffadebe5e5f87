import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DatasetApiChannel, matchRecordsToUrls, parseRecordsBody } from "./dataset-api";

const JANE = "https://www.linkedin.com/in/jane-doe";
const JOHN = "https://www.linkedin.com/in/john-roe";

function createChannel(fetchImpl: typeof fetch, apiKey: string | null = "test-key") {
  const wait = vi.fn(async (_ms: number) => undefined);
  const channel = new DatasetApiChannel({
    apiKey,
    datasetId: "gd_test",
    pollIntervalMs: 5_000,
    maxPolls: 4,
    requestTimeoutMs: 30_000,
    fetchImpl,
    wait,
  });
  return { channel, wait };
}

describe("DatasetApiChannel", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("polls the snapshot while it answers 202 and parses newline-delimited records", async () => {
    const janeRecord = { url: `${JANE}/`, id: "jane", name: "Jane Doe", about: "Program director" };
    const ndjson = [
      JSON.stringify(janeRecord),
      JSON.stringify({ input: { url: "https://linkedin.com/in/john-roe" }, warning: "dead_page" }),
    ].join("\n");

    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response(JSON.stringify({ snapshot_id: "s_1" }), { status: 202 }))
      .mockResolvedValueOnce(new Response(null, { status: 202 }))
      .mockResolvedValueOnce(new Response(ndjson, { status: 200 }));
    const { channel, wait } = createChannel(fetchImpl);

    const results = await channel.fetchBatch([JANE, JOHN]);

    expect(results.get(JANE)).toBe(JSON.stringify(janeRecord, null, 2));
    expect(results.get(JOHN)).toBeNull();
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(String(fetchImpl.mock.calls[0][0])).toContain("dataset_id=gd_test");
    expect(String(fetchImpl.mock.calls[2][0])).toContain("/snapshot/s_1");
    expect(wait.mock.calls).toEqual([[5_000], [5_000]]);
  });

  it("matches records without a url by position", async () => {
    const body = JSON.stringify([
      { id: "a", name: "First" },
      { id: "b", name: "Second" },
    ]);
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValueOnce(new Response(body, { status: 200 }));
    const { channel } = createChannel(fetchImpl);

    const results = await channel.fetchBatch([JANE, JOHN]);

    expect(JSON.parse(results.get(JANE) ?? "null")).toEqual({ id: "a", name: "First" });
    expect(JSON.parse(results.get(JOHN) ?? "null")).toEqual({ id: "b", name: "Second" });
  });

  it("gives up after the poll budget", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response(JSON.stringify({ snapshot_id: "s_2" }), { status: 202 }))
      .mockImplementation(async () => new Response(null, { status: 202 }));
    const { channel, wait } = createChannel(fetchImpl);

    const results = await channel.fetchBatch([JANE]);

    expect(results.get(JANE)).toBeNull();
    expect(wait).toHaveBeenCalledTimes(4);
    expect(fetchImpl).toHaveBeenCalledTimes(5);
  });

  it("maps every URL to null on a 429", async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(new Response("slow down", { status: 429, headers: { "retry-after": "30" } }));
    const { channel } = createChannel(fetchImpl);

    const results = await channel.fetchBatch([JANE, JOHN]);

    expect(Array.from(results.values())).toEqual([null, null]);
  });

  it("is unavailable and makes no request without an API key", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const { channel } = createChannel(fetchImpl, null);

    expect(channel.isAvailable()).toBe(false);
    expect((await channel.fetchBatch([JANE])).get(JANE)).toBeNull();
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe("parseRecordsBody", () => {
  it("unwraps data arrays and wraps single objects", () => {
    expect(parseRecordsBody(JSON.stringify({ data: [1, 2] }))).toEqual([1, 2]);
    expect(parseRecordsBody(JSON.stringify({ id: "x" }))).toEqual([{ id: "x" }]);
  });

  it("is null for empty or unparseable bodies", () => {
    expect(parseRecordsBody("   ")).toBeNull();
    expect(parseRecordsBody("not json\nat all")).toBeNull();
  });
});

describe("matchRecordsToUrls", () => {
  it("ignores records for URLs that were not requested", () => {
    const results = matchRecordsToUrls([JANE], [{ url: "https://www.linkedin.com/in/someone-else", id: "z" }]);
    expect(results.get(JANE)).toBeNull();
  });

  it("drops records with neither id nor name", () => {
    const results = matchRecordsToUrls([JANE], [{ url: JANE, headline: "only a headline" }]);
    expect(results.get(JANE)).toBeNull();
  });
});
