// lib/scrapping/channels/dataset-api.ts
import { RateLimitError, parseRetryAfter } from "../../errors/rate-limit-error";
import { errorMessage } from "../../errors/sourcing-errors";
import { sleep } from "../../utils/concurrency";
import { ProfileChannel, type ProfileTarget } from "./types";

const API_BASE = "https://api.brightdata.com/datasets/v3";

export interface DatasetApiOptions {
  apiKey: string | null;
  datasetId: string;
  pollIntervalMs: number;
  maxPolls: number;
  requestTimeoutMs: number;
  fetchImpl?: typeof fetch;
  wait?: (ms: number) => Promise<void>;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Body as a JSON document, or as newline-delimited records when it is not
 * one. Unparseable lines are dropped.
 */
export function parseRecordsBody(text: string): unknown[] | null {
  const trimmed = text.trim();
  if (!trimmed) return null;

  try {
    const data: unknown = JSON.parse(trimmed);
    if (Array.isArray(data)) return data;
    if (isRecord(data)) {
      const nested = data.data ?? data.results;
      if (Array.isArray(nested)) return nested;
      return [data];
    }
    return null;
  } catch {
    const records: unknown[] = [];
    for (const line of trimmed.split("\n")) {
      const candidate = line.trim();
      if (!candidate) continue;
      try {
        records.push(JSON.parse(candidate));
      } catch {
        continue;
      }
    }
    return records.length > 0 ? records : null;
  }
}

function normalizeProfileUrl(url: string): string {
  return url
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\/([a-z]{2,3}\.)?(www\.)?/, "")
    .replace(/[?#].*$/, "")
    .replace(/\/+$/, "");
}

function recordSourceUrl(record: JsonRecord): string | null {
  if (typeof record.url === "string") return record.url;
  if (isRecord(record.input) && typeof record.input.url === "string") return record.input.url;
  return null;
}

function recordContent(record: JsonRecord): string | null {
  if ("warning" in record || "warning_code" in record) {
    const warning = typeof record.warning === "string" ? record.warning : "warning";
    console.warn(`⚠️ Dataset API warning: ${warning}`);
    return null;
  }
  if ("id" in record || "name" in record) {
    return JSON.stringify(record, null, 2);
  }
  return null;
}

/**
 * Map records back to the requested URLs: by their url / input.url field
 * when present, else by position.
 */
export function matchRecordsToUrls(urls: string[], records: unknown[]): Map<string, string | null> {
  const results = new Map<string, string | null>(urls.map((url) => [url, null]));
  const byNormalized = new Map(urls.map((url) => [normalizeProfileUrl(url), url]));

  records.forEach((record, index) => {
    if (!isRecord(record)) return;

    const sourceUrl = recordSourceUrl(record);
    const target = sourceUrl ? byNormalized.get(normalizeProfileUrl(sourceUrl)) : urls[index];
    if (!target) return;

    const content = recordContent(record);
    if (content !== null || results.get(target) === null) {
      results.set(target, content);
    }
  });

  return results;
}

/**
 * Batch-capable dataset-scrape API: submit, then poll the snapshot while it
 * answers 202.
 */
export class DatasetApiChannel extends ProfileChannel {
  readonly name = "dataset_api" as const;
  readonly minContentLength = 100;

  private readonly fetchImpl: typeof fetch;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: DatasetApiOptions) {
    super();
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.wait = options.wait ?? sleep;
  }

  isAvailable(): boolean {
    return this.options.apiKey !== null;
  }

  protected async fetchContent(target: ProfileTarget): Promise<string | null> {
    const results = await this.fetchBatch([target.url]);
    return results.get(target.url) ?? null;
  }

  /**
   * Never throws: a failed batch maps every URL to null.
   */
  async fetchBatch(urls: string[]): Promise<Map<string, string | null>> {
    const empty = new Map<string, string | null>(urls.map((url) => [url, null]));
    if (!this.options.apiKey || urls.length === 0) return empty;

    console.log(`📦 Dataset API batch for ${urls.length} profile(s)`);

    try {
      const records = await this.requestRecords(urls, this.options.apiKey);
      if (!records) return empty;

      const results = matchRecordsToUrls(urls, records);
      const succeeded = Array.from(results.values()).filter((v) => v !== null).length;
      console.log(`✅ Dataset API batch: ${succeeded}/${urls.length} profiles fetched`);
      return results;
    } catch (error) {
      if (error instanceof RateLimitError) {
        console.error(`🛑 Rate limited by ${error.metadata.channel}, retry after ${error.metadata.retryAfter}s`);
      } else {
        console.warn(`⚠️ Dataset API batch error: ${errorMessage(error)}`);
      }
      return empty;
    }
  }

  private async requestRecords(urls: string[], apiKey: string): Promise<unknown[] | null> {
    const headers = {
      Authorization: `Bearer ${apiKey}`,
      "Content-Type": "application/json",
    };
    const params = new URLSearchParams({
      dataset_id: this.options.datasetId,
      notify: "false",
      include_errors: "true",
    });

    const res = await this.fetchImpl(`${API_BASE}/scrape?${params.toString()}`, {
      method: "POST",
      headers,
      body: JSON.stringify({ input: urls.map((url) => ({ url })) }),
      signal: AbortSignal.timeout(this.options.requestTimeoutMs),
    });

    if (res.status === 429) {
      throw new RateLimitError("Dataset API rate limit exceeded", {
        channel: "dataset_api",
        retryAfter: parseRetryAfter(res.headers.get("retry-after"), 60),
      });
    }

    if (res.status === 200) {
      return parseRecordsBody(await res.text());
    }

    if (res.status !== 202) {
      const text = await res.text();
      console.warn(`⚠️ Dataset API failed: ${res.status} - ${text.slice(0, 200)}`);
      return null;
    }

    const accepted: unknown = await res.json();
    const snapshotId = isRecord(accepted) && typeof accepted.snapshot_id === "string" ? accepted.snapshot_id : null;
    if (!snapshotId) {
      console.warn("⚠️ Dataset API answered 202 without a snapshot id");
      return null;
    }

    console.log(`⏳ Snapshot ${snapshotId} in progress, polling...`);
    return this.pollSnapshot(snapshotId, headers);
  }

  private async pollSnapshot(snapshotId: string, headers: Record<string, string>): Promise<unknown[] | null> {
    const { maxPolls, pollIntervalMs } = this.options;

    for (let poll = 1; poll <= maxPolls; poll++) {
      await this.wait(pollIntervalMs);

      const res = await this.fetchImpl(`${API_BASE}/snapshot/${snapshotId}`, {
        headers,
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });

      if (res.status === 202) {
        if (poll % 3 === 0) {
          console.log(`   Still processing... (${poll}/${maxPolls} polls)`);
        }
        continue;
      }

      if (res.status !== 200) {
        console.warn(`⚠️ Snapshot monitor failed: ${res.status}`);
        return null;
      }

      const records = parseRecordsBody(await res.text());
      if (records) {
        console.log(`✅ Snapshot ready after ${poll} poll(s): ${records.length} records`);
        return records;
      }
    }

    console.warn(`⚠️ Snapshot ${snapshotId} not ready after ${maxPolls} polls`);
    return null;
  }
}
