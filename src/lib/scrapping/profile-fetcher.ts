// lib/scrapping/profile-fetcher.ts
import type { Embedder } from "../ai/embedder";
import type { ExtractionService } from "../ai/llm-client";
import {
  buildCandidateFields,
  buildProfileCorpus,
  enrichProfileText,
  parseProfileTitle,
  type SearchMetadata,
} from "../ai/profile-enricher";
import type { Candidate } from "../db/schema";
import type { SourcingStore } from "../db/store";
import { AcquisitionExhaustedError, errorMessage } from "../errors/sourcing-errors";
import { Semaphore, chunk, randomBetween, sleep } from "../utils/concurrency";
import type { ChannelChain } from "./channel-chain";
import type { ChannelName } from "./channels/types";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FetcherOptions {
  maxConcurrent: number;
  ttlDays: number;
  batchChunkSize: number;
  /** Random delay before each fetch unit starts. */
  jitter: [minMs: number, maxMs: number];
  refreshEmbeddingsOnRefetch: boolean;
}

export const DEFAULT_FETCHER_OPTIONS: FetcherOptions = {
  maxConcurrent: 2,
  ttlDays: 30,
  batchChunkSize: 10,
  jitter: [500, 1_500],
  refreshEmbeddingsOnRefetch: false,
};

export interface FetcherDeps {
  store: SourcingStore;
  llm: ExtractionService;
  embedder: Embedder;
  chain: ChannelChain;
  options?: Partial<FetcherOptions>;
  /** Shared fetch slots. Fetchers built for different runs must pass the same one. */
  semaphore?: Semaphore;
  now?: () => Date;
  wait?: (ms: number) => Promise<void>;
}

export interface FetchedCandidate {
  candidate: Candidate;
  fromCache: boolean;
  channel: ChannelName | null;
}

export function isFresh(candidate: Candidate, now: Date, ttlDays: number): boolean {
  return now.getTime() - candidate.lastFetchedAt.getTime() < ttlDays * DAY_MS;
}

/**
 * Owns the channel chain, the concurrency limit and the TTL cache lookup.
 * Per-URL failures are logged and skipped; a batch never fails as a whole.
 */
export class ProfileFetcher {
  readonly options: FetcherOptions;
  readonly semaphore: Semaphore;
  private readonly now: () => Date;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly deps: FetcherDeps) {
    this.options = { ...DEFAULT_FETCHER_OPTIONS, ...deps.options };
    this.semaphore = deps.semaphore ?? new Semaphore(this.options.maxConcurrent);
    this.now = deps.now ?? (() => new Date());
    this.wait = deps.wait ?? sleep;
  }

  /**
   * Results follow the caller's order. URLs that could not be acquired are
   * left out.
   */
  async fetchBatch(requests: SearchMetadata[]): Promise<FetchedCandidate[]> {
    const unique = new Map<string, SearchMetadata>();
    for (const request of requests) {
      if (!unique.has(request.url)) unique.set(request.url, request);
    }
    const urls = Array.from(unique.keys());
    if (urls.length === 0) return [];

    const now = this.now();
    const existing = new Map((await this.deps.store.findCandidatesByUrls(urls)).map((c) => [c.profileUrl, c]));

    const hits = new Map<string, Candidate>();
    const misses: string[] = [];
    for (const url of urls) {
      const candidate = existing.get(url);
      if (candidate && isFresh(candidate, now, this.options.ttlDays)) {
        hits.set(url, candidate);
      } else {
        misses.push(url);
      }
    }

    console.log(`📊 Fetch batch: ${urls.length} URLs, ${hits.size} cached, ${misses.length} to fetch`);

    const prefetched = await this.prefetchBatch(misses);

    const fetched = new Map<string, FetchedCandidate | null>();
    await Promise.all(
      misses.map(async (url) => {
        const meta = unique.get(url);
        if (!meta) return;
        const result = await this.semaphore.run(async () => {
          await this.wait(randomBetween(...this.options.jitter));
          return this.processUrl(meta, prefetched, existing.get(url) ?? null);
        });
        fetched.set(url, result);
      })
    );

    const results: FetchedCandidate[] = [];
    for (const url of urls) {
      const hit = hits.get(url);
      if (hit) {
        results.push({ candidate: hit, fromCache: true, channel: null });
        continue;
      }
      const result = fetched.get(url);
      if (result) results.push(result);
    }

    console.log(`✅ Fetch batch complete: ${results.length}/${urls.length} candidates`);
    return results;
  }

  /**
   * Dataset API for every miss, in fixed-size chunks. URLs listed here have
   * already had their dataset attempt.
   */
  private async prefetchBatch(misses: string[]): Promise<Map<string, string | null>> {
    const results = new Map<string, string | null>();
    const batchChannel = this.deps.chain.skipsFetch ? null : this.deps.chain.batchChannel();
    if (!batchChannel || misses.length === 0) return results;

    for (const group of chunk(misses, this.options.batchChunkSize)) {
      const groupResults = await batchChannel.fetchBatch(group);
      for (const url of group) {
        const content = groupResults.get(url) ?? null;
        results.set(url, batchChannel.accepts(content) ? content : null);
      }
    }
    return results;
  }

  private async processUrl(
    meta: SearchMetadata,
    prefetched: Map<string, string | null>,
    existing: Candidate | null
  ): Promise<FetchedCandidate | null> {
    try {
      let content = prefetched.get(meta.url) ?? null;
      let channel: ChannelName | null = content ? "dataset_api" : null;

      if (!content) {
        const parts = parseProfileTitle(meta.title);
        const exclude = new Set<ChannelName>(prefetched.has(meta.url) ? ["dataset_api"] : []);
        const acquired = await this.deps.chain.acquire(
          { url: meta.url, name: parts.name === "Unknown" ? undefined : parts.name, title: parts.currentTitle || undefined },
          exclude
        );

        if (!acquired.content && !this.deps.chain.skipsFetch) {
          const attempted = prefetched.has(meta.url) ? ["dataset_api", ...acquired.attempted] : acquired.attempted;
          console.warn(`⚠️ ${new AcquisitionExhaustedError(meta.url, attempted).message}, skipping`);
          return null;
        }
        content = acquired.content;
        channel = acquired.channel;
      }

      const candidate = await this.saveCandidate(meta, content, existing);
      return { candidate, fromCache: false, channel };
    } catch (error) {
      console.error(`❌ Failed to process ${meta.url}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async saveCandidate(meta: SearchMetadata, content: string | null, existing: Candidate | null): Promise<Candidate> {
    const { store, llm, embedder } = this.deps;

    const corpus = buildProfileCorpus(content, meta.title, meta.snippet);
    const enrichment = await enrichProfileText(llm, corpus);
    const fields = buildCandidateFields(meta, content, enrichment, existing, this.now());

    const candidate = existing
      ? await store.updateCandidate(existing.id, fields)
      : await store.insertCandidate(fields);

    const needsEmbedding =
      !existing ||
      this.options.refreshEmbeddingsOnRefetch ||
      (await store.getCandidateEmbedding(candidate.id)) === null;

    if (needsEmbedding) {
      try {
        const embedding = await embedder.embedText(candidate.rawText);
        await store.saveCandidateEmbedding(candidate.id, embedding, embedder.modelName);
      } catch (error) {
        console.error(`❌ Embedding failed for ${candidate.profileUrl}: ${errorMessage(error)}`);
      }
    }

    console.log(`✓ ${existing ? "Refreshed" : "Created"} candidate ${candidate.id}: ${candidate.name}`);
    return candidate;
  }
}
