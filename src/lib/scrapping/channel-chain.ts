// lib/scrapping/channel-chain.ts
import { ApifyClient } from "apify-client";
import type { AppConfig } from "../config";
import type { CircuitBreaker } from "../utils/circuit-breaker";
import type { RateLimiter } from "../utils/rate-limiter";
import type { BrowserSession } from "./browser/session";
import { SessionScraperChannel } from "./channels/apify-session";
import { BrowserSearchChannel } from "./channels/browser-search";
import { DatasetApiChannel } from "./channels/dataset-api";
import { DirectHttpChannel } from "./channels/direct-http";
import type { ChannelName, ProfileChannel, ProfileTarget } from "./channels/types";

export interface AcquisitionResult {
  content: string | null;
  channel: ChannelName | null;
  attempted: ChannelName[];
}

/**
 * Ordered fallback over the acquisition channels. The first channel whose
 * content clears its own size threshold wins.
 */
export class ChannelChain {
  constructor(
    readonly channels: ProfileChannel[],
    private readonly skipFetch: boolean = false
  ) {}

  get skipsFetch(): boolean {
    return this.skipFetch;
  }

  /** The batch-capable channel, when configured. */
  batchChannel(): DatasetApiChannel | null {
    const channel = this.channels.find((c): c is DatasetApiChannel => c instanceof DatasetApiChannel);
    return channel && channel.isAvailable() ? channel : null;
  }

  async acquire(target: ProfileTarget, exclude: ReadonlySet<ChannelName> = new Set()): Promise<AcquisitionResult> {
    const attempted: ChannelName[] = [];

    if (this.skipFetch) {
      console.log(`⏭️ Skipping HTML fetch for ${target.url}`);
      return { content: null, channel: null, attempted };
    }

    for (const channel of this.channels) {
      if (exclude.has(channel.name) || !channel.isAvailable()) continue;

      attempted.push(channel.name);
      const content = await channel.fetch(target);

      if (channel.accepts(content)) {
        return { content, channel: channel.name, attempted };
      }
      if (content !== null) {
        console.log(`   [${channel.name}] ${content.length} chars is below its ${channel.minContentLength} threshold`);
      }
    }

    return { content: null, channel: null, attempted };
  }
}

export interface ChannelChainDeps {
  session: BrowserSession;
  rateLimiter: RateLimiter;
  breaker: CircuitBreaker;
}

/**
 * Dataset API → session scraper → browser pivot → direct HTTP.
 */
export function buildChannelChain(
  config: AppConfig["acquisition"],
  deps: ChannelChainDeps,
  overrides: { useBrowser?: boolean } = {}
): ChannelChain {
  return new ChannelChain(
    [
      new DatasetApiChannel({
        apiKey: config.brightDataApiKey,
        datasetId: config.brightDataDatasetId,
        pollIntervalMs: 5_000,
        maxPolls: 20,
        requestTimeoutMs: 300_000,
      }),
      new SessionScraperChannel({
        client: config.apifyToken ? new ApifyClient({ token: config.apifyToken }) : null,
        actorId: config.profileActorId,
        datasetApiConfigured: config.brightDataApiKey !== null,
        minContentLength: 500,
      }),
      new BrowserSearchChannel({
        enabled: overrides.useBrowser ?? config.useBrowser,
        session: deps.session,
        breaker: deps.breaker,
      }),
      new DirectHttpChannel({
        proxies: config.proxies,
        rateLimiter: deps.rateLimiter,
        requestDelayMs: config.requestDelayMs,
      }),
    ],
    config.skipHtmlFetch
  );
}
