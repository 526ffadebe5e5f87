// lib/scrapping/channels/apify-session.ts
import type { ApifyClient } from "apify-client";
import { RateLimitError } from "../../errors/rate-limit-error";
import { ChannelFailure } from "../../errors/sourcing-errors";
import { cleanProfileData, isValidProfile, rawActorProfileSchema } from "../profile-cleaner";
import { ProfileChannel, type ProfileTarget } from "./types";

export interface SessionScraperOptions {
  client: ApifyClient | null;
  actorId: string;
  /** The session scraper only runs when the dataset API is not configured. */
  datasetApiConfigured: boolean;
  minContentLength: number;
}

/**
 * Third-party session scraper (Apify profile actor). Returns the cleaned
 * profile as JSON text.
 */
export class SessionScraperChannel extends ProfileChannel {
  readonly name = "session_scraper" as const;
  readonly minContentLength: number;

  constructor(private readonly options: SessionScraperOptions) {
    super();
    this.minContentLength = options.minContentLength;
  }

  isAvailable(): boolean {
    return this.options.client !== null && !this.options.datasetApiConfigured;
  }

  protected async fetchContent(target: ProfileTarget): Promise<string | null> {
    const { client } = this.options;
    if (!client) return null;

    console.log(`🔍 Session scraper: ${target.url}`);
    const run = await client.actor(this.options.actorId).call({ profileUrls: [target.url] });

    const limited =
      run.statusMessage === "rate limited" ||
      (run.status === "FAILED" && run.statusMessage?.toLowerCase().includes("limit"));
    if (limited) {
      throw new RateLimitError("Profile scraping limit reached", {
        channel: "session_scraper",
        retryAfter: 3600,
        message: run.statusMessage ?? undefined,
      });
    }

    if (run.status === "FAILED") {
      throw new ChannelFailure(this.name, target.url, run.statusMessage || "actor run failed");
    }

    const { items } = await client.dataset(run.defaultDatasetId).listItems();
    const first = items[0];
    if (!first) return null;

    const parsed = rawActorProfileSchema.safeParse(first);
    if (!parsed.success) {
      throw new ChannelFailure(this.name, target.url, "unexpected actor record shape");
    }

    const cleaned = cleanProfileData(parsed.data);
    if (!isValidProfile(cleaned)) return null;

    const content = JSON.stringify(cleaned, null, 2);
    console.log(`✓ Session scraper: ${content.length} chars for ${cleaned.fullName}`);
    return content;
  }
}
