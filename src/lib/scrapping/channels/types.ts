// lib/scrapping/channels/types.ts
import { ChannelFailure, errorMessage } from "../../errors/sourcing-errors";

export type ChannelName = "dataset_api" | "session_scraper" | "browser_search" | "direct_http";

export interface ProfileTarget {
  url: string;
  /** Name and title parsed from the search result, used by the browser pivot. */
  name?: string;
  title?: string;
}

/**
 * One acquisition strategy. Transient errors are swallowed here and turned
 * into "no content"; the chain then moves on.
 */
export abstract class ProfileChannel {
  abstract readonly name: ChannelName;
  /** Content must be longer than this to count as a hit. */
  abstract readonly minContentLength: number;

  /** False when a credential or switch the channel needs is absent. */
  abstract isAvailable(): boolean;

  protected abstract fetchContent(target: ProfileTarget): Promise<string | null>;

  async fetch(target: ProfileTarget): Promise<string | null> {
    try {
      return await this.fetchContent(target);
    } catch (error) {
      const failure =
        error instanceof ChannelFailure ? error : new ChannelFailure(this.name, target.url, errorMessage(error));
      console.warn(`⚠️ [${this.name}] ${target.url}: ${failure.message}`);
      return null;
    }
  }

  accepts(content: string | null): boolean {
    return content !== null && content.length > this.minContentLength;
  }
}

export function profileUsername(url: string): string | null {
  if (!url.includes("/in/")) return null;
  const username = url.split("/in/")[1]?.split("/")[0]?.split("?")[0];
  return username ? username.toLowerCase() : null;
}
