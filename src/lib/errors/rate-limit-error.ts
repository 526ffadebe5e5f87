// lib/errors/rate-limit-error.ts

export interface RateLimitMetadata {
  channel: "direct_http" | "dataset_api" | "session_scraper";
  retryAfter: number; // seconds
  proxy?: string | null;
  message?: string;
}

export class RateLimitError extends Error {
  public metadata: RateLimitMetadata;

  constructor(message: string, metadata: RateLimitMetadata) {
    super(message);
    this.name = "RateLimitError";
    this.metadata = metadata;
  }
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP date) into seconds.
 */
export function parseRetryAfter(
  header: string | null,
  fallbackSeconds: number,
  now: number = Date.now()
): number {
  if (!header) return fallbackSeconds;

  const seconds = Number(header.trim());
  if (Number.isFinite(seconds) && seconds >= 0) return seconds;

  const date = Date.parse(header);
  if (!Number.isNaN(date)) {
    return Math.max(0, Math.ceil((date - now) / 1000));
  }

  return fallbackSeconds;
}
