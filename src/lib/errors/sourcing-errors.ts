// lib/errors/sourcing-errors.ts

/**
 * A required credential or setting is missing. Raised before any work starts.
 */
export class ConfigurationError extends Error {
  public readonly key: string;

  constructor(key: string, message?: string) {
    super(message ?? `${key} is not configured`);
    this.name = "ConfigurationError";
    this.key = key;
  }
}

/**
 * One acquisition channel could not produce content for a URL.
 * Caught by the channel itself; the chain moves on to the next channel.
 */
export class ChannelFailure extends Error {
  public readonly channel: string;
  public readonly url: string;

  constructor(channel: string, url: string, message: string) {
    super(message);
    this.name = "ChannelFailure";
    this.channel = channel;
    this.url = url;
  }
}

/**
 * The structured-extraction service failed or returned a shape that does not
 * match the prompt contract.
 */
export class ExtractionFailure extends Error {
  public readonly contract: string;

  constructor(contract: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionFailure";
    this.contract = contract;
  }
}

export class SearchServiceFailure extends Error {
  public readonly provider: string;
  public readonly query: string;
  /** Seconds the provider asked us to wait, when it rate limited the call. */
  public readonly retryAfter: number | null;

  constructor(
    provider: string,
    query: string,
    message: string,
    options?: { cause?: unknown; retryAfter?: number }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "SearchServiceFailure";
    this.provider = provider;
    this.query = query;
    this.retryAfter = options?.retryAfter ?? null;
  }
}

/**
 * Every channel and retry was exhausted for one URL. Logged and skipped,
 * never raised to the batch.
 */
export class AcquisitionExhaustedError extends Error {
  public readonly url: string;
  public readonly attempted: string[];

  constructor(url: string, attempted: string[]) {
    super(`All acquisition channels exhausted for ${url} (tried: ${attempted.join(", ") || "none"})`);
    this.name = "AcquisitionExhaustedError";
    this.url = url;
    this.attempted = attempted;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
