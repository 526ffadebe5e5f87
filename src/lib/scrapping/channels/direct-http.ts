// lib/scrapping/channels/direct-http.ts
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { RateLimitError, parseRetryAfter } from "../../errors/rate-limit-error";
import { errorMessage } from "../../errors/sourcing-errors";
import { randomBetween, sleep } from "../../utils/concurrency";
import type { RateLimiter } from "../../utils/rate-limiter";
import { ProfileChannel, type ProfileTarget } from "./types";

const USER_AGENTS = [
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0",
];

/** Status the target site answers with when it blocks automated traffic. */
export const BLOCKED_STATUS = 999;

export interface HttpResponseLike {
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
}

export interface HttpGetRequest {
  headers: Record<string, string>;
  proxy: string | null;
  timeoutMs: number;
  connectTimeoutMs: number;
}

export type HttpGet = (url: string, request: HttpGetRequest) => Promise<HttpResponseLike>;

/**
 * undici fetch, through a ProxyAgent when a proxy is given.
 */
export const undiciGet: HttpGet = async (url, request) => {
  const dispatcher = request.proxy
    ? new ProxyAgent({ uri: request.proxy, connect: { timeout: request.connectTimeoutMs } })
    : undefined;

  try {
    const res = await undiciFetch(url, {
      headers: request.headers,
      redirect: "follow",
      signal: AbortSignal.timeout(request.timeoutMs),
      dispatcher,
    });
    const body = await res.text();
    return { status: res.status, headers: res.headers, text: async () => body };
  } finally {
    await dispatcher?.close();
  }
};

export function shuffle<T>(items: T[]): T[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i--) {
    const j = Math.floor(Math.random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

export function browserHeaders(userAgent: string): Record<string, string> {
  return {
    "User-Agent": userAgent,
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.9",
    "Accept-Encoding": "gzip, deflate, br",
    Connection: "keep-alive",
    "Upgrade-Insecure-Requests": "1",
    "Sec-Fetch-Dest": "document",
    "Sec-Fetch-Mode": "navigate",
    "Sec-Fetch-Site": "none",
    "Cache-Control": "max-age=0",
  };
}

export interface DirectHttpOptions {
  proxies: string[];
  rateLimiter: RateLimiter;
  /** Retry-After fallback is twice this. */
  requestDelayMs: number;
  maxProxies?: number;
  timeoutMs?: number;
  connectTimeoutMs?: number;
  proxyPause?: [minMs: number, maxMs: number];
  httpGet?: HttpGet;
  order?: (proxies: string[]) => string[];
  wait?: (ms: number) => Promise<void>;
}

function proxyLabel(proxy: string | null): string {
  if (!proxy) return "direct";
  return proxy.includes("@") ? proxy.split("@").pop() ?? proxy : proxy.slice(0, 50);
}

/**
 * Plain GET with desktop-browser headers, rotating through the configured
 * proxies and finishing with a direct connection.
 */
export class DirectHttpChannel extends ProfileChannel {
  readonly name = "direct_http" as const;
  readonly minContentLength = 0;

  private readonly httpGet: HttpGet;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: DirectHttpOptions) {
    super();
    this.httpGet = options.httpGet ?? undiciGet;
    this.wait = options.wait ?? sleep;
  }

  isAvailable(): boolean {
    return true;
  }

  /** Shuffled proxies (capped) followed by null for the direct connection. */
  attemptPlan(): Array<string | null> {
    const order = this.options.order ?? shuffle;
    return [...order(this.options.proxies).slice(0, this.options.maxProxies ?? 20), null];
  }

  protected async fetchContent(target: ProfileTarget): Promise<string | null> {
    const waited = await this.options.rateLimiter.acquire();
    if (waited > 0) {
      console.log(`⏳ Rate limiting: waited ${(waited / 1000).toFixed(1)}s before ${target.url}`);
    }

    const headers = browserHeaders(USER_AGENTS[Math.floor(Math.random() * USER_AGENTS.length)]);
    const [pauseMin, pauseMax] = this.options.proxyPause ?? [2_000, 4_000];
    const plan = this.attemptPlan();

    for (const [index, proxy] of plan.entries()) {
      if (index > 0) {
        await this.wait(randomBetween(pauseMin, pauseMax));
      }

      try {
        const res = await this.httpGet(target.url, {
          headers,
          proxy,
          timeoutMs: this.options.timeoutMs ?? 15_000,
          connectTimeoutMs: this.options.connectTimeoutMs ?? 10_000,
        });

        if (res.status === 200) {
          const html = await res.text();
          console.log(`✅ HTTP success via ${proxyLabel(proxy)}: ${html.length} chars`);
          return html;
        }

        if (res.status === 429) {
          throw new RateLimitError("Target rate limited the request", {
            channel: "direct_http",
            retryAfter: parseRetryAfter(res.headers.get("retry-after"), (this.options.requestDelayMs * 2) / 1000),
            proxy,
          });
        }

        if (res.status === BLOCKED_STATUS) {
          console.warn(`⚠️ Blocked (${BLOCKED_STATUS}) via ${proxyLabel(proxy)}`);
        } else {
          console.warn(`⚠️ HTTP ${res.status} via ${proxyLabel(proxy)}`);
        }
      } catch (error) {
        if (error instanceof RateLimitError) {
          console.warn(`⚠️ Rate limited (429) via ${proxyLabel(proxy)}, waiting ${error.metadata.retryAfter}s`);
          await this.wait(error.metadata.retryAfter * 1000);
        } else {
          console.warn(`⚠️ HTTP error via ${proxyLabel(proxy)}: ${errorMessage(error)}`);
        }
      }
    }

    console.error(`❌ Direct HTTP exhausted for ${target.url} (${plan.length} attempt(s))`);
    return null;
  }
}
