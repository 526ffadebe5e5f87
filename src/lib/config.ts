// lib/config.ts
import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors/sourcing-errors";

const flag = z
  .string()
  .optional()
  .transform((value) => value === "true" || value === "1");

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : null));

const envSchema = z.object({
  LLM_API_KEY: optionalString,
  LLM_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),

  SEARCH_API_KEY: optionalString,
  APIFY_API_TOKEN: optionalString,
  SEARCH_ACTOR_ID: z.string().default("apify/google-search-scraper"),
  PROFILE_ACTOR_ID: z.string().default("dev_fusion/linkedin-profile-scraper"),

  DATABASE_URL: z.string().default("./data/sourcing.db"),

  BRIGHTDATA_API_KEY: optionalString,
  BRIGHTDATA_DATASET_ID: z.string().default("gd_l1viktl72bvl7bjuj0"),
  PROXY_URL: optionalString,
  PROXY_FILE: optionalString,
  SKIP_HTML_FETCH: flag,

  USE_BROWSER: flag,
  BROWSER_PROFILE_DIR: z.string().default("./data/browser-profile"),
  BROWSER_HEADLESS: flag,
  BROWSER_EXECUTABLE_PATH: optionalString,

  MAX_CONCURRENT_FETCHES: z.coerce.number().int().min(1).max(10).default(2),
  REQUEST_DELAY_SECONDS: z.coerce.number().min(0).default(5),
  PROFILE_TTL_DAYS: z.coerce.number().int().min(1).default(30),
  REFRESH_EMBEDDINGS_ON_REFETCH: flag,

  PORT: z.coerce.number().int().default(8000),
  ALLOWED_ORIGINS: z.string().default("http://localhost:3000,http://localhost:5173"),
  NODE_ENV: z.string().default("development"),
});

export interface AppConfig {
  llm: { apiKey: string; model: string; embeddingModel: string };
  search: {
    serpApiKey: string | null;
    apifyToken: string | null;
    searchActorId: string;
  };
  acquisition: {
    brightDataApiKey: string | null;
    brightDataDatasetId: string;
    apifyToken: string | null;
    profileActorId: string;
    proxies: string[];
    skipHtmlFetch: boolean;
    useBrowser: boolean;
    browserProfileDir: string;
    browserHeadless: boolean;
    browserExecutablePath: string | null;
    maxConcurrent: number;
    requestDelayMs: number;
    profileTtlDays: number;
    refreshEmbeddingsOnRefetch: boolean;
  };
  databaseUrl: string;
  server: { port: number; allowedOrigins: string[]; nodeEnv: string };
}

/**
 * Build the typed configuration from an environment map.
 * Throws ConfigurationError when the LLM key is missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      String(issue?.path[0] ?? "environment"),
      `Invalid configuration: ${issue?.path.join(".")} ${issue?.message}`
    );
  }

  const e = parsed.data;

  if (!e.LLM_API_KEY) {
    throw new ConfigurationError("LLM_API_KEY", "LLM_API_KEY not set in environment");
  }

  return {
    llm: {
      apiKey: e.LLM_API_KEY,
      model: e.LLM_MODEL,
      embeddingModel: e.EMBEDDING_MODEL,
    },
    search: {
      serpApiKey: e.SEARCH_API_KEY,
      apifyToken: e.APIFY_API_TOKEN,
      searchActorId: e.SEARCH_ACTOR_ID,
    },
    acquisition: {
      brightDataApiKey: e.BRIGHTDATA_API_KEY,
      brightDataDatasetId: e.BRIGHTDATA_DATASET_ID,
      apifyToken: e.APIFY_API_TOKEN,
      profileActorId: e.PROFILE_ACTOR_ID,
      proxies: loadProxyList(e.PROXY_URL, e.PROXY_FILE),
      skipHtmlFetch: e.SKIP_HTML_FETCH,
      useBrowser: e.USE_BROWSER,
      browserProfileDir: e.BROWSER_PROFILE_DIR,
      browserHeadless: e.BROWSER_HEADLESS,
      browserExecutablePath: e.BROWSER_EXECUTABLE_PATH,
      maxConcurrent: e.MAX_CONCURRENT_FETCHES,
      requestDelayMs: e.REQUEST_DELAY_SECONDS * 1000,
      profileTtlDays: e.PROFILE_TTL_DAYS,
      refreshEmbeddingsOnRefetch: e.REFRESH_EMBEDDINGS_ON_REFETCH,
    },
    databaseUrl: e.DATABASE_URL,
    server: {
      port: e.PORT,
      allowedOrigins: e.ALLOWED_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean),
      nodeEnv: e.NODE_ENV,
    },
  };
}

export function normalizeProxy(entry: string): string {
  const trimmed = entry.trim();
  return /^(https?|socks5):\/\//.test(trimmed) ? trimmed : `http://${trimmed}`;
}

/**
 * Comma-separated PROXY_URL entries followed by PROXY_FILE lines
 * (blank lines and # comments skipped, entries without a port ignored).
 */
export function loadProxyList(proxyUrl: string | null, proxyFile: string | null): string[] {
  const proxies: string[] = [];

  if (proxyUrl) {
    proxies.push(
      ...proxyUrl
        .split(",")
        .map((p) => p.trim())
        .filter(Boolean)
        .map(normalizeProxy)
    );
  }

  if (proxyFile) {
    const filePath = path.resolve(process.cwd(), proxyFile);
    if (!fs.existsSync(filePath)) {
      console.warn(`⚠️ Proxy file not found: ${filePath}`);
      return proxies;
    }

    const lines = fs.readFileSync(filePath, "utf-8").split(/\r?\n/);
    for (const raw of lines) {
      const line = raw.trim();
      if (!line || line.startsWith("#") || !line.includes(":")) continue;
      proxies.push(normalizeProxy(line));
    }
  }

  return proxies;
}
