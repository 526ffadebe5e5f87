// lib/ai/profile-enricher.ts
import { load } from "cheerio";
import type { Candidate, NewCandidate } from "../db/schema";
import { errorMessage } from "../errors/sourcing-errors";
import { EMPTY_ENRICHMENT, type ProfileEnrichment } from "../validations/extraction";
import type { ExtractionService } from "./llm-client";

export const MAX_CORPUS_CHARS = 15_000;
const RAW_CONTENT_CHARS = 5_000;
const MIN_HTML_FOR_PARSING = 1_000;

const PROFILE_KEYWORDS = [
  "experience",
  "education",
  "skills",
  "work",
  "company",
  "university",
  "degree",
  "engineer",
  "developer",
  "manager",
];

export interface SearchMetadata {
  url: string;
  title: string;
  snippet: string;
}

export interface TitleParts {
  name: string;
  currentTitle: string;
  currentCompany: string;
}

/**
 * "Jane Doe - Program Director - Acme Health | LinkedIn" → name, title, company.
 * The page <title> wins over the search title when it mentions LinkedIn.
 */
export function parseProfileTitle(searchTitle: string, html: string | null = null): TitleParts {
  let titleText = searchTitle;

  if (html && looksLikeHtml(html)) {
    const pageTitle = load(html)("title").first().text().trim();
    if (pageTitle.toLowerCase().includes("linkedin")) {
      titleText = pageTitle;
    }
  }

  const parts = titleText
    .split(/[-|–]/)
    .map((p) => p.trim())
    .filter(Boolean);

  return {
    name: parts[0] ?? "Unknown",
    currentTitle: parts[1] ?? "",
    currentCompany: parts[2] ?? "",
  };
}

function looksLikeHtml(content: string): boolean {
  return /<[a-z!][\s\S]*>/i.test(content.slice(0, 2000));
}

function looksLikeJson(content: string): boolean {
  const trimmed = content.trimStart();
  return trimmed.startsWith("{") || trimmed.startsWith("[");
}

/**
 * Text handed to the extraction service: title and snippet, then
 * structured-data blocks, then keyword-bearing content blocks, else the
 * page's plain text lines. Capped at MAX_CORPUS_CHARS.
 */
export function buildProfileCorpus(content: string | null, title: string, snippet: string): string {
  const parts: string[] = [];

  const header = `${title}\n\n${snippet}`.trim();
  if (header) parts.push(header);

  if (content && looksLikeJson(content)) {
    parts.push(content);
  } else if (content && content.length > MIN_HTML_FOR_PARSING) {
    parts.push(...extractHtmlBlocks(content));
  }

  return parts
    .filter((p) => p.trim().length > 0)
    .join("\n\n")
    .slice(0, MAX_CORPUS_CHARS);
}

function extractHtmlBlocks(html: string): string[] {
  const $ = load(html);
  const blocks: string[] = [];

  $('script[type="application/ld+json"]').each((_, node) => {
    const raw = $(node).text();
    try {
      const data: unknown = JSON.parse(raw);
      if (data && typeof data === "object" && !Array.isArray(data)) {
        blocks.push(JSON.stringify(data, null, 2));
      }
    } catch {
      // not JSON, ignore the block
    }
  });

  $("script").each((_, node) => {
    const text = $(node).text();
    const lower = text.toLowerCase();
    if (
      text.length > 0 &&
      text.length < 5000 &&
      (lower.includes("experience") || lower.includes("education") || lower.includes("skills"))
    ) {
      blocks.push(text.slice(0, 2000));
    }
  });

  $("body")
    .find("div, section, article, main")
    .each((_, node) => {
      const text = $(node).text().replace(/\s+/g, " ").trim();
      const lower = text.toLowerCase();
      if (text.length > 50 && PROFILE_KEYWORDS.some((keyword) => lower.includes(keyword))) {
        blocks.push(text.slice(0, 1000));
      }
    });

  if (blocks.length === 0) {
    $("script, style, noscript").remove();
    const lines = $.root()
      .text()
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 10)
      .slice(0, 200);
    blocks.push(lines.join("\n"));
  }

  return blocks;
}

/**
 * Persisted raw text: search title and snippet plus the first 5,000
 * characters of fetched content.
 */
export function buildRawText(title: string, snippet: string, content: string | null): string {
  if (content) {
    return `${title}\n\n${snippet}\n\n${content.slice(0, RAW_CONTENT_CHARS)}`;
  }
  return `${title}\n\n${snippet}`;
}

/**
 * Run the enrichment contract. Returns null on ExtractionFailure so the
 * caller falls back to title-derived fields.
 */
export async function enrichProfileText(
  llm: ExtractionService,
  corpus: string
): Promise<ProfileEnrichment | null> {
  try {
    return await llm.enrichProfile(corpus.slice(0, MAX_CORPUS_CHARS));
  } catch (error) {
    console.warn(`⚠️ Enrichment failed, using title heuristics: ${errorMessage(error)}`);
    return null;
  }
}

type CandidateFields = Omit<NewCandidate, "id">;

/**
 * Merge search metadata, fetched content and enrichment into candidate
 * columns. On refresh, empty new values keep what the existing row had.
 */
export function buildCandidateFields(
  meta: SearchMetadata,
  content: string | null,
  enrichment: ProfileEnrichment | null,
  existing: Candidate | null,
  fetchedAt: Date
): CandidateFields {
  const parts = parseProfileTitle(meta.title, content);
  const data = enrichment ?? EMPTY_ENRICHMENT;

  let currentTitle = parts.currentTitle;
  let currentCompany = parts.currentCompany;

  if (!currentTitle && data.roles.length > 0) {
    const currentRole = data.roles.find((role) => role.isCurrent) ?? data.roles[0];
    currentTitle = currentRole.title;
    currentCompany = currentCompany || currentRole.company;
  }

  const pick = <T>(values: T[], previous: T[] | undefined): T[] =>
    values.length > 0 ? values : previous ?? [];

  return {
    profileUrl: meta.url,
    name: existing?.name && parts.name === "Unknown" ? existing.name : parts.name,
    headline: data.headline || existing?.headline || meta.title || null,
    currentTitle: currentTitle || existing?.currentTitle || null,
    currentCompany: currentCompany || existing?.currentCompany || null,
    location: existing?.location ?? null,
    yearsExperience: data.yearsExperience ?? existing?.yearsExperience ?? null,
    skills: pick(data.skills, existing?.skills),
    domains: pick(data.domains, existing?.domains),
    experience: pick(data.roles, existing?.experience),
    education: pick(data.education, existing?.education),
    rawText: buildRawText(meta.title, meta.snippet, content),
    source: existing?.source ?? "linkedin",
    lastFetchedAt: fetchedAt,
  };
}
