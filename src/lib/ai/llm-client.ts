// lib/ai/llm-client.ts
import type { OpenAIChatLanguageModelOptions, OpenAIProvider } from "@ai-sdk/openai";
import { generateObject } from "ai";
import { ExtractionFailure, errorMessage } from "../errors/sourcing-errors";
import {
  jobDescriptionSchema,
  placementProfileSchema,
  profileEnrichmentSchema,
  searchQueriesSchema,
  type ParsedJobDescription,
  type PlacementProfileDraft,
  type ProfileEnrichment,
} from "../validations/extraction";

export interface QueryContext {
  title: string;
  seniority: string;
  domain: string[];
  mustHaveSkills?: string[];
  location?: string | null;
}

export interface PlacementPromptInput {
  name: string;
  jobTitle: string;
  company: string;
}

/**
 * Structured-extraction contracts. Every method either returns a record that
 * matches its schema (with defaults filled) or throws ExtractionFailure.
 */
export interface ExtractionService {
  parseJobDescription(rawText: string): Promise<ParsedJobDescription>;
  enrichProfile(profileText: string): Promise<ProfileEnrichment>;
  proposeQueries(jd: QueryContext): Promise<string[]>;
  refineQueries(jd: QueryContext, coverageSummary: string): Promise<string[]>;
  synthesizePlacementProfile(input: PlacementPromptInput): Promise<PlacementProfileDraft>;
}

const providerOptions = {
  openai: {
    strictJsonSchema: false,
  } satisfies OpenAIChatLanguageModelOptions,
};

const JD_SYSTEM_PROMPT = `You are extracting structured information from a job description.

Extract:
- title
- seniority, one of "IC", "Manager", "Director", "VP", "C-level"
- domain: 1-5 domain keywords (e.g. "behavioral health", "residential services")
- mustHaveSkills: 5-20 core skills or technologies
- niceToHaveSkills: optional or bonus skills
- minYearsExperience: integer, best estimate from the text
- location: string or null`;

const ENRICH_SYSTEM_PROMPT = `You are analyzing a LinkedIn profile. The text is usually a search result title and snippet, sometimes followed by page content or structured profile data.

Extract everything available and make reasonable inferences:
- Parse title formats like "Name - Title at Company | LinkedIn"
- Skills: every technology, tool, certification or method mentioned (aim for 10-20)
- Years of experience: use "X years" / "X+ years" when stated, otherwise infer from seniority ("Senior" = 5-8, "Lead" = 7-10, "Principal" or "Director" = 10+)
- Domains from industry keywords: healthcare, behavioral health, residential care, HIPAA, EHR, etc.
- Create at least one role entry from the title or description and flag the current one
- Education entries when present`;

const QUERY_SYSTEM_PROMPT = `You are a sourcing agent for recruiters.

Write web search queries that find public professional profiles of strong candidates.
- Vary queries by title synonyms and domain keywords
- Use natural language terms, not field:value syntax
- Use AND/OR with quotes for exact phrases, e.g. "Program Director" AND ("behavioral health" OR residential) site:linkedin.com/in/
- ALWAYS include site:linkedin.com/in/`;

const PLACEMENT_SYSTEM_PROMPT = `You generate realistic LinkedIn-style profiles for people who were placed in a role.
Invent a plausible professional profile consistent with the given title and company:
- headline: one line
- summary: 3-6 sentences on background and responsibilities
- history: 2-4 past roles with title, company, years and description
- skills: 8-20 skills or keywords
- totalYearsExperience: approximate years of experience`;

export class OpenAIExtractionService implements ExtractionService {
  constructor(
    private readonly provider: OpenAIProvider,
    private readonly modelName: string
  ) {}

  async parseJobDescription(rawText: string): Promise<ParsedJobDescription> {
    try {
      const { object } = await generateObject({
        model: this.provider(this.modelName),
        temperature: 0.1,
        schema: jobDescriptionSchema,
        providerOptions,
        system: JD_SYSTEM_PROMPT,
        prompt: `Job Description:\n---\n${rawText}\n---`,
      });
      return object;
    } catch (error) {
      throw new ExtractionFailure("job_description", `JD parsing failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async enrichProfile(profileText: string): Promise<ProfileEnrichment> {
    try {
      const { object } = await generateObject({
        model: this.provider(this.modelName),
        temperature: 0.1,
        schema: profileEnrichmentSchema,
        providerOptions,
        system: ENRICH_SYSTEM_PROMPT,
        prompt: `Profile text:\n---\n${profileText}\n---`,
      });
      return object;
    } catch (error) {
      throw new ExtractionFailure("profile_enrichment", `Profile enrichment failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async proposeQueries(jd: QueryContext): Promise<string[]> {
    return this.generateQueries(
      "initial_queries",
      `Structured job description:\n${JSON.stringify(jd)}\n\nPropose 2-3 search queries.`
    );
  }

  async refineQueries(jd: QueryContext, coverageSummary: string): Promise<string[]> {
    const context = JSON.stringify({ title: jd.title, seniority: jd.seniority, domain: jd.domain });
    return this.generateQueries(
      "refine_queries",
      `Job description:\n${context}\n\nCurrent coverage summary:\n${coverageSummary}\n\n` +
        "We need better coverage of the missing domains or seniority segments. Propose 1-2 new targeted queries."
    );
  }

  async synthesizePlacementProfile(input: PlacementPromptInput): Promise<PlacementProfileDraft> {
    try {
      const { object } = await generateObject({
        model: this.provider(this.modelName),
        temperature: 0.1,
        schema: placementProfileSchema,
        providerOptions,
        system: PLACEMENT_SYSTEM_PROMPT,
        prompt: `Name: ${input.name}\nJob Title: ${input.jobTitle}\nCompany: ${input.company}`,
      });
      return object;
    } catch (error) {
      throw new ExtractionFailure("placement_profile", `Placement profile failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private async generateQueries(contract: string, prompt: string): Promise<string[]> {
    try {
      const { object } = await generateObject({
        model: this.provider(this.modelName),
        temperature: 0.1,
        schema: searchQueriesSchema,
        providerOptions,
        system: QUERY_SYSTEM_PROMPT,
        prompt,
      });
      return object.queries.map((q) => q.trim()).filter((q) => q.length > 0);
    } catch (error) {
      throw new ExtractionFailure(contract, `Query generation failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
