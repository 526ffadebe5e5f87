import { z } from "zod";

// ============================================
// Job description contract
// ============================================

export const SENIORITY_LEVELS = ["IC", "Manager", "Director", "VP", "C-level"] as const;

export const jobDescriptionSchema = z.object({
  title: z.string().describe("Job title as written in the posting"),
  seniority: z.enum(SENIORITY_LEVELS).describe("One of IC, Manager, Director, VP, C-level"),
  domain: z
    .array(z.string())
    .default([])
    .describe('1-5 domain keywords (e.g. ["behavioral health", "residential services"])'),
  mustHaveSkills: z.array(z.string()).default([]).describe("5-20 core skills or technologies"),
  niceToHaveSkills: z.array(z.string()).default([]).describe("Optional or bonus skills"),
  minYearsExperience: z.number().int().min(0).default(0).describe("Best estimate of minimum years required"),
  location: z.string().nullable().default(null).describe("Job location or null"),
});

export type ParsedJobDescription = z.infer<typeof jobDescriptionSchema>;

// ============================================
// Profile enrichment contract
// ============================================

export const roleSchema = z.object({
  title: z.string().default(""),
  company: z.string().default(""),
  location: z.string().nullable().default(null),
  startDate: z.string().nullable().default(null),
  endDate: z.string().nullable().default(null),
  isCurrent: z.boolean().default(false).describe("True if this looks like the current role"),
  years: z.number().nullable().default(null),
  description: z.string().default(""),
});

export const educationSchema = z.object({
  school: z.string().nullable().default(null),
  degree: z.string().nullable().default(null),
  field: z.string().nullable().default(null),
  startYear: z.number().int().nullable().default(null),
  endYear: z.number().int().nullable().default(null),
});

export const profileEnrichmentSchema = z.object({
  headline: z.string().nullable().default(null).describe('Headline, e.g. "Program Director at Acme Health"'),
  summary: z.string().nullable().default(null).describe("2-4 sentences about their background"),
  yearsExperience: z
    .number()
    .nullable()
    .default(null)
    .describe('Estimate from seniority: "Senior" = 5-8, "Lead" = 7-10, "Director" = 10+'),
  skills: z.array(z.string()).default([]).describe("Every skill, tool or method mentioned (aim for 10-20)"),
  domains: z.array(z.string()).default([]).describe("Industry domains such as behavioral health, residential care"),
  roles: z.array(roleSchema).default([]).describe("Role history, at least one entry"),
  education: z.array(educationSchema).default([]),
});

export type RoleEntry = z.infer<typeof roleSchema>;
export type EducationEntry = z.infer<typeof educationSchema>;
export type ProfileEnrichment = z.infer<typeof profileEnrichmentSchema>;

export const EMPTY_ENRICHMENT: ProfileEnrichment = {
  headline: null,
  summary: null,
  yearsExperience: null,
  skills: [],
  domains: [],
  roles: [],
  education: [],
};

// ============================================
// Query generation contract
// ============================================

export const searchQueriesSchema = z.object({
  queries: z
    .array(z.string().min(3))
    .default([])
    .describe("Web search queries, each containing site:linkedin.com/in/"),
});

export type SearchQueries = z.infer<typeof searchQueriesSchema>;

// ============================================
// Placement profile synthesis contract
// ============================================

export const placementProfileSchema = z.object({
  headline: z.string().nullable().default(null),
  summary: z.string().default(""),
  history: z
    .array(
      z.object({
        title: z.string().default(""),
        company: z.string().default(""),
        years: z.number().nullable().default(null),
        description: z.string().default(""),
      })
    )
    .default([])
    .describe("2-4 past roles"),
  skills: z.array(z.string()).default([]).describe("8-20 skills or keywords"),
  totalYearsExperience: z.number().nullable().default(null),
});

export type PlacementProfileDraft = z.infer<typeof placementProfileSchema>;

// ============================================
// Request bodies
// ============================================

export const createRunSchema = z.object({
  jobDescription: z.string().min(20).max(20000),
  targetProfiles: z.number().int().min(1).max(200).default(20),
  useBrowser: z.boolean().optional(),
});

export const placementRecordSchema = z.object({
  name: z.string().trim().min(1),
  company: z.string().trim().min(1),
  jobTitle: z.string().trim().min(1),
  positionId: z.string().nullable().optional(),
  placementType: z.string().nullable().optional(),
  datePosted: z.string().nullable().optional(),
  placementDate: z.string().nullable().optional(),
  startDate: z.string().nullable().optional(),
});

export type PlacementRecord = z.infer<typeof placementRecordSchema>;

export const buildPlacementProfilesSchema = z.object({
  limit: z.number().int().min(1).max(1000).default(200),
});
