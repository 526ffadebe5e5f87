/**
 * Profile cleaner for session-scraper records - keeps what enrichment needs,
 * drops contact details and noise. Output is serialized and fed into the
 * extraction corpus, so smaller is better.
 */
import { z } from "zod";

const str = z.string().nullish();

const experienceSchema = z.object({
  title: str,
  jobTitle: str,
  position: str,
  companyName: str,
  company: str,
  currentJobDuration: str,
  duration: str,
  jobStartedOn: str,
  startDate: str,
  jobEndedOn: str,
  endDate: str,
  jobLocation: str,
  jobDescription: str,
  description: str,
});

const skillSchema = z.union([z.string(), z.object({ title: str, name: str })]);

const educationSchema = z.object({
  title: str,
  degree: str,
  subtitle: str,
  schoolName: str,
  school: str,
  companyName: str,
  period: z
    .object({ endedOn: z.object({ year: z.number().nullish() }).nullish() })
    .nullish(),
});

const certificationSchema = z.object({
  title: str,
  name: str,
  companyName: str,
  issuedBy: str,
});

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

// Malformed entries are dropped instead of failing the whole record
const list = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(item.nullable().catch(null))
    .nullish()
    .transform((values) => (values ?? []).filter(isPresent));

export const rawActorProfileSchema = z.object({
  fullName: str,
  firstName: str,
  lastName: str,
  headline: str,
  addressWithCountry: str,
  addressWithoutCountry: str,
  location: str,
  linkedinUrl: str,
  linkedinPublicUrl: str,
  profileUrl: str,
  jobTitle: str,
  companyName: str,
  totalExperienceYears: z.number().nullish(),
  about: str,
  experiences: list(experienceSchema),
  experience: list(experienceSchema),
  skills: list(skillSchema),
  educations: list(educationSchema),
  education: list(educationSchema),
  licenseAndCertificates: list(certificationSchema),
  certifications: list(certificationSchema),
});

export type RawActorProfile = z.infer<typeof rawActorProfileSchema>;

export interface CleanedExperience {
  title: string;
  company: string;
  duration: string;
  location?: string;
  description?: string;
}

export interface CleanedProfile {
  fullName: string;
  headline: string | null;
  location: string | null;
  profileUrl: string | null;
  currentPosition: string | null;
  currentCompany: string | null;
  experienceYears: number;
  about: string | null;
  skills: string[];
  experience: CleanedExperience[];
  education: Array<{ degree: string | null; school: string | null; year?: number }>;
  certifications: Array<{ name: string; issuer: string | null }>;
}

export function cleanProfileData(rawProfile: RawActorProfile): CleanedProfile {
  // Last 10 jobs with a title
  const experiences: CleanedExperience[] = (
    rawProfile.experiences.length > 0 ? rawProfile.experiences : rawProfile.experience
  )
    .filter((exp) => exp.title || exp.jobTitle)
    .slice(0, 10)
    .map((exp) => {
      const description = exp.jobDescription || exp.description;
      return {
        title: exp.title || exp.jobTitle || exp.position || "",
        company: (exp.companyName || exp.company || "").substring(0, 100),
        duration:
          exp.currentJobDuration ||
          exp.duration ||
          `${exp.jobStartedOn || exp.startDate || ""} - ${exp.jobEndedOn || exp.endDate || "Present"}`,
        ...(exp.jobLocation ? { location: exp.jobLocation } : {}),
        ...(description ? { description: description.substring(0, 400) } : {}),
      };
    });

  // Top 50 skills as plain strings
  const skills = rawProfile.skills
    .map((s) => (typeof s === "string" ? s : s.title || s.name || ""))
    .filter((s) => s.length > 0)
    .slice(0, 50);

  const education = (rawProfile.educations.length > 0 ? rawProfile.educations : rawProfile.education)
    .filter((edu) => edu.title || edu.degree || edu.schoolName)
    .slice(0, 3)
    .map((edu) => ({
      degree: edu.title || edu.degree || edu.subtitle || null,
      school: edu.schoolName || edu.school || edu.companyName || null,
      ...(edu.period?.endedOn?.year ? { year: edu.period.endedOn.year } : {}),
    }));

  const certifications = (
    rawProfile.licenseAndCertificates.length > 0 ? rawProfile.licenseAndCertificates : rawProfile.certifications
  )
    .filter((cert) => cert.title || cert.name)
    .slice(0, 5)
    .map((cert) => ({
      name: cert.title || cert.name || "",
      issuer: cert.companyName || cert.issuedBy || null,
    }));

  return {
    fullName: rawProfile.fullName || `${rawProfile.firstName || ""} ${rawProfile.lastName || ""}`.trim(),
    headline: rawProfile.headline?.substring(0, 200) ?? null,
    location: rawProfile.addressWithCountry || rawProfile.addressWithoutCountry || rawProfile.location || null,
    profileUrl: rawProfile.linkedinUrl || rawProfile.linkedinPublicUrl || rawProfile.profileUrl || null,
    currentPosition: rawProfile.jobTitle || experiences[0]?.title || null,
    currentCompany: rawProfile.companyName || experiences[0]?.company || null,
    experienceYears: rawProfile.totalExperienceYears ?? calculateExperienceYears(experiences),
    about: rawProfile.about?.substring(0, 500) ?? null,
    skills,
    experience: experiences,
    education,
    certifications,
  };
}

/**
 * Validate profile has minimum data
 */
export function isValidProfile(profile: CleanedProfile): boolean {
  const hasBasicInfo = profile.fullName.length > 0;
  const hasContent = !!(
    profile.headline ||
    profile.currentPosition ||
    profile.experience.length > 0 ||
    profile.skills.length > 0
  );

  return hasBasicInfo && hasContent;
}

/**
 * Total years of experience from duration strings ("2 yrs 3 mos", "2018 - Present")
 */
export function calculateExperienceYears(experiences: CleanedExperience[]): number {
  let totalYears = 0;

  for (const exp of experiences) {
    if (!exp.duration) continue;

    const yearMatch = exp.duration.match(/(\d+)\s*(yr|year)/i);
    const monthMatch = exp.duration.match(/(\d+)\s*(mo|month)/i);

    if (yearMatch) totalYears += parseInt(yearMatch[1], 10);
    if (monthMatch) totalYears += parseInt(monthMatch[1], 10) / 12;

    const dateMatch = exp.duration.match(/(\d{4})\s*-\s*(?:Present|(\d{4}))/i);
    if (!yearMatch && !monthMatch && dateMatch) {
      const start = parseInt(dateMatch[1], 10);
      const end = dateMatch[2] ? parseInt(dateMatch[2], 10) : new Date().getFullYear();
      totalYears += end - start;
    }
  }

  return Math.round(totalYears * 10) / 10;
}
