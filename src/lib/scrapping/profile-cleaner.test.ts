import { describe, expect, it } from "vitest";
import { calculateExperienceYears, cleanProfileData, isValidProfile, rawActorProfileSchema } from "./profile-cleaner";

describe("cleanProfileData", () => {
  it("keeps the fields enrichment needs", () => {
    const raw = rawActorProfileSchema.parse({
      firstName: "Jane",
      lastName: "Doe",
      headline: "Program Director",
      addressWithCountry: "Columbus, Ohio, United States",
      linkedinUrl: "https://www.linkedin.com/in/jane-doe",
      email: "jane@example.com",
      experiences: [
        { title: "Program Director", companyName: "Acme Health", duration: "3 yrs 6 mos", jobDescription: "Runs programs" },
        { companyName: "No Title Co", duration: "1 yr" },
        null,
        { jobTitle: "Case Manager", company: "Beta Care", jobStartedOn: "2015", jobEndedOn: "2019" },
      ],
      skills: ["Budgeting", { title: "Compliance" }, { name: "" }, 42],
      educations: [{ title: "MSW", schoolName: "Ohio State", period: { endedOn: { year: 2014 } } }],
      licenseAndCertificates: [{ title: "LISW", companyName: "Ohio Board" }],
    });

    const cleaned = cleanProfileData(raw);

    expect(cleaned).toEqual({
      fullName: "Jane Doe",
      headline: "Program Director",
      location: "Columbus, Ohio, United States",
      profileUrl: "https://www.linkedin.com/in/jane-doe",
      currentPosition: "Program Director",
      currentCompany: "Acme Health",
      experienceYears: 7.5,
      about: null,
      skills: ["Budgeting", "Compliance"],
      experience: [
        { title: "Program Director", company: "Acme Health", duration: "3 yrs 6 mos", description: "Runs programs" },
        { title: "Case Manager", company: "Beta Care", duration: "2015 - 2019" },
      ],
      education: [{ degree: "MSW", school: "Ohio State", year: 2014 }],
      certifications: [{ name: "LISW", issuer: "Ohio Board" }],
    });
    expect(isValidProfile(cleaned)).toBe(true);
  });

  it("rejects a profile with a name but no content", () => {
    const cleaned = cleanProfileData(rawActorProfileSchema.parse({ fullName: "Jane Doe" }));
    expect(isValidProfile(cleaned)).toBe(false);
  });
});

describe("calculateExperienceYears", () => {
  it("sums year and month durations", () => {
    expect(
      calculateExperienceYears([
        { title: "A", company: "X", duration: "2 yrs 3 mos" },
        { title: "B", company: "Y", duration: "6 months" },
      ])
    ).toBe(2.8);
  });
});
