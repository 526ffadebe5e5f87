import { describe, expect, it } from "vitest";
import {
  addDomainHits,
  emptyDomainHits,
  isSatisfied,
  matchDomains,
  roundBudget,
  summarizeCoverage,
} from "./coverage";

describe("matchDomains", () => {
  it("finds every tracked domain in the text", () => {
    expect(matchDomains("Registered Nurse (RN) in Residential I/DD programs")).toEqual([
      "residential",
      "idd",
      "nursing",
    ]);
    expect(matchDomains("Director, Behavioral Health Services")).toEqual(["behavioral_health"]);
  });

  it("matches short keywords as whole words only", () => {
    expect(matchDomains("Learn modern governance")).toEqual([]);
    expect(matchDomains("RN, BSN")).toEqual(["nursing"]);
  });

  it("counts nursing leadership titles that never say nurse", () => {
    expect(matchDomains("Director of Nursing")).toEqual(["nursing"]);
  });
});

describe("addDomainHits", () => {
  it("counts one hit per matched domain and leaves the input untouched", () => {
    const before = emptyDomainHits();
    const after = addDomainHits(before, "behavioral health nurse, behavioral health again");

    expect(after).toEqual({ behavioral_health: 1, residential: 0, idd: 0, nursing: 1 });
    expect(before).toEqual(emptyDomainHits());
  });
});

describe("isSatisfied", () => {
  const hits = (behavioral_health: number) => ({ ...emptyDomainHits(), behavioral_health });

  it("is false below 80% of the target whatever the domain ratio", () => {
    expect(isSatisfied(7, 10, hits(7))).toBe(false);
  });

  it("needs the primary domain ratio at 0.4 or above", () => {
    expect(isSatisfied(8, 10, hits(3))).toBe(false);
    expect(isSatisfied(8, 10, hits(4))).toBe(true);
    expect(isSatisfied(10, 10, hits(4))).toBe(true);
  });
});

describe("roundBudget", () => {
  it("gives 2 rounds up to a target of 10 and 3 above", () => {
    expect(roundBudget(1)).toBe(2);
    expect(roundBudget(10)).toBe(2);
    expect(roundBudget(11)).toBe(3);
  });
});

describe("summarizeCoverage", () => {
  it("reports counts with ratios", () => {
    const summary = JSON.parse(
      summarizeCoverage("Program Director", 10, 4, { behavioral_health: 2, residential: 1, idd: 0, nursing: 0 })
    );

    expect(summary).toEqual({
      jd_title: "Program Director",
      target_profiles: 10,
      total_profiles: 4,
      domain_hits: {
        behavioral_health: "2 (0.50 ratio)",
        residential: "1 (0.25 ratio)",
        idd: "0 (0.00 ratio)",
        nursing: "0 (0.00 ratio)",
      },
    });
  });
});
