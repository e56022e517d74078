import type { ScoredProfile, ScoringPreferences } from "../compatibility";

import { describe, expect, it } from "vitest";

import { calculateAge } from "../age";
import {
  calculateCompatibility,
  DEFAULT_PREFERENCES,
  FACTOR_WEIGHTS,
  isMutualMatch,
  matchesPreferenceList,
} from "../compatibility";

const NOW = new Date("2025-06-01T12:00:00.000Z");

function profile(overrides: Partial<ScoredProfile> = {}): ScoredProfile {
  return {
    verifiedBirthDate: null,
    verifiedNationality: null,
    verifiedResidenceCountry: null,
    verifiedEducationLevel: null,
    verifiedMaritalStatus: null,
    currentCity: null,
    ethnicity: null,
    religiousPractice: null,
    heightCm: null,
    smoking: null,
    alcohol: null,
    diet: null,
    ...overrides,
  };
}

function prefs(overrides: Partial<ScoringPreferences> = {}): ScoringPreferences {
  return { ...DEFAULT_PREFERENCES, ...overrides };
}

function score(
  candidate: ScoredProfile,
  viewerPreferences: ScoringPreferences | null,
  options: {
    viewer?: ScoredProfile;
    verified?: boolean;
    candidatePreferences?: ScoringPreferences | null;
  } = {},
) {
  return calculateCompatibility({
    viewer: options.viewer ?? profile(),
    viewerPreferences,
    candidate,
    candidateVerificationStatus: options.verified ? "verified" : "unverified",
    candidatePreferences: options.candidatePreferences ?? null,
    now: NOW,
  });
}

describe("calculateAge", () => {
  it("counts whole years up to the reference date", () => {
    expect(calculateAge("1990-06-01", NOW)).toBe(35);
    expect(calculateAge("1990-06-02", NOW)).toBe(34);
  });

  it("returns null for missing or non-ISO dates", () => {
    expect(calculateAge(null, NOW)).toBeNull();
    expect(calculateAge("15.01.1990", NOW)).toBeNull();
  });
});

describe("matchesPreferenceList", () => {
  it("accepts anything when no preference is set", () => {
    expect(matchesPreferenceList(null, null)).toBe(true);
    expect(matchesPreferenceList([], "Tashkent")).toBe(true);
  });

  it("compares case-insensitively and rejects missing values", () => {
    expect(matchesPreferenceList(["Tashkent"], "tashkent")).toBe(true);
    expect(matchesPreferenceList(["Tashkent"], null)).toBe(false);
    expect(matchesPreferenceList(["Tashkent"], "Bukhara")).toBe(false);
  });
});

describe("calculateCompatibility", () => {
  it("gives an unverified candidate everything but verification under default preferences", () => {
    const result = score(profile({ verifiedBirthDate: "1995-06-02" }), null);

    expect(result.score).toBe(90);
    expect(result.mutual).toBe(true);
    expect(result.breakdown).toEqual({
      age: { match: true, score: 15, maxScore: 15, detail: "Age 29 within range" },
      location: {
        match: true,
        score: 15,
        maxScore: 15,
        detail: "Location compatible",
      },
      ethnicity: {
        match: true,
        score: 10,
        maxScore: 10,
        detail: "Ethnicity compatible",
      },
      religion: {
        match: true,
        score: 15,
        maxScore: 15,
        detail: "Religious practice compatible",
      },
      education: {
        match: true,
        score: 5,
        maxScore: 5,
        detail: "Education compatible",
      },
      maritalStatus: {
        match: true,
        score: 10,
        maxScore: 10,
        detail: "Marital status compatible",
      },
      height: {
        match: true,
        score: 5,
        maxScore: 5,
        detail: "Height not specified",
      },
      lifestyle: {
        match: true,
        score: 10,
        maxScore: 10,
        detail: "No lifestyle preferences set",
      },
      verification: {
        match: false,
        score: 0,
        maxScore: 10,
        detail: "Not verified",
      },
      mutual: {
        match: true,
        score: 5,
        maxScore: 5,
        detail: "Mutual match potential",
      },
    });
  });

  it("reaches 100 for a verified candidate who fits every preference", () => {
    const result = score(
      profile({ verifiedBirthDate: "1995-01-01", verifiedNationality: "Uzbekistan" }),
      prefs({ preferredCountries: ["uzbekistan"] }),
      { verified: true },
    );

    expect(result.score).toBe(100);
    expect(result.breakdown.location.detail).toBe("Country matches preference");
    expect(result.breakdown.verification.detail).toBe("Verified profile");
  });

  it("scores the sum of its factors when most of them miss", () => {
    const result = score(
      profile({
        verifiedBirthDate: "2000-01-01",
        verifiedNationality: "Kazakhstan",
        religiousPractice: "moderate",
        verifiedEducationLevel: "Bachelor",
        verifiedMaritalStatus: "divorced_once",
        heightCm: 160,
        smoking: "yes",
        alcohol: "no",
      }),
      prefs({
        minAge: 30,
        maxAge: 40,
        preferredCountries: ["Uzbekistan"],
        preferredEthnicities: ["Uzbek"],
        preferredReligiousPractices: ["practicing"],
        preferredEducationLevels: ["Master"],
        preferredMaritalStatuses: ["never_married"],
        minHeightCm: 170,
        preferredSmoking: ["no"],
        preferredAlcohol: ["no"],
      }),
      {
        viewer: profile({ verifiedNationality: "Uzbekistan" }),
        candidatePreferences: prefs({ preferredCountries: ["Turkey"] }),
      },
    );

    const { breakdown } = result;
    expect(breakdown.age.detail).toBe("Too young (25 < 30)");
    expect(breakdown.location.detail).toBe("Country not in preferences");
    expect(breakdown.ethnicity.detail).toBe("Ethnicity not in preferences");
    expect(breakdown.religion.detail).toBe(
      "Religious practice not in preferences",
    );
    expect(breakdown.education.detail).toBe(
      "Education level not in preferences",
    );
    expect(breakdown.maritalStatus.detail).toBe(
      "Marital status not in preferences",
    );
    expect(breakdown.height.detail).toBe("Too short (160cm)");
    expect(breakdown.lifestyle).toEqual({
      match: false,
      score: 5,
      maxScore: 10,
      detail: "1/2 lifestyle preferences match",
    });
    expect(breakdown.mutual.detail).toBe("Not a mutual match");
    expect(result.mutual).toBe(false);
    expect(result.score).toBe(5);
  });

  it("keeps the score within [0, 100] and equal to the breakdown total", () => {
    const maxTotal = Object.values(FACTOR_WEIGHTS).reduce((a, b) => a + b, 0);
    expect(maxTotal).toBe(100);

    const result = score(profile({ heightCm: 190 }), prefs({ maxHeightCm: 180 }));
    const total = Object.values(result.breakdown).reduce(
      (sum, entry) => sum + entry.score,
      0,
    );

    expect(result.score).toBe(total);
    expect(result.score).toBeGreaterThanOrEqual(0);
    expect(result.score).toBeLessThanOrEqual(100);
    expect(result.breakdown.height.detail).toBe("Too tall (190cm)");
  });

  it("reports an unverified age and an age above the range", () => {
    expect(score(profile(), null).breakdown.age.detail).toBe("Age not verified");
    expect(
      score(profile({ verifiedBirthDate: "1990-01-01" }), prefs({ maxAge: 30 }))
        .breakdown.age.detail,
    ).toBe("Too old (35 > 30)");
  });

  it("falls back to the residence country", () => {
    const result = score(
      profile({ verifiedResidenceCountry: "Germany" }),
      prefs({ preferredCountries: ["germany"] }),
    );

    expect(result.breakdown.location.match).toBe(true);
  });

  it("checks the city after the country", () => {
    const result = score(
      profile({ verifiedNationality: "Uzbekistan", currentCity: "Samarkand" }),
      prefs({ preferredCountries: ["Uzbekistan"], preferredCities: ["Tashkent"] }),
    );

    expect(result.breakdown.location).toEqual({
      match: false,
      score: 0,
      maxScore: 15,
      detail: "City not in preferences",
    });
  });

  it("floors partial lifestyle points", () => {
    const result = score(
      profile({ smoking: "no", alcohol: "yes", diet: "vegetarian" }),
      prefs({
        preferredSmoking: ["no"],
        preferredAlcohol: ["no"],
        preferredDiet: ["halal"],
      }),
    );

    expect(result.breakdown.lifestyle.score).toBe(3);
    expect(result.breakdown.lifestyle.detail).toBe(
      "1/3 lifestyle preferences match",
    );
  });
});

describe("isMutualMatch", () => {
  it("is true when the candidate has no preferences", () => {
    expect(isMutualMatch(profile(), null, NOW)).toBe(true);
  });

  it("checks the viewer's age against the candidate's range", () => {
    const viewer = profile({ verifiedBirthDate: "2000-01-01" });

    expect(isMutualMatch(viewer, prefs({ minAge: 30 }), NOW)).toBe(false);
    expect(isMutualMatch(viewer, prefs({ minAge: 20, maxAge: 30 }), NOW)).toBe(
      true,
    );
  });

  it("skips the age check for a viewer without a verified birth date", () => {
    expect(isMutualMatch(profile(), prefs({ minAge: 30 }), NOW)).toBe(true);
  });

  it("checks the viewer's country against the candidate's list", () => {
    const viewer = profile({ verifiedNationality: "Uzbekistan" });

    expect(
      isMutualMatch(viewer, prefs({ preferredCountries: ["Uzbekistan"] }), NOW),
    ).toBe(true);
    expect(
      isMutualMatch(viewer, prefs({ preferredCountries: ["Turkey"] }), NOW),
    ).toBe(false);
  });
});
