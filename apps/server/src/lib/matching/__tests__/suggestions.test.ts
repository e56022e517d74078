import type { NewProfile } from "@/lib/db/schema";

import { beforeEach, describe, expect, it } from "vitest";

import {
  createTestInterest,
  createTestMatch,
  createTestPreference,
  createTestProfile,
  createTestUser,
  resetDatabase,
} from "@/test/db-test-utils";

import {
  getCompatibilityWithProfile,
  getSuggestions,
  getWhoLikesMe,
} from "../suggestions";

const NOW = new Date("2025-06-01T12:00:00.000Z");

type ProfileInput = Partial<Omit<NewProfile, "userId">>;

const candidateFields: ProfileInput = {
  gender: "female",
  seekingGender: "male",
  verifiedBirthDate: "1996-05-05",
  verifiedNationality: "Uzbekistan",
  currentCity: "Tashkent",
};

function createCandidate(
  fields: ProfileInput = {},
  verified = false,
): { userId: string; profileId: string } {
  const userId = createTestUser({
    verificationStatus: verified ? "verified" : "unverified",
  });
  const profile = createTestProfile(userId, { ...candidateFields, ...fields });
  return { userId, profileId: profile.id };
}

describe("getSuggestions", () => {
  let viewerId: string;

  beforeEach(() => {
    resetDatabase();
    viewerId = createTestUser();
    createTestProfile(viewerId, {
      gender: "male",
      seekingGender: "female",
      verifiedBirthDate: "1993-03-10",
      verifiedNationality: "Uzbekistan",
    });
  });

  it("ranks by score and keeps creation order for ties", () => {
    const first = createCandidate();
    const second = createCandidate();
    const best = createCandidate(
      { verifiedFirstName: "Malika", verifiedLastInitial: "R" },
      true,
    );

    const page = getSuggestions(viewerId, { now: NOW });

    expect(page.suggestions.map((card) => card.userId)).toEqual([
      best.userId,
      first.userId,
      second.userId,
    ]);
    expect(page.suggestions[0]).toEqual({
      profileId: best.profileId,
      userId: best.userId,
      displayName: "Malika R.",
      age: 29,
      city: "Tashkent",
      country: "Uzbekistan",
      compatibilityScore: 100,
      isMutualMatch: true,
      isVerified: true,
    });
    expect(page.suggestions[1]?.compatibilityScore).toBe(90);
  });

  it("counts every candidate while returning one page", () => {
    createCandidate();
    createCandidate();
    createCandidate();

    const page = getSuggestions(viewerId, { limit: 2, now: NOW });

    expect(page.suggestions).toHaveLength(2);
    expect(page.totalAvailable).toBe(3);
  });

  it("leaves out people the viewer already dealt with", () => {
    const visible = createCandidate();
    const interested = createCandidate();
    createTestInterest(viewerId, interested.userId);
    const matched = createCandidate();
    createTestMatch(matched.userId, viewerId);
    const declined = createCandidate();
    createTestInterest(declined.userId, viewerId, "declined");

    const page = getSuggestions(viewerId, { now: NOW });

    expect(page.suggestions.map((card) => card.userId)).toEqual([
      visible.userId,
    ]);
  });

  it("leaves out hidden profiles, inactive users and the wrong gender", () => {
    createCandidate({ isVisible: false });
    createCandidate({ gender: "male" });
    const suspended = createTestUser({ status: "suspended" });
    createTestProfile(suspended, candidateFields);

    expect(getSuggestions(viewerId, { now: NOW }).totalAvailable).toBe(0);
  });

  it("keeps a candidate whose pending interest went to the viewer", () => {
    const admirer = createCandidate();
    createTestInterest(admirer.userId, viewerId);

    expect(
      getSuggestions(viewerId, { now: NOW }).suggestions.map(
        (card) => card.userId,
      ),
    ).toEqual([admirer.userId]);
  });

  it("returns nothing for a viewer without a profile", () => {
    createCandidate();

    expect(getSuggestions(createTestUser(), { now: NOW })).toEqual({
      suggestions: [],
      totalAvailable: 0,
    });
  });
});

describe("getWhoLikesMe", () => {
  let viewerId: string;

  function createAdmirer(
    preference: Parameters<typeof createTestPreference>[1] = {},
    fields: ProfileInput = {},
  ): string {
    const userId = createTestUser();
    createTestProfile(userId, {
      gender: "male",
      seekingGender: "female",
      verifiedFirstName: "Timur",
      ...fields,
    });
    createTestPreference(userId, preference);
    return userId;
  }

  beforeEach(() => {
    resetDatabase();
    viewerId = createTestUser();
    createTestProfile(viewerId, {
      ...candidateFields,
      ethnicity: "Uzbek",
    });
  });

  it("lists people whose preferences accept the viewer", () => {
    const accepting = createAdmirer({
      minAge: 25,
      maxAge: 35,
      preferredCountries: ["Uzbekistan"],
    });
    createAdmirer({ minAge: 30 });
    createAdmirer({ preferredEthnicities: ["Tajik"] });
    createAdmirer({}, { seekingGender: "male" });
    const sender = createAdmirer();
    createTestInterest(sender, viewerId);
    const withoutPreferences = createTestUser();
    createTestProfile(withoutPreferences, {
      gender: "male",
      seekingGender: "female",
    });

    const page = getWhoLikesMe(viewerId, { now: NOW });

    expect(page.total).toBe(1);
    expect(page.profiles).toHaveLength(1);
    expect(page.profiles[0]).toMatchObject({
      userId: accepting,
      displayName: "Timur",
      compatibilityScore: 0,
      isMutualMatch: true,
      isVerified: false,
    });
  });

  it("returns only the count when asked", () => {
    createAdmirer();
    createAdmirer();

    expect(getWhoLikesMe(viewerId, { countOnly: true, now: NOW })).toEqual({
      profiles: [],
      total: 2,
    });
  });

  it("needs the viewer's gender", () => {
    const noGender = createTestUser();
    createTestProfile(noGender);
    createAdmirer();

    expect(getWhoLikesMe(noGender, { now: NOW })).toEqual({
      profiles: [],
      total: 0,
    });
  });
});

describe("getCompatibilityWithProfile", () => {
  beforeEach(() => {
    resetDatabase();
  });

  it("scores one profile for the viewer", () => {
    const viewerId = createTestUser();
    createTestProfile(viewerId, { gender: "male", seekingGender: "female" });
    const candidate = createCandidate({}, true);

    const result = getCompatibilityWithProfile(viewerId, candidate.profileId, {
      now: NOW,
    });

    expect(result?.score).toBe(100);
    expect(result?.breakdown.age.detail).toBe("Age 29 within range");
  });

  it("is null when either profile is missing", () => {
    const viewerId = createTestUser();
    const candidate = createCandidate();

    expect(getCompatibilityWithProfile(viewerId, candidate.profileId)).toBeNull();
  });
});
