/**
 * Compatibility scoring between a viewer and a candidate profile.
 *
 * Ten weighted factors add up to 100. Each factor reports whether it
 * matched, the points it contributed and a short human-readable detail.
 * Scoring is a pure function of its input; the reference date for ages
 * is passed in.
 */
import type {
  Profile,
  SearchPreference,
  UserVerificationStatus,
} from "@/lib/db/schema";

import { calculateAge } from "./age";

export type ScoredProfile = Pick<
  Profile,
  | "verifiedBirthDate"
  | "verifiedNationality"
  | "verifiedResidenceCountry"
  | "verifiedEducationLevel"
  | "verifiedMaritalStatus"
  | "currentCity"
  | "ethnicity"
  | "religiousPractice"
  | "heightCm"
  | "smoking"
  | "alcohol"
  | "diet"
>;

export type ScoringPreferences = Pick<
  SearchPreference,
  | "minAge"
  | "maxAge"
  | "preferredCountries"
  | "preferredCities"
  | "preferredEthnicities"
  | "preferredReligiousPractices"
  | "preferredEducationLevels"
  | "preferredMaritalStatuses"
  | "minHeightCm"
  | "maxHeightCm"
  | "preferredSmoking"
  | "preferredAlcohol"
  | "preferredDiet"
  | "mustBeVerified"
>;

export const FACTOR_WEIGHTS = {
  age: 15,
  location: 15,
  ethnicity: 10,
  religion: 15,
  education: 5,
  maritalStatus: 10,
  height: 5,
  lifestyle: 10,
  verification: 10,
  mutual: 5,
} as const;

export type CompatibilityFactor = keyof typeof FACTOR_WEIGHTS;

export interface FactorScore {
  match: boolean;
  score: number;
  maxScore: number;
  detail: string;
}

export interface CompatibilityResult {
  score: number;
  breakdown: Record<CompatibilityFactor, FactorScore>;
  mutual: boolean;
}

export interface CompatibilityInput {
  viewer: ScoredProfile;
  /** Absent preferences fall back to permissive defaults */
  viewerPreferences: ScoringPreferences | null;
  candidate: ScoredProfile;
  candidateVerificationStatus: UserVerificationStatus;
  candidatePreferences: ScoringPreferences | null;
  now: Date;
}

export const DEFAULT_PREFERENCES: ScoringPreferences = {
  minAge: 18,
  maxAge: 99,
  preferredCountries: null,
  preferredCities: null,
  preferredEthnicities: null,
  preferredReligiousPractices: null,
  preferredEducationLevels: null,
  preferredMaritalStatuses: null,
  minHeightCm: null,
  maxHeightCm: null,
  preferredSmoking: null,
  preferredAlcohol: null,
  preferredDiet: null,
  mustBeVerified: true,
};

/**
 * An empty or unset list accepts anything, including a missing value.
 * Otherwise the value must be present and listed (case-insensitive).
 */
export function matchesPreferenceList(
  preferences: readonly string[] | null | undefined,
  value: string | null | undefined,
): boolean {
  if (!preferences || preferences.length === 0) return true;
  if (!value) return false;
  const needle = value.toLowerCase();
  return preferences.some((preference) => preference.toLowerCase() === needle);
}

/** Nationality first, residence country otherwise. */
export function profileCountry(profile: ScoredProfile): string | null {
  return profile.verifiedNationality || profile.verifiedResidenceCountry || null;
}

function factor(
  name: CompatibilityFactor,
  match: boolean,
  detail: string,
): FactorScore {
  const maxScore = FACTOR_WEIGHTS[name];
  return { match, score: match ? maxScore : 0, maxScore, detail };
}

function scoreAge(
  candidate: ScoredProfile,
  prefs: ScoringPreferences,
  now: Date,
): FactorScore {
  const age = calculateAge(candidate.verifiedBirthDate, now);
  if (age === null) {
    return factor("age", false, "Age not verified");
  }
  if (age < prefs.minAge) {
    return factor("age", false, `Too young (${age} < ${prefs.minAge})`);
  }
  if (age > prefs.maxAge) {
    return factor("age", false, `Too old (${age} > ${prefs.maxAge})`);
  }
  return factor("age", true, `Age ${age} within range`);
}

function scoreLocation(
  candidate: ScoredProfile,
  prefs: ScoringPreferences,
): FactorScore {
  let detail = "Location compatible";
  if (prefs.preferredCountries?.length) {
    if (!matchesPreferenceList(prefs.preferredCountries, profileCountry(candidate))) {
      return factor("location", false, "Country not in preferences");
    }
    detail = "Country matches preference";
  }
  if (
    prefs.preferredCities?.length &&
    !matchesPreferenceList(prefs.preferredCities, candidate.currentCity)
  ) {
    return factor("location", false, "City not in preferences");
  }
  return factor("location", true, detail);
}

function scoreList(
  name: CompatibilityFactor,
  preferences: readonly string[] | null,
  value: string | null,
  details: { match: string; mismatch: string },
): FactorScore {
  const match = matchesPreferenceList(preferences, value);
  return factor(name, match, match ? details.match : details.mismatch);
}

function scoreHeight(
  candidate: ScoredProfile,
  prefs: ScoringPreferences,
): FactorScore {
  const height = candidate.heightCm;
  if (height === null) {
    return factor("height", true, "Height not specified");
  }
  if (prefs.minHeightCm !== null && height < prefs.minHeightCm) {
    return factor("height", false, `Too short (${height}cm)`);
  }
  if (prefs.maxHeightCm !== null && height > prefs.maxHeightCm) {
    return factor("height", false, `Too tall (${height}cm)`);
  }
  return factor("height", true, "Height compatible");
}

function scoreLifestyle(
  candidate: ScoredProfile,
  prefs: ScoringPreferences,
): FactorScore {
  const maxScore = FACTOR_WEIGHTS.lifestyle;
  const checks: Array<[readonly string[] | null, string | null]> = [
    [prefs.preferredSmoking, candidate.smoking],
    [prefs.preferredAlcohol, candidate.alcohol],
    [prefs.preferredDiet, candidate.diet],
  ];

  let considered = 0;
  let matched = 0;
  for (const [preferences, value] of checks) {
    if (!preferences?.length) continue;
    considered++;
    if (matchesPreferenceList(preferences, value)) matched++;
  }

  if (considered === 0) {
    return {
      match: true,
      score: maxScore,
      maxScore,
      detail: "No lifestyle preferences set",
    };
  }
  return {
    match: matched === considered,
    score: Math.floor((matched / considered) * maxScore),
    maxScore,
    detail: `${matched}/${considered} lifestyle preferences match`,
  };
}

/**
 * Whether the candidate's own preferences would accept the viewer.
 * Only age and country are checked in this direction; a candidate
 * without preferences accepts anyone.
 */
export function isMutualMatch(
  viewer: ScoredProfile,
  candidatePreferences: ScoringPreferences | null,
  now: Date,
): boolean {
  if (!candidatePreferences) return true;

  const checks: boolean[] = [];
  const viewerAge = calculateAge(viewer.verifiedBirthDate, now);
  if (viewerAge !== null) {
    checks.push(
      viewerAge >= candidatePreferences.minAge &&
        viewerAge <= candidatePreferences.maxAge,
    );
  }
  if (candidatePreferences.preferredCountries?.length) {
    checks.push(
      matchesPreferenceList(
        candidatePreferences.preferredCountries,
        profileCountry(viewer),
      ),
    );
  }
  return checks.every(Boolean);
}

export function calculateCompatibility(
  input: CompatibilityInput,
): CompatibilityResult {
  const prefs = input.viewerPreferences ?? DEFAULT_PREFERENCES;
  const { candidate, now } = input;

  const isVerified = input.candidateVerificationStatus === "verified";
  const mutual = isMutualMatch(input.viewer, input.candidatePreferences, now);

  const breakdown: Record<CompatibilityFactor, FactorScore> = {
    age: scoreAge(candidate, prefs, now),
    location: scoreLocation(candidate, prefs),
    ethnicity: scoreList("ethnicity", prefs.preferredEthnicities, candidate.ethnicity, {
      match: "Ethnicity compatible",
      mismatch: "Ethnicity not in preferences",
    }),
    religion: scoreList(
      "religion",
      prefs.preferredReligiousPractices,
      candidate.religiousPractice,
      {
        match: "Religious practice compatible",
        mismatch: "Religious practice not in preferences",
      },
    ),
    education: scoreList(
      "education",
      prefs.preferredEducationLevels,
      candidate.verifiedEducationLevel,
      {
        match: "Education compatible",
        mismatch: "Education level not in preferences",
      },
    ),
    maritalStatus: scoreList(
      "maritalStatus",
      prefs.preferredMaritalStatuses,
      candidate.verifiedMaritalStatus,
      {
        match: "Marital status compatible",
        mismatch: "Marital status not in preferences",
      },
    ),
    height: scoreHeight(candidate, prefs),
    lifestyle: scoreLifestyle(candidate, prefs),
    // Points follow verification alone; mustBeVerified filters nothing here
    verification: factor(
      "verification",
      isVerified,
      isVerified ? "Verified profile" : "Not verified",
    ),
    mutual: factor(
      "mutual",
      mutual,
      mutual ? "Mutual match potential" : "Not a mutual match",
    ),
  };

  const score = Object.values(breakdown).reduce(
    (total, entry) => total + entry.score,
    0,
  );
  return { score, breakdown, mutual };
}
