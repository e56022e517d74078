import type { Profile, UserVerificationStatus } from "@/lib/db/schema";
import type { CompatibilityResult } from "./compatibility";

import {
  getActiveMatchPartners,
  getDeclinedCounterparts,
  getInterestRecipients,
  getInterestSenders,
  listCandidateProfiles,
  listPreferenceOwnersSeeking,
} from "@/lib/db/queries/matching";
import {
  getProfileById,
  getProfileByUserId,
  getSearchPreferenceByUserId,
  getUserById,
} from "@/lib/db/queries/users";
import { logger } from "@/lib/logging/logger";

import { calculateAge } from "./age";
import {
  calculateCompatibility,
  matchesPreferenceList,
  profileCountry,
} from "./compatibility";

export interface SuggestionCard {
  profileId: string;
  userId: string;
  displayName: string | null;
  age: number | null;
  city: string | null;
  country: string | null;
  compatibilityScore: number;
  isMutualMatch: boolean;
  isVerified: boolean;
}

export interface SuggestionPage {
  suggestions: SuggestionCard[];
  totalAvailable: number;
}

const DEFAULT_SUGGESTION_LIMIT = 10;
const DEFAULT_WHO_LIKES_ME_LIMIT = 20;

/** Verified first name plus last initial, e.g. "Dilnoza K." */
export function displayNameFor(profile: Profile): string | null {
  if (!profile.verifiedFirstName) return null;
  return profile.verifiedLastInitial
    ? `${profile.verifiedFirstName} ${profile.verifiedLastInitial}.`
    : profile.verifiedFirstName;
}

function toCard(
  profile: Profile,
  verificationStatus: UserVerificationStatus,
  compatibility: Pick<CompatibilityResult, "score" | "mutual">,
  now: Date,
): SuggestionCard {
  return {
    profileId: profile.id,
    userId: profile.userId,
    displayName: displayNameFor(profile),
    age: calculateAge(profile.verifiedBirthDate, now),
    city: profile.currentCity,
    country: profileCountry(profile),
    compatibilityScore: compatibility.score,
    isMutualMatch: compatibility.mutual,
    isVerified: verificationStatus === "verified",
  };
}

/**
 * Users the viewer should not be shown again: self, anyone already sent an
 * interest, declined either way, or currently matched.
 */
function excludedUserIds(viewerId: string): string[] {
  return [
    ...new Set([
      viewerId,
      ...getInterestRecipients(viewerId),
      ...getDeclinedCounterparts(viewerId),
      ...getActiveMatchPartners(viewerId),
    ]),
  ];
}

/**
 * Rank visible candidates by compatibility. Equal scores keep retrieval
 * order. `totalAvailable` counts every scored candidate, not just the page.
 */
export function getSuggestions(
  viewerId: string,
  options: { limit?: number; now?: Date } = {},
): SuggestionPage {
  const viewer = getProfileByUserId(viewerId);
  if (!viewer) {
    return { suggestions: [], totalAvailable: 0 };
  }
  const now = options.now ?? new Date();
  const limit = Math.max(options.limit ?? DEFAULT_SUGGESTION_LIMIT, 0);
  const viewerPreferences = getSearchPreferenceByUserId(viewerId);

  const candidates = listCandidateProfiles({
    excludeUserIds: excludedUserIds(viewerId),
    gender: viewer.seekingGender,
  });

  const scored = candidates.map((row) =>
    toCard(
      row.profile,
      row.verificationStatus,
      calculateCompatibility({
        viewer,
        viewerPreferences,
        candidate: row.profile,
        candidateVerificationStatus: row.verificationStatus,
        candidatePreferences: row.preference,
        now,
      }),
      now,
    ),
  );
  // Array.prototype.sort is stable
  scored.sort((a, b) => b.compatibilityScore - a.compatibilityScore);

  logger.debug(
    { candidateCount: scored.length, limit },
    "Suggestions ranked",
  );
  return {
    suggestions: scored.slice(0, limit),
    totalAvailable: scored.length,
  };
}

export interface WhoLikesMePage {
  profiles: SuggestionCard[];
  total: number;
}

/**
 * Users whose own preferences accept the viewer (age range, country and
 * ethnicity lists) and who have not sent the viewer an interest yet.
 * With `countOnly` the list is left empty.
 */
export function getWhoLikesMe(
  viewerId: string,
  options: { limit?: number; countOnly?: boolean; now?: Date } = {},
): WhoLikesMePage {
  const viewer = getProfileByUserId(viewerId);
  if (!viewer?.gender) {
    return { profiles: [], total: 0 };
  }
  const now = options.now ?? new Date();
  const limit = Math.max(options.limit ?? DEFAULT_WHO_LIKES_ME_LIMIT, 0);
  const viewerAge = calculateAge(viewer.verifiedBirthDate, now);
  const viewerCountry = profileCountry(viewer);

  const owners = listPreferenceOwnersSeeking({
    viewerUserId: viewerId,
    gender: viewer.gender,
    excludeUserIds: getInterestSenders(viewerId),
  });

  const accepting = owners.filter(({ preference }) => {
    if (
      viewerAge !== null &&
      (viewerAge < preference.minAge || viewerAge > preference.maxAge)
    ) {
      return false;
    }
    return (
      matchesPreferenceList(preference.preferredCountries, viewerCountry) &&
      matchesPreferenceList(preference.preferredEthnicities, viewer.ethnicity)
    );
  });

  if (options.countOnly) {
    return { profiles: [], total: accepting.length };
  }

  const profiles = accepting.slice(0, limit).map(({ profile }) => {
    const owner = getUserById(profile.userId);
    return toCard(
      profile,
      owner?.verificationStatus ?? "unverified",
      { score: 0, mutual: true },
      now,
    );
  });
  return { profiles, total: accepting.length };
}

/**
 * Score a single profile for the viewer. Null when either side has no
 * profile.
 */
export function getCompatibilityWithProfile(
  viewerId: string,
  profileId: string,
  options: { now?: Date } = {},
): CompatibilityResult | null {
  const viewer = getProfileByUserId(viewerId);
  const candidate = getProfileById(profileId);
  if (!viewer || !candidate) {
    return null;
  }
  const owner = getUserById(candidate.userId);

  return calculateCompatibility({
    viewer,
    viewerPreferences: getSearchPreferenceByUserId(viewerId),
    candidate,
    candidateVerificationStatus: owner?.verificationStatus ?? "unverified",
    candidatePreferences: getSearchPreferenceByUserId(candidate.userId),
    now: options.now ?? new Date(),
  });
}
