import type {
  Gender,
  Profile,
  SearchPreference,
  UserVerificationStatus,
} from "../schema";

import { and, asc, eq, ne, notInArray, or } from "drizzle-orm";

import { db } from "../connection";
import {
  interests,
  matches,
  profiles,
  searchPreferences,
  users,
} from "../schema";

export interface CandidateRow {
  profile: Profile;
  verificationStatus: UserVerificationStatus;
  preference: SearchPreference | null;
}

export interface PreferenceOwnerRow {
  preference: SearchPreference;
  profile: Profile;
}

/** Users the viewer has sent an interest to, whatever its status. */
export function getInterestRecipients(userId: string): string[] {
  return db
    .select({ userId: interests.toUserId })
    .from(interests)
    .where(eq(interests.fromUserId, userId))
    .all()
    .map((row) => row.userId);
}

/** Users who have sent the viewer an interest, whatever its status. */
export function getInterestSenders(userId: string): string[] {
  return db
    .select({ userId: interests.fromUserId })
    .from(interests)
    .where(eq(interests.toUserId, userId))
    .all()
    .map((row) => row.userId);
}

/** Counterparts of declined interests in either direction. */
export function getDeclinedCounterparts(userId: string): string[] {
  return db
    .select({ fromUserId: interests.fromUserId, toUserId: interests.toUserId })
    .from(interests)
    .where(
      and(
        eq(interests.status, "declined"),
        or(eq(interests.fromUserId, userId), eq(interests.toUserId, userId)),
      ),
    )
    .all()
    .map((row) => (row.fromUserId === userId ? row.toUserId : row.fromUserId));
}

export function getActiveMatchPartners(userId: string): string[] {
  return db
    .select({ userAId: matches.userAId, userBId: matches.userBId })
    .from(matches)
    .where(
      and(
        eq(matches.status, "active"),
        or(eq(matches.userAId, userId), eq(matches.userBId, userId)),
      ),
    )
    .all()
    .map((row) => (row.userAId === userId ? row.userBId : row.userAId));
}

/**
 * Visible profiles of active users, in creation order.
 */
export function listCandidateProfiles(filter: {
  excludeUserIds: readonly string[];
  gender: Gender | null;
}): CandidateRow[] {
  const conditions = [eq(profiles.isVisible, true), eq(users.status, "active")];
  if (filter.excludeUserIds.length > 0) {
    conditions.push(notInArray(profiles.userId, [...filter.excludeUserIds]));
  }
  if (filter.gender) {
    conditions.push(eq(profiles.gender, filter.gender));
  }

  return db
    .select({
      profile: profiles,
      verificationStatus: users.verificationStatus,
      preference: searchPreferences,
    })
    .from(profiles)
    .innerJoin(users, eq(users.id, profiles.userId))
    .leftJoin(searchPreferences, eq(searchPreferences.userId, profiles.userId))
    .where(and(...conditions))
    .orderBy(asc(profiles.createdAt), asc(profiles.id))
    .all();
}

/**
 * Preferences of other active users whose profile seeks the given gender.
 */
export function listPreferenceOwnersSeeking(filter: {
  viewerUserId: string;
  gender: Gender;
  excludeUserIds: readonly string[];
}): PreferenceOwnerRow[] {
  const conditions = [
    ne(searchPreferences.userId, filter.viewerUserId),
    eq(users.status, "active"),
    eq(profiles.seekingGender, filter.gender),
  ];
  if (filter.excludeUserIds.length > 0) {
    conditions.push(
      notInArray(searchPreferences.userId, [...filter.excludeUserIds]),
    );
  }

  return db
    .select({ preference: searchPreferences, profile: profiles })
    .from(searchPreferences)
    .innerJoin(users, eq(users.id, searchPreferences.userId))
    .innerJoin(profiles, eq(profiles.userId, searchPreferences.userId))
    .where(and(...conditions))
    .orderBy(asc(searchPreferences.createdAt), asc(searchPreferences.id))
    .all();
}
