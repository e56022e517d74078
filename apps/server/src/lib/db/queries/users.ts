import type { Profile, SearchPreference, User } from "../schema";

import { eq } from "drizzle-orm";

import { db } from "../connection";
import { profiles, searchPreferences, users } from "../schema";

export function getUserById(userId: string): User | null {
  const row = db.select().from(users).where(eq(users.id, userId)).get();
  return row ?? null;
}

export function getProfileById(profileId: string): Profile | null {
  const row = db
    .select()
    .from(profiles)
    .where(eq(profiles.id, profileId))
    .get();
  return row ?? null;
}

export function getProfileByUserId(userId: string): Profile | null {
  const row = db
    .select()
    .from(profiles)
    .where(eq(profiles.userId, userId))
    .get();
  return row ?? null;
}

export function getSearchPreferenceByUserId(
  userId: string,
): SearchPreference | null {
  const row = db
    .select()
    .from(searchPreferences)
    .where(eq(searchPreferences.userId, userId))
    .get();
  return row ?? null;
}
