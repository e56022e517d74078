import type {
  DocumentType,
  InterestStatus,
  MatchStatus,
  NewProfile,
  NewSearchPreference,
  Profile,
  SearchPreference,
  Selfie,
  SelfieStatus,
  UserStatus,
  UserVerificationStatus,
  Verification,
  VerificationStatus,
} from "@/lib/db/schema";

import crypto from "node:crypto";

import { db } from "@/lib/db/connection";
import {
  interests,
  matches,
  profiles,
  searchPreferences,
  selfies,
  users,
  verifications,
} from "@/lib/db/schema";
import { serializeEmbedding } from "@/lib/identity/face/embedding";

export type CreateUserInput = {
  id?: string;
  email?: string;
  status?: UserStatus;
  verificationStatus?: UserVerificationStatus;
  isAdmin?: boolean;
};

// Rows created in one test get distinct, increasing timestamps
let clock = Date.UTC(2024, 0, 1);

function nextTimestamp(): string {
  clock += 1000;
  return new Date(clock).toISOString();
}

export function resetDatabase(): void {
  db.transaction((tx) => {
    tx.delete(interests).run();
    tx.delete(matches).run();
    tx.delete(selfies).run();
    tx.delete(verifications).run();
    tx.delete(searchPreferences).run();
    tx.delete(profiles).run();
    tx.delete(users).run();
  });
}

export function createTestUser(input: CreateUserInput = {}): string {
  const id = input.id ?? crypto.randomUUID();
  const createdAt = nextTimestamp();

  db.insert(users)
    .values({
      id,
      email: input.email ?? `user-${id}@example.com`,
      status: input.status ?? "active",
      verificationStatus: input.verificationStatus ?? "unverified",
      isAdmin: input.isAdmin ?? false,
      createdAt,
      updatedAt: createdAt,
    })
    .run();

  return id;
}

export function createTestProfile(
  userId: string,
  input: Partial<Omit<NewProfile, "userId">> = {},
): Profile {
  const createdAt = input.createdAt ?? nextTimestamp();
  return db
    .insert(profiles)
    .values({
      id: crypto.randomUUID(),
      ...input,
      userId,
      createdAt,
      updatedAt: createdAt,
    })
    .returning()
    .get();
}

export function createTestPreference(
  userId: string,
  input: Partial<Omit<NewSearchPreference, "userId">> = {},
): SearchPreference {
  return db
    .insert(searchPreferences)
    .values({
      id: crypto.randomUUID(),
      createdAt: nextTimestamp(),
      ...input,
      userId,
    })
    .returning()
    .get();
}

export function createTestInterest(
  fromUserId: string,
  toUserId: string,
  status: InterestStatus = "pending",
): void {
  db.insert(interests)
    .values({ id: crypto.randomUUID(), fromUserId, toUserId, status })
    .run();
}

export function createTestMatch(
  userAId: string,
  userBId: string,
  status: MatchStatus = "active",
): void {
  db.insert(matches)
    .values({ id: crypto.randomUUID(), userAId, userBId, status })
    .run();
}

export function createTestSelfie(
  userId: string,
  input: {
    embedding?: Float32Array | null;
    status?: SelfieStatus;
    filePath?: string;
  } = {},
): Selfie {
  const embedding = input.embedding ?? null;
  return db
    .insert(selfies)
    .values({
      id: crypto.randomUUID(),
      userId,
      filePath: input.filePath ?? `selfies/${userId}/selfie.jpg`,
      mimeType: "image/jpeg",
      fileSize: 1024,
      faceEmbedding: embedding ? serializeEmbedding(embedding) : null,
      status: input.status ?? (embedding ? "processed" : "pending"),
    })
    .returning()
    .get();
}

export function createTestVerification(input: {
  userId: string;
  documentType?: DocumentType;
  status?: VerificationStatus;
  filePath?: string;
  mimeType?: string;
  extractedData?: Record<string, unknown> | null;
}): Verification {
  const id = crypto.randomUUID();
  const submittedAt = nextTimestamp();
  return db
    .insert(verifications)
    .values({
      id,
      userId: input.userId,
      documentType: input.documentType ?? "passport",
      status: input.status ?? "pending",
      filePath:
        input.filePath ?? `verifications/${input.userId}/${id}/document.jpg`,
      mimeType: input.mimeType ?? "image/jpeg",
      fileSize: 2048,
      extractedData: input.extractedData ?? null,
      createdAt: submittedAt,
      submittedAt,
    })
    .returning()
    .get();
}
