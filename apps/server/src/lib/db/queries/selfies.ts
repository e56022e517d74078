import type { NewSelfie, Selfie, SelfieStatus } from "../schema";

import { eq } from "drizzle-orm";

import { db } from "../connection";
import { selfies } from "../schema";

export function getSelfieByUserId(userId: string): Selfie | null {
  const row = db.select().from(selfies).where(eq(selfies.userId, userId)).get();
  return row ?? null;
}

/**
 * Insert the user's selfie, or replace the existing row in place.
 * Replacing resets processing state and discards the stored embedding.
 */
export function upsertSelfie(
  data: Omit<NewSelfie, "status" | "faceEmbedding" | "errorMessage">,
): Selfie {
  return db
    .insert(selfies)
    .values({ ...data, status: "pending", faceEmbedding: null })
    .onConflictDoUpdate({
      target: selfies.userId,
      set: {
        filePath: data.filePath,
        originalFilename: data.originalFilename ?? null,
        mimeType: data.mimeType,
        fileSize: data.fileSize,
        faceEmbedding: null,
        status: "pending",
        errorMessage: null,
        processedAt: null,
        createdAt: data.createdAt ?? new Date().toISOString(),
      },
    })
    .returning()
    .get();
}

export function updateSelfieProcessing(
  userId: string,
  data: {
    status: SelfieStatus;
    faceEmbedding?: Buffer | null;
    errorMessage?: string | null;
    processedAt?: string | null;
  },
): void {
  db.update(selfies)
    .set({
      status: data.status,
      faceEmbedding: data.faceEmbedding ?? null,
      errorMessage: data.errorMessage ?? null,
      processedAt: data.processedAt ?? null,
    })
    .where(eq(selfies.userId, userId))
    .run();
}

export function deleteSelfieByUserId(userId: string): void {
  db.delete(selfies).where(eq(selfies.userId, userId)).run();
}
