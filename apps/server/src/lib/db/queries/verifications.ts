import type {
  DocumentType,
  NewProfile,
  NewVerification,
  Verification,
  VerificationMethod,
  VerificationStatus,
} from "../schema";

import { and, count, desc, eq, inArray } from "drizzle-orm";

import { db } from "../connection";
import { profiles, users, verifications } from "../schema";

export type VerifiedProfileFields = Partial<
  Pick<
    NewProfile,
    | "verifiedFirstName"
    | "verifiedLastInitial"
    | "verifiedBirthDate"
    | "verifiedBirthplaceCountry"
    | "verifiedBirthplaceCity"
    | "verifiedNationality"
    | "verifiedResidenceCountry"
    | "verifiedResidenceStatus"
    | "verifiedMaritalStatus"
    | "verifiedEducationLevel"
  >
>;

export interface Page<T> {
  items: T[];
  total: number;
}

export function createVerification(data: NewVerification): Verification {
  return db.insert(verifications).values(data).returning().get();
}

export function getVerificationById(id: string): Verification | null {
  const row = db
    .select()
    .from(verifications)
    .where(eq(verifications.id, id))
    .get();
  return row ?? null;
}

export function listVerificationsByUser(
  userId: string,
  options: { status?: VerificationStatus; limit: number; offset: number },
): Page<Verification> {
  const where = options.status
    ? and(
        eq(verifications.userId, userId),
        eq(verifications.status, options.status),
      )
    : eq(verifications.userId, userId);

  const items = db
    .select()
    .from(verifications)
    .where(where)
    .orderBy(desc(verifications.createdAt), desc(verifications.id))
    .limit(options.limit)
    .offset(options.offset)
    .all();
  const totalRow = db
    .select({ total: count() })
    .from(verifications)
    .where(where)
    .get();

  return { items, total: totalRow?.total ?? 0 };
}

export function listVerificationsByStatus(
  statuses: readonly VerificationStatus[],
  options: { limit: number; offset: number },
): Page<Verification> {
  const where = inArray(verifications.status, [...statuses]);
  const items = db
    .select()
    .from(verifications)
    .where(where)
    .orderBy(desc(verifications.submittedAt), desc(verifications.id))
    .limit(options.limit)
    .offset(options.offset)
    .all();
  const totalRow = db
    .select({ total: count() })
    .from(verifications)
    .where(where)
    .get();

  return { items, total: totalRow?.total ?? 0 };
}

export function getDocumentTypesByStatus(
  userId: string,
  statuses: readonly VerificationStatus[],
): DocumentType[] {
  const rows = db
    .selectDistinct({ documentType: verifications.documentType })
    .from(verifications)
    .where(
      and(
        eq(verifications.userId, userId),
        inArray(verifications.status, [...statuses]),
      ),
    )
    .all();
  return rows.map((row) => row.documentType);
}

/**
 * Move a verification between statuses only if it is still in one of the
 * expected source statuses. Returns false when another writer got there first.
 */
export function transitionVerificationStatus(
  id: string,
  from: readonly VerificationStatus[],
  to: VerificationStatus,
  options: { userId?: string } = {},
): boolean {
  const conditions = [
    eq(verifications.id, id),
    inArray(verifications.status, [...from]),
  ];
  if (options.userId) {
    conditions.push(eq(verifications.userId, options.userId));
  }
  const result = db
    .update(verifications)
    .set({ status: to })
    .where(and(...conditions))
    .run();
  return result.changes > 0;
}

export interface VerificationOutcomeUpdate {
  status: VerificationStatus;
  extractedData?: Record<string, unknown> | null;
  rejectionReason?: string | null;
  verificationMethod?: VerificationMethod | null;
  verifiedBy?: string | null;
  verifiedAt?: string | null;
  documentExpiryDate?: string | null;
}

/**
 * Conditionally write an outcome to a verification still in one of `from`.
 */
export function recordVerificationOutcome(
  id: string,
  from: readonly VerificationStatus[],
  update: VerificationOutcomeUpdate,
): boolean {
  const result = db
    .update(verifications)
    .set(update)
    .where(
      and(eq(verifications.id, id), inArray(verifications.status, [...from])),
    )
    .run();
  return result.changes > 0;
}

/**
 * Approve a verification and copy its verified fields in one transaction:
 * verification row, profile fields and the owner's verification status.
 * Nothing is written unless the verification is still in one of `from`.
 */
export function approveVerificationRecord(input: {
  id: string;
  userId: string;
  from: readonly VerificationStatus[];
  extractedData: Record<string, unknown>;
  documentExpiryDate: string | null;
  method: VerificationMethod;
  verifiedBy: string | null;
  profileFields: VerifiedProfileFields;
  verifiedAt?: string;
}): boolean {
  const verifiedAt = input.verifiedAt ?? new Date().toISOString();

  return db.transaction((tx) => {
    const result = tx
      .update(verifications)
      .set({
        status: "approved",
        extractedData: input.extractedData,
        documentExpiryDate: input.documentExpiryDate,
        verificationMethod: input.method,
        verifiedBy: input.verifiedBy,
        verifiedAt,
        rejectionReason: null,
      })
      .where(
        and(
          eq(verifications.id, input.id),
          inArray(verifications.status, [...input.from]),
        ),
      )
      .run();
    if (result.changes === 0) {
      return false;
    }

    const hasProfileFields = Object.values(input.profileFields).some(
      (value) => value !== undefined,
    );
    // Only an existing profile is updated; approval never creates one
    if (hasProfileFields) {
      tx.update(profiles)
        .set({ ...input.profileFields, updatedAt: verifiedAt })
        .where(eq(profiles.userId, input.userId))
        .run();
    }

    tx.update(users)
      .set({
        verificationStatus: "verified",
        ...(input.documentExpiryDate !== null && {
          verificationExpiresAt: input.documentExpiryDate,
        }),
        updatedAt: verifiedAt,
      })
      .where(eq(users.id, input.userId))
      .run();

    return true;
  });
}

export function deleteVerificationById(id: string): void {
  db.delete(verifications).where(eq(verifications.id, id)).run();
}
