import type { Page } from "@/lib/db/queries/verifications";
import type {
  DocumentType,
  Verification,
  VerificationStatus,
} from "@/lib/db/schema";
import type { FileUpload } from "@/lib/storage/upload-validation";
import type { AutoVerificationResult } from "./auto-verify";
import type { VerificationRuntime } from "./runtime";

import { v4 as uuidv4 } from "uuid";

import { getSelfieByUserId } from "@/lib/db/queries/selfies";
import { getUserById } from "@/lib/db/queries/users";
import {
  approveVerificationRecord,
  createVerification,
  deleteVerificationById,
  getDocumentTypesByStatus,
  getVerificationById,
  listVerificationsByStatus,
  listVerificationsByUser,
  recordVerificationOutcome,
  transitionVerificationStatus,
} from "@/lib/db/queries/verifications";
import { parseExtractedData } from "@/lib/identity/document/extracted-data";
import {
  VerificationInputError,
  VerificationStateError,
} from "@/lib/identity/verification-errors";
import { logger } from "@/lib/logging/logger";
import { extensionFor } from "@/lib/storage/file-store";
import {
  assertValidUpload,
  DOCUMENT_MIME_TYPES,
} from "@/lib/storage/upload-validation";

import { processVerificationSafely } from "./auto-verify";
import { mapToProfileFields } from "./field-mapping";
import { scheduleVerificationJob } from "./job-processor";

/** Statuses a reviewer can still decide on. */
const REVIEWABLE_STATUSES = [
  "pending",
  "processing",
  "manual_review",
] as const satisfies readonly VerificationStatus[];

const CANCELLABLE_STATUSES = [
  "pending",
  "processing",
] as const satisfies readonly VerificationStatus[];

const REPROCESSABLE_STATUSES = [
  "pending",
  "manual_review",
] as const satisfies readonly VerificationStatus[];

export const REQUIRED_DOCUMENTS: readonly DocumentType[] = ["passport"];

const MIN_REJECTION_REASON = 10;
const MAX_REJECTION_REASON = 1000;
const DEFAULT_PAGE_SIZE = 20;
const MAX_PAGE_SIZE = 100;

export interface SubmitVerificationInput extends FileUpload {
  documentType: DocumentType;
  documentCountry?: string | null;
}

function clampPage(options: { limit?: number; offset?: number }): {
  limit: number;
  offset: number;
} {
  const limit = Math.min(
    Math.max(Math.trunc(options.limit ?? DEFAULT_PAGE_SIZE), 1),
    MAX_PAGE_SIZE,
  );
  const offset = Math.max(Math.trunc(options.offset ?? 0), 0);
  return { limit, offset };
}

function requireVerification(id: string): Verification {
  const verification = getVerificationById(id);
  if (!verification) {
    throw VerificationStateError.notFound();
  }
  return verification;
}

function isOneOf<T extends string>(value: string, options: readonly T[]): value is T {
  return options.some((option) => option === value);
}

/**
 * Store an uploaded document and create its verification row.
 * With auto-verification on, the row is claimed to `processing` and a
 * background job is queued; the returned row reflects that status.
 */
export async function submitVerification(
  userId: string,
  input: SubmitVerificationInput,
  runtime: VerificationRuntime,
): Promise<Verification> {
  if (!getUserById(userId)) {
    throw VerificationStateError.notFound("User");
  }
  assertValidUpload(input, DOCUMENT_MIME_TYPES, runtime.maxUploadBytes);

  const id = uuidv4();
  const filePath = await runtime.files.save(
    ["verifications", userId, id],
    `document${extensionFor(input.mimeType, input.fileName)}`,
    input.bytes,
  );

  const submittedAt = runtime.now().toISOString();
  let verification: Verification;
  try {
    verification = createVerification({
      id,
      userId,
      documentType: input.documentType,
      documentCountry: input.documentCountry ?? null,
      status: "pending",
      filePath,
      originalFilename: input.fileName ?? null,
      mimeType: input.mimeType,
      fileSize: input.bytes.byteLength,
      createdAt: submittedAt,
      submittedAt,
    });
  } catch (error) {
    await runtime.files.remove(filePath);
    throw error;
  }

  logger.info(
    { verificationId: id, documentType: input.documentType },
    "Verification submitted",
  );

  if (
    runtime.settings().enabled &&
    transitionVerificationStatus(id, ["pending"], "processing")
  ) {
    scheduleVerificationJob(id, runtime);
    return { ...verification, status: "processing" };
  }
  return verification;
}

export interface VerificationPrerequisites {
  canAutoVerify: boolean;
  reason: string | null;
}

/**
 * Whether a document of this type can go through automated processing.
 * Passports need a processed selfie to compare against.
 */
export function checkVerificationPrerequisites(
  userId: string,
  documentType: DocumentType,
): VerificationPrerequisites {
  if (documentType !== "passport") {
    return {
      canAutoVerify: false,
      reason: "Only passports support auto-verification",
    };
  }

  const selfie = getSelfieByUserId(userId);
  if (!selfie) {
    return {
      canAutoVerify: false,
      reason: "Please upload a selfie first for identity verification",
    };
  }
  if (!selfie.faceEmbedding) {
    return {
      canAutoVerify: false,
      reason: "Selfie processing incomplete, please re-upload",
    };
  }
  if (selfie.status !== "processed") {
    return {
      canAutoVerify: false,
      reason: `Selfie status is ${selfie.status}, expected 'processed'`,
    };
  }
  return { canAutoVerify: true, reason: null };
}

export function listUserVerifications(
  userId: string,
  options: { status?: VerificationStatus; limit?: number; offset?: number } = {},
): Page<Verification> {
  return listVerificationsByUser(userId, {
    status: options.status,
    ...clampPage(options),
  });
}

/**
 * Verifications waiting on a reviewer, most recently submitted first.
 */
export function listReviewQueue(
  options: { limit?: number; offset?: number } = {},
): Page<Verification> {
  return listVerificationsByStatus(REVIEWABLE_STATUSES, clampPage(options));
}

export function getUserVerification(
  userId: string,
  verificationId: string,
): Verification {
  const verification = getVerificationById(verificationId);
  if (!verification || verification.userId !== userId) {
    throw VerificationStateError.notFound();
  }
  return verification;
}

/**
 * Owner-initiated cancellation. Loses to an orchestrator that already
 * moved the row past `processing`.
 */
export function cancelVerification(
  userId: string,
  verificationId: string,
): Verification {
  const verification = getUserVerification(userId, verificationId);
  const cancelled = transitionVerificationStatus(
    verificationId,
    CANCELLABLE_STATUSES,
    "cancelled",
    { userId },
  );
  if (!cancelled) {
    const current = getVerificationById(verificationId) ?? verification;
    throw VerificationStateError.transitionNotAllowed("cancel", current.status);
  }
  logger.info({ verificationId }, "Verification cancelled");
  return requireVerification(verificationId);
}

function requireReviewer(reviewerId: string, action: string): void {
  const reviewer = getUserById(reviewerId);
  if (!reviewer?.isAdmin) {
    throw VerificationStateError.forbidden(action);
  }
}

function expiryDateOf(data: object): string | null {
  return "expiry_date" in data && typeof data.expiry_date === "string"
    ? data.expiry_date
    : null;
}

export interface ApproveVerificationInput {
  /** Reviewer-corrected data; defaults to what was extracted */
  extractedData?: Record<string, unknown>;
  documentExpiryDate?: string | null;
}

/**
 * Manual approval. Copies the document's fields into the owner's profile
 * and marks the owner verified, exactly as automated approval does.
 */
export function approveVerification(
  verificationId: string,
  reviewerId: string,
  input: ApproveVerificationInput,
  runtime: VerificationRuntime,
): Verification {
  requireReviewer(reviewerId, "approve");
  const verification = requireVerification(verificationId);
  if (!isOneOf(verification.status, REVIEWABLE_STATUSES)) {
    throw VerificationStateError.transitionNotAllowed(
      "approve",
      verification.status,
    );
  }

  const parsed = parseExtractedData(
    verification.documentType,
    input.extractedData ?? verification.extractedData ?? {},
  );
  if (!parsed.success) {
    throw VerificationInputError.invalidExtractedData(parsed.error);
  }

  const approved = approveVerificationRecord({
    id: verificationId,
    userId: verification.userId,
    from: REVIEWABLE_STATUSES,
    extractedData: parsed.data,
    documentExpiryDate:
      input.documentExpiryDate ?? expiryDateOf(parsed.data),
    method: "manual",
    verifiedBy: reviewerId,
    profileFields: mapToProfileFields(verification.documentType, parsed.data),
    verifiedAt: runtime.now().toISOString(),
  });
  if (!approved) {
    const current = requireVerification(verificationId);
    throw VerificationStateError.transitionNotAllowed("approve", current.status);
  }

  logger.info(
    { verificationId, documentType: verification.documentType },
    "Verification approved by reviewer",
  );
  return requireVerification(verificationId);
}

export function rejectVerification(
  verificationId: string,
  reviewerId: string,
  reason: string,
  runtime: VerificationRuntime,
): Verification {
  const trimmed = reason.trim();
  if (
    trimmed.length < MIN_REJECTION_REASON ||
    trimmed.length > MAX_REJECTION_REASON
  ) {
    throw VerificationInputError.invalidRejectionReason();
  }
  requireReviewer(reviewerId, "reject");

  const verification = requireVerification(verificationId);
  const rejected = recordVerificationOutcome(
    verificationId,
    REVIEWABLE_STATUSES,
    {
      status: "rejected",
      rejectionReason: trimmed,
      verificationMethod: "manual",
      verifiedBy: reviewerId,
      verifiedAt: runtime.now().toISOString(),
    },
  );
  if (!rejected) {
    const current = getVerificationById(verificationId) ?? verification;
    throw VerificationStateError.transitionNotAllowed("reject", current.status);
  }

  logger.info({ verificationId }, "Verification rejected by reviewer");
  return requireVerification(verificationId);
}

/**
 * Re-run automated extraction on a document awaiting review.
 */
export async function reprocessVerification(
  verificationId: string,
  runtime: VerificationRuntime,
): Promise<AutoVerificationResult> {
  const verification = requireVerification(verificationId);
  const claimed = transitionVerificationStatus(
    verificationId,
    REPROCESSABLE_STATUSES,
    "processing",
  );
  if (!claimed) {
    throw VerificationStateError.transitionNotAllowed(
      "reprocess",
      verification.status,
    );
  }
  return processVerificationSafely(verificationId, runtime);
}

export type OverallVerificationStatus = "unverified" | "partial" | "verified";

export interface VerificationSummary {
  overallStatus: OverallVerificationStatus;
  verifiedDocuments: DocumentType[];
  pendingDocuments: DocumentType[];
  missingRequiredDocuments: DocumentType[];
  verificationExpiresAt: string | null;
}

export function getVerificationSummary(userId: string): VerificationSummary {
  const user = getUserById(userId);
  if (!user) {
    throw VerificationStateError.notFound("User");
  }

  const verifiedDocuments = getDocumentTypesByStatus(userId, ["approved"]);
  const pendingDocuments = getDocumentTypesByStatus(
    userId,
    REVIEWABLE_STATUSES,
  ).filter((type) => !verifiedDocuments.includes(type));
  const missingRequiredDocuments = REQUIRED_DOCUMENTS.filter(
    (type) =>
      !verifiedDocuments.includes(type) && !pendingDocuments.includes(type),
  );

  let overallStatus: OverallVerificationStatus;
  if (verifiedDocuments.length === 0) {
    overallStatus = "unverified";
  } else if (REQUIRED_DOCUMENTS.every((type) => verifiedDocuments.includes(type))) {
    overallStatus = "verified";
  } else {
    overallStatus = "partial";
  }

  return {
    overallStatus,
    verifiedDocuments,
    pendingDocuments,
    missingRequiredDocuments,
    verificationExpiresAt: user.verificationExpiresAt,
  };
}

/**
 * Remove a verification and its stored document.
 */
export async function deleteVerification(
  verificationId: string,
  runtime: VerificationRuntime,
): Promise<void> {
  const verification = requireVerification(verificationId);
  await runtime.files.remove(verification.filePath);
  deleteVerificationById(verificationId);
  logger.info({ verificationId }, "Verification deleted");
}
