/**
 * Automated document verification.
 *
 * Passports run MRZ extraction, selfie lookup, passport face extraction,
 * face comparison and a threshold decision. Each step returns a tagged
 * outcome; anything short of a confident decision lands in `pending` for a
 * reviewer with whatever data was extracted. Other document types are
 * OCR'd for the reviewer and never decided automatically.
 *
 * Every write is conditional on the row still being `processing`, so a
 * concurrent cancellation wins over a late result.
 */
import type { Verification } from "@/lib/db/schema";
import type { ExtractedDataFor } from "@/lib/identity/document/extracted-data";
import type { FaceEmbedding } from "@/lib/identity/face/embedding";
import type { PrimaryFaceOutcome } from "@/lib/identity/face/face-metrics";
import type { VerificationRuntime } from "./runtime";

import { getSelfieByUserId } from "@/lib/db/queries/selfies";
import {
  approveVerificationRecord,
  getVerificationById,
  recordVerificationOutcome,
  transitionVerificationStatus,
} from "@/lib/db/queries/verifications";
import {
  buildOcrReviewData,
  DOCUMENT_RAW_TEXT_LIMIT,
  identityRecordToPassportData,
  PASSPORT_RAW_TEXT_LIMIT,
  parseExtractedData,
} from "@/lib/identity/document/extracted-data";
import { readPassportMrz } from "@/lib/identity/document/mrz-reader";
import { compareEmbeddings, deserializeEmbedding } from "@/lib/identity/face/embedding";
import { extractPrimaryFace } from "@/lib/identity/face/face-metrics";
import {
  DocumentProcessingError,
  FaceDetectionError,
  logVerificationError,
  type VerificationError,
} from "@/lib/identity/verification-errors";
import { logError } from "@/lib/logging/error-logger";
import { createJobLogger, type Logger } from "@/lib/logging/logger";

import { mapToProfileFields } from "./field-mapping";

export interface AutoVerificationResult {
  autoVerified: boolean;
  confidence: number;
  extractedData: Record<string, unknown>;
  failureReason: string | null;
  needsManualReview: boolean;
  faceMatchScore: number | null;
}

type StepOutcome<T> =
  | { kind: "ok"; value: T }
  | {
      kind: "review";
      reason: string;
      extractedData: Record<string, unknown>;
      confidence: number;
      issue?: VerificationError;
    };

const NON_PASSPORT_CONFIDENCE = 0.3;
const IDENTITY_UNCONFIRMED_CONFIDENCE = 0.5;
const PDF_MIME_TYPE = "application/pdf";
const MAX_DOCUMENT_PAGES = 5;

function ok<T>(value: T): StepOutcome<T> {
  return { kind: "ok", value };
}

function review(
  issue: VerificationError,
  extractedData: Record<string, unknown>,
  confidence = 0,
): StepOutcome<never> {
  return { kind: "review", reason: issue.message, extractedData, confidence, issue };
}

function failure(
  reason: string,
  options: { needsManualReview?: boolean; extractedData?: Record<string, unknown> } = {},
): AutoVerificationResult {
  return {
    autoVerified: false,
    confidence: 0,
    extractedData: options.extractedData ?? {},
    failureReason: reason,
    needsManualReview: options.needsManualReview ?? false,
    faceMatchScore: null,
  };
}

interface PipelineContext {
  verification: Verification;
  runtime: VerificationRuntime;
  log: Logger;
}

const STALE_RESULT_REASON = "Verification is no longer processing";

/**
 * Park the verification in `pending` for a reviewer, keeping the data.
 */
function sendToManualReview(
  ctx: PipelineContext,
  outcome: Extract<StepOutcome<unknown>, { kind: "review" }>,
  faceMatchScore: number | null = null,
): AutoVerificationResult {
  const stored = recordVerificationOutcome(ctx.verification.id, ["processing"], {
    status: "pending",
    extractedData: outcome.extractedData,
  });
  if (!stored) {
    return failure(STALE_RESULT_REASON);
  }
  if (outcome.issue) {
    logVerificationError(outcome.issue, { verificationId: ctx.verification.id });
  }
  ctx.log.info({ reason: outcome.reason }, "Verification routed to manual review");
  return {
    autoVerified: false,
    confidence: outcome.confidence,
    extractedData: outcome.extractedData,
    failureReason: outcome.reason,
    needsManualReview: true,
    faceMatchScore,
  };
}

async function recognizeText(
  ctx: PipelineContext,
  images: readonly Buffer[],
): Promise<string | null> {
  const parts: string[] = [];
  for (const image of images) {
    const outcome = await ctx.runtime.ocr.recognize(image, { mode: "text" });
    if (outcome.status === "unavailable") {
      ctx.log.warn({ reason: outcome.reason }, "OCR not available");
      return null;
    }
    parts.push(outcome.text);
  }
  const text = parts.join("\n").trim();
  return text || null;
}

async function loadDocumentImages(
  ctx: PipelineContext,
  bytes: Buffer,
  maxPages: number,
): Promise<StepOutcome<Buffer[]>> {
  if (ctx.verification.mimeType !== PDF_MIME_TYPE) {
    return ok([bytes]);
  }
  const rendered = await ctx.runtime.pdf.rasterize(bytes, { maxPages });
  if (rendered.status === "failed") {
    return review(
      DocumentProcessingError.pdfConversionFailed(rendered.reason),
      buildOcrReviewData(null, PASSPORT_RAW_TEXT_LIMIT),
    );
  }
  return ok(rendered.pages);
}

async function extractPassportData(
  ctx: PipelineContext,
  image: Buffer,
): Promise<StepOutcome<ExtractedDataFor<"passport">>> {
  const mrz = await readPassportMrz(ctx.runtime.ocr, image);
  if (mrz.status === "ok" && mrz.record.valid) {
    const parsed = parseExtractedData("passport", identityRecordToPassportData(mrz.record));
    if (parsed.success) {
      return ok(parsed.data);
    }
    ctx.log.warn({ error: parsed.error }, "MRZ data incomplete");
  }

  // Invalid or missing MRZ never reaches an automatic decision
  const text = await recognizeText(ctx, [image]);
  const extractedData: Record<string, unknown> = {
    ...buildOcrReviewData(text, PASSPORT_RAW_TEXT_LIMIT),
    mrz_data: mrz.status === "ok" ? identityRecordToPassportData(mrz.record) : null,
  };
  return review(DocumentProcessingError.mrzNotFound(), extractedData);
}

function loadSelfieEmbedding(
  ctx: PipelineContext,
  passportData: ExtractedDataFor<"passport">,
): StepOutcome<FaceEmbedding> {
  const selfie = getSelfieByUserId(ctx.verification.userId);
  if (!selfie?.faceEmbedding || selfie.status !== "processed") {
    return review(
      FaceDetectionError.noSelfieEmbedding(),
      passportData,
      IDENTITY_UNCONFIRMED_CONFIDENCE,
    );
  }
  try {
    return ok(deserializeEmbedding(selfie.faceEmbedding));
  } catch (error) {
    return review(
      FaceDetectionError.noSelfieEmbedding(error),
      passportData,
      IDENTITY_UNCONFIRMED_CONFIDENCE,
    );
  }
}

async function extractPassportFace(
  ctx: PipelineContext,
  image: Buffer,
  passportData: ExtractedDataFor<"passport">,
): Promise<StepOutcome<FaceEmbedding>> {
  let outcome: PrimaryFaceOutcome;
  try {
    outcome = await extractPrimaryFace(ctx.runtime.face, image);
  } catch (error) {
    // MRZ identity is already known; keep it for the reviewer
    return review(
      FaceDetectionError.noDocumentFace(error),
      passportData,
      IDENTITY_UNCONFIRMED_CONFIDENCE,
    );
  }
  switch (outcome.status) {
    case "ok":
      return ok(outcome.embedding);
    case "unavailable":
      return review(
        FaceDetectionError.serviceUnavailable(outcome.reason),
        passportData,
        IDENTITY_UNCONFIRMED_CONFIDENCE,
      );
    case "no_face":
      return review(
        FaceDetectionError.noDocumentFace(),
        passportData,
        IDENTITY_UNCONFIRMED_CONFIDENCE,
      );
  }
}

function decide(
  ctx: PipelineContext,
  passportData: ExtractedDataFor<"passport">,
  score: number,
): AutoVerificationResult {
  const { approveThreshold, rejectThreshold } = ctx.runtime.settings();
  const { verification } = ctx;
  const formatted = score.toFixed(2);

  if (score >= approveThreshold) {
    const approved = approveVerificationRecord({
      id: verification.id,
      userId: verification.userId,
      from: ["processing"],
      extractedData: passportData,
      documentExpiryDate: passportData.expiry_date ?? null,
      method: "automated",
      verifiedBy: null,
      profileFields: mapToProfileFields("passport", passportData),
      verifiedAt: ctx.runtime.now().toISOString(),
    });
    if (!approved) {
      return failure(STALE_RESULT_REASON);
    }
    ctx.log.info({ faceMatchScore: score }, "Passport auto-approved");
    return {
      autoVerified: true,
      confidence: score,
      extractedData: passportData,
      failureReason: null,
      needsManualReview: false,
      faceMatchScore: score,
    };
  }

  if (score <= rejectThreshold) {
    const rejected = recordVerificationOutcome(verification.id, ["processing"], {
      status: "rejected",
      extractedData: passportData,
      rejectionReason: `Face match score too low (${formatted}). Possible identity mismatch.`,
      verificationMethod: "automated",
      verifiedAt: ctx.runtime.now().toISOString(),
    });
    if (!rejected) {
      return failure(STALE_RESULT_REASON);
    }
    ctx.log.info({ faceMatchScore: score }, "Passport auto-rejected");
    return {
      autoVerified: false,
      confidence: score,
      extractedData: passportData,
      failureReason: `Face match score too low: ${formatted}`,
      needsManualReview: false,
      faceMatchScore: score,
    };
  }

  return sendToManualReview(
    ctx,
    {
      kind: "review",
      reason: `Face match score uncertain (${formatted}), needs manual review`,
      extractedData: passportData,
      confidence: score,
    },
    score,
  );
}

async function processPassport(
  ctx: PipelineContext,
  bytes: Buffer,
): Promise<AutoVerificationResult> {
  const images = await loadDocumentImages(ctx, bytes, 1);
  if (images.kind === "review") return sendToManualReview(ctx, images);
  const [image] = images.value;
  if (!image) {
    return sendToManualReview(
      ctx,
      { kind: "review", reason: "Could not convert PDF to image", extractedData: {}, confidence: 0 },
    );
  }

  const passport = await extractPassportData(ctx, image);
  if (passport.kind === "review") return sendToManualReview(ctx, passport);

  const selfie = loadSelfieEmbedding(ctx, passport.value);
  if (selfie.kind === "review") return sendToManualReview(ctx, selfie);

  const documentFace = await extractPassportFace(ctx, image, passport.value);
  if (documentFace.kind === "review") return sendToManualReview(ctx, documentFace);

  const score = compareEmbeddings(documentFace.value, selfie.value);
  return decide(ctx, passport.value, score);
}

async function processOtherDocument(
  ctx: PipelineContext,
  bytes: Buffer,
): Promise<AutoVerificationResult> {
  const images = await loadDocumentImages(ctx, bytes, MAX_DOCUMENT_PAGES);
  const text = images.kind === "ok" ? await recognizeText(ctx, images.value) : null;

  return sendToManualReview(ctx, {
    kind: "review",
    reason: text
      ? "Non-passport documents require manual review"
      : "Could not extract text from document",
    extractedData: buildOcrReviewData(text, DOCUMENT_RAW_TEXT_LIMIT),
    confidence: NON_PASSPORT_CONFIDENCE,
  });
}

/**
 * Run automated verification for a verification in `processing`.
 * Expected extraction problems are results, not errors; unexpected
 * failures propagate to the caller.
 */
export async function processVerification(
  verificationId: string,
  runtime: VerificationRuntime,
): Promise<AutoVerificationResult> {
  if (!runtime.settings().enabled) {
    // A claimed row must not stay in processing
    transitionVerificationStatus(verificationId, ["processing"], "pending");
    return failure("Auto-verification is disabled", { needsManualReview: true });
  }

  const verification = getVerificationById(verificationId);
  if (!verification) {
    return failure("Verification not found");
  }
  if (verification.status !== "processing") {
    return failure(
      `Verification is not in processing state (status: ${verification.status})`,
    );
  }

  const ctx: PipelineContext = {
    verification,
    runtime,
    log: createJobLogger(verification.id, {
      documentType: verification.documentType,
    }),
  };

  if (!(await runtime.files.exists(verification.filePath))) {
    return sendToManualReview(ctx, {
      kind: "review",
      reason: "Document file not found",
      extractedData: {},
      confidence: 0,
    });
  }
  const bytes = await runtime.files.read(verification.filePath);

  return verification.documentType === "passport"
    ? processPassport(ctx, bytes)
    : processOtherDocument(ctx, bytes);
}

/**
 * `processVerification` with failure isolation: unexpected errors are
 * logged with the verification id and the row goes back to `pending`.
 */
export async function processVerificationSafely(
  verificationId: string,
  runtime: VerificationRuntime,
): Promise<AutoVerificationResult> {
  try {
    return await processVerification(verificationId, runtime);
  } catch (error) {
    const fingerprint = logError(error, {
      verificationId,
      operation: "verification.process",
    });
    transitionVerificationStatus(verificationId, ["processing"], "pending");
    return failure(
      `Automatic processing failed (ref ${fingerprint}); queued for manual review`,
      { needsManualReview: true },
    );
  }
}
