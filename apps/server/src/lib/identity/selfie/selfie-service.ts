import type { Selfie, SelfieStatus } from "@/lib/db/schema";
import type { VerificationRuntime } from "@/lib/identity/verification/runtime";
import type { FileUpload } from "@/lib/storage/upload-validation";

import { v4 as uuidv4 } from "uuid";

import {
  deleteSelfieByUserId,
  getSelfieByUserId,
  updateSelfieProcessing,
  upsertSelfie,
} from "@/lib/db/queries/selfies";
import { getUserById } from "@/lib/db/queries/users";
import { serializeEmbedding } from "@/lib/identity/face/embedding";
import { extractPrimaryFace } from "@/lib/identity/face/face-metrics";
import {
  DocumentProcessingError,
  FaceDetectionError,
  logVerificationError,
  type VerificationError,
  VerificationStateError,
} from "@/lib/identity/verification-errors";
import { logError } from "@/lib/logging/error-logger";
import { logger } from "@/lib/logging/logger";
import { extensionFor } from "@/lib/storage/file-store";
import {
  assertValidUpload,
  SELFIE_MIME_TYPES,
} from "@/lib/storage/upload-validation";

const MIN_SELFIE_QUALITY = 0.3;

function requireSelfie(userId: string): Selfie {
  const selfie = getSelfieByUserId(userId);
  if (!selfie) {
    throw VerificationStateError.notFound("Selfie");
  }
  return selfie;
}

function markFailed(userId: string, error: VerificationError): void {
  logVerificationError(error, { userId });
  updateSelfieProcessing(userId, {
    status: "failed",
    errorMessage: error.message,
  });
}

/**
 * Extract and store the face embedding of the user's current selfie.
 * Expected problems end as a `failed` row carrying the reason.
 */
export async function processSelfie(
  userId: string,
  runtime: VerificationRuntime,
): Promise<Selfie> {
  const selfie = requireSelfie(userId);

  if (!(await runtime.files.exists(selfie.filePath))) {
    markFailed(userId, DocumentProcessingError.fileMissing());
    return requireSelfie(userId);
  }

  try {
    const image = await runtime.files.read(selfie.filePath);
    const face = await extractPrimaryFace(runtime.face, image);

    if (face.status === "unavailable") {
      markFailed(userId, FaceDetectionError.serviceUnavailable(face.reason));
    } else if (face.status === "no_face") {
      markFailed(userId, FaceDetectionError.noSelfieFace());
    } else if (face.faceCount > 1) {
      markFailed(userId, FaceDetectionError.multipleFaces());
    } else if (face.quality < MIN_SELFIE_QUALITY) {
      markFailed(userId, FaceDetectionError.lowQuality());
    } else {
      updateSelfieProcessing(userId, {
        status: "processed",
        faceEmbedding: serializeEmbedding(face.embedding),
        processedAt: runtime.now().toISOString(),
      });
      logger.info({ userId, quality: face.quality }, "Selfie processed");
    }
  } catch (error) {
    const fingerprint = logError(error, {
      userId,
      operation: "selfie.process",
    });
    updateSelfieProcessing(userId, {
      status: "failed",
      errorMessage: `Processing error (ref ${fingerprint})`,
    });
  }

  return requireSelfie(userId);
}

/**
 * Store a selfie, replacing any previous one, and process it right away.
 */
export async function uploadSelfie(
  userId: string,
  upload: FileUpload,
  runtime: VerificationRuntime,
): Promise<Selfie> {
  if (!getUserById(userId)) {
    throw VerificationStateError.notFound("User");
  }
  assertValidUpload(upload, SELFIE_MIME_TYPES, runtime.maxUploadBytes);

  const existing = getSelfieByUserId(userId);
  const filePath = await runtime.files.save(
    ["selfies", userId],
    `selfie${extensionFor(upload.mimeType, upload.fileName)}`,
    upload.bytes,
  );

  upsertSelfie({
    id: existing?.id ?? uuidv4(),
    userId,
    filePath,
    originalFilename: upload.fileName ?? null,
    mimeType: upload.mimeType,
    fileSize: upload.bytes.byteLength,
    createdAt: runtime.now().toISOString(),
  });

  if (existing && existing.filePath !== filePath) {
    await runtime.files.remove(existing.filePath);
  }

  return processSelfie(userId, runtime);
}

export async function deleteSelfie(
  userId: string,
  runtime: VerificationRuntime,
): Promise<void> {
  const selfie = requireSelfie(userId);
  await runtime.files.remove(selfie.filePath);
  deleteSelfieByUserId(userId);
}

export interface SelfieStatusView {
  hasSelfie: boolean;
  status: SelfieStatus | null;
  errorMessage: string | null;
  canVerifyPassport: boolean;
}

export function getSelfieStatus(userId: string): SelfieStatusView {
  const selfie = getSelfieByUserId(userId);
  if (!selfie) {
    return {
      hasSelfie: false,
      status: null,
      errorMessage: null,
      canVerifyPassport: false,
    };
  }
  return {
    hasSelfie: true,
    status: selfie.status,
    errorMessage: selfie.errorMessage,
    canVerifyPassport:
      selfie.status === "processed" && selfie.faceEmbedding !== null,
  };
}
