/**
 * Verification Error Types
 *
 * Custom error classes for identity verification flows.
 * Enables proper error discrimination between expected failures
 * (e.g., face not detected) and unexpected errors (e.g., engine crash).
 *
 * Error Hierarchy:
 * - VerificationError (base) - All verification-related errors
 *   - FaceDetectionError - Face detection and embedding failures
 *   - DocumentProcessingError - MRZ/PDF failures and missing files
 *   - VerificationInputError - Rejected uploads and reviewer input
 *   - VerificationStateError - Missing rows and disallowed transitions
 */

import { logger } from "@/lib/logging/logger";

interface VerificationErrorOptions {
  isExpected?: boolean;
  cause?: unknown;
}

/**
 * Base error for all verification-related failures.
 * Contains an issue code for programmatic handling.
 */
export class VerificationError extends Error {
  readonly issueCode: string;
  readonly isExpected: boolean;

  constructor(
    message: string,
    issueCode: string,
    options?: VerificationErrorOptions,
  ) {
    super(message, { cause: options?.cause });
    this.name = "VerificationError";
    this.issueCode = issueCode;
    this.isExpected = options?.isExpected ?? false;
  }
}

/**
 * Face detection and matching errors.
 */
export class FaceDetectionError extends VerificationError {
  constructor(
    message: string,
    issueCode: string,
    options?: VerificationErrorOptions,
  ) {
    super(message, issueCode, options);
    this.name = "FaceDetectionError";
  }

  static noSelfieFace(): FaceDetectionError {
    return new FaceDetectionError(
      "No face detected in image",
      "no_selfie_face",
      { isExpected: true },
    );
  }

  static noDocumentFace(cause?: unknown): FaceDetectionError {
    return new FaceDetectionError(
      "Could not detect face in passport photo",
      "no_document_face",
      { isExpected: cause === undefined, cause },
    );
  }

  static noSelfieEmbedding(cause?: unknown): FaceDetectionError {
    return new FaceDetectionError(
      "No selfie uploaded for face comparison",
      "no_selfie_embedding",
      { isExpected: true, cause },
    );
  }

  static multipleFaces(): FaceDetectionError {
    return new FaceDetectionError(
      "Multiple faces detected, please upload a photo with only your face",
      "multiple_faces",
      { isExpected: true },
    );
  }

  static lowQuality(): FaceDetectionError {
    return new FaceDetectionError(
      "Face quality too low, please upload a clearer photo",
      "face_quality_low",
      { isExpected: true },
    );
  }

  static serviceUnavailable(cause?: unknown): FaceDetectionError {
    return new FaceDetectionError(
      "Face recognition service not available",
      "face_service_unavailable",
      { isExpected: true, cause },
    );
  }
}

/**
 * Document OCR and processing errors.
 */
export class DocumentProcessingError extends VerificationError {
  constructor(
    message: string,
    issueCode: string,
    options?: VerificationErrorOptions,
  ) {
    super(message, issueCode, options);
    this.name = "DocumentProcessingError";
  }

  static mrzNotFound(): DocumentProcessingError {
    return new DocumentProcessingError(
      "Could not extract valid MRZ from passport",
      "mrz_not_found",
      { isExpected: true },
    );
  }

  static pdfConversionFailed(cause?: unknown): DocumentProcessingError {
    return new DocumentProcessingError(
      "Could not convert PDF to image",
      "pdf_conversion_failed",
      { isExpected: true, cause },
    );
  }

  static fileMissing(): DocumentProcessingError {
    return new DocumentProcessingError(
      "File not found",
      "file_missing",
      { isExpected: true },
    );
  }
}

/**
 * Input rejected before any processing or state change.
 */
export class VerificationInputError extends VerificationError {
  constructor(message: string, issueCode: string) {
    super(message, issueCode, { isExpected: true });
    this.name = "VerificationInputError";
  }

  static unsupportedMimeType(
    mimeType: string,
    allowed: readonly string[],
  ): VerificationInputError {
    return new VerificationInputError(
      `File type ${mimeType} not allowed. Allowed: ${allowed.join(", ")}`,
      "unsupported_file_type",
    );
  }

  static fileTooLarge(maxBytes: number): VerificationInputError {
    const maxMb = Math.round((maxBytes / (1024 * 1024)) * 10) / 10;
    return new VerificationInputError(
      `File too large. Maximum size: ${maxMb}MB`,
      "file_too_large",
    );
  }

  static emptyFile(): VerificationInputError {
    return new VerificationInputError("Uploaded file is empty", "empty_file");
  }

  static invalidRejectionReason(): VerificationInputError {
    return new VerificationInputError(
      "Rejection reason must be between 10 and 1000 characters",
      "invalid_rejection_reason",
    );
  }

  static invalidExtractedData(details: string): VerificationInputError {
    return new VerificationInputError(
      `Extracted data does not match document type: ${details}`,
      "invalid_extracted_data",
    );
  }

  static invalidSettings(details: string): VerificationInputError {
    return new VerificationInputError(
      `Invalid auto-verification settings: ${details}`,
      "invalid_settings",
    );
  }
}

/**
 * Record lookups and lifecycle transitions that cannot proceed.
 */
export class VerificationStateError extends VerificationError {
  constructor(message: string, issueCode: string) {
    super(message, issueCode, { isExpected: true });
    this.name = "VerificationStateError";
  }

  static notFound(entity = "Verification"): VerificationStateError {
    return new VerificationStateError(`${entity} not found`, "not_found");
  }

  static transitionNotAllowed(
    action: string,
    status: string,
  ): VerificationStateError {
    return new VerificationStateError(
      `Cannot ${action} verification with status: ${status}`,
      "transition_not_allowed",
    );
  }

  static forbidden(action: string): VerificationStateError {
    return new VerificationStateError(
      `Not allowed to ${action} this verification`,
      "forbidden",
    );
  }
}

/**
 * Log verification error with appropriate level based on whether it's expected.
 * Expected errors (e.g., no face detected) are logged as warnings.
 * Unexpected errors (e.g., engine crash) are logged as errors.
 */
export function logVerificationError(
  error: VerificationError,
  context?: Record<string, unknown>,
): void {
  const logData = {
    errorType: error.name,
    issueCode: error.issueCode,
    isExpected: error.isExpected,
    ...context,
    ...(error.cause ? { cause: String(error.cause) } : {}),
  };

  if (error.isExpected) {
    logger.warn(logData, error.message);
  } else {
    logger.error(logData, error.message);
  }
}

