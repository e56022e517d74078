import { VerificationInputError } from "@/lib/identity/verification-errors";

export interface FileUpload {
  bytes: Buffer;
  mimeType: string;
  fileName?: string | null;
}

export const DOCUMENT_MIME_TYPES = [
  "image/jpeg",
  "image/png",
  "application/pdf",
] as const;

export const SELFIE_MIME_TYPES = ["image/jpeg", "image/png"] as const;

/**
 * Reject an upload before anything is written.
 */
export function assertValidUpload(
  upload: FileUpload,
  allowedMimeTypes: readonly string[],
  maxBytes: number,
): void {
  if (!allowedMimeTypes.includes(upload.mimeType)) {
    throw VerificationInputError.unsupportedMimeType(
      upload.mimeType,
      allowedMimeTypes,
    );
  }
  if (upload.bytes.byteLength === 0) {
    throw VerificationInputError.emptyFile();
  }
  if (upload.bytes.byteLength > maxBytes) {
    throw VerificationInputError.fileTooLarge(maxBytes);
  }
}
