import type { DocumentType } from "@/lib/db/schema";
import type { IdentityRecord } from "./mrz";

import z from "zod";

import { countryNameForCode } from "./country";
import {
  detectDocumentType,
  extractDates,
  extractNames,
  type DetectedDocumentType,
} from "./text-extraction";

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const passportDataSchema = z.object({
  first_name: z.string().min(1),
  last_name: z.string().min(1),
  birth_date: isoDate.nullable().optional(),
  expiry_date: isoDate.nullable().optional(),
  nationality: z.string().optional(),
  document_number: z.string().optional(),
  sex: z.string().optional(),
  country: z.string().optional(),
  birth_place: z.string().optional(),
  mrz_valid: z.boolean().optional(),
});

export const residencePermitDataSchema = z.object({
  country: z.string().min(1),
  status: z.string().min(1),
  expiry_date: isoDate.nullable().optional(),
  document_number: z.string().optional(),
});

export const divorceCertificateDataSchema = z.object({
  divorce_date: z.string().optional(),
  certificate_number: z.string().optional(),
  issuing_authority: z.string().optional(),
});

export const diplomaDataSchema = z.object({
  institution: z.string().optional(),
  degree: z.string().min(1),
  field: z.string().optional(),
  graduation_date: z.string().optional(),
});

export const employmentProofDataSchema = z.object({
  employer: z.string().min(1),
  position: z.string().optional(),
  start_date: z.string().optional(),
});

export interface ExtractedDataByType {
  passport: z.infer<typeof passportDataSchema>;
  residence_permit: z.infer<typeof residencePermitDataSchema>;
  divorce_certificate: z.infer<typeof divorceCertificateDataSchema>;
  diploma: z.infer<typeof diplomaDataSchema>;
  employment_proof: z.infer<typeof employmentProofDataSchema>;
}

export type ExtractedDataFor<K extends DocumentType> = ExtractedDataByType[K];

const extractedDataSchemas: {
  [K in DocumentType]: z.ZodType<ExtractedDataByType[K], z.ZodTypeDef, unknown>;
} = {
  passport: passportDataSchema,
  residence_permit: residencePermitDataSchema,
  divorce_certificate: divorceCertificateDataSchema,
  diploma: diplomaDataSchema,
  employment_proof: employmentProofDataSchema,
};

export type ExtractedDataParseResult<K extends DocumentType> =
  | { success: true; data: ExtractedDataFor<K> }
  | { success: false; error: string };

/**
 * Validate approved extracted data against its document type's shape.
 * Unknown keys are dropped.
 */
export function parseExtractedData<K extends DocumentType>(
  documentType: K,
  raw: unknown,
): ExtractedDataParseResult<K> {
  const parsed = extractedDataSchemas[documentType].safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "data"}: ${issue.message}`)
        .join("; "),
    };
  }
  return { success: true, data: parsed.data };
}

export function identityRecordToPassportData(
  record: IdentityRecord,
): ExtractedDataFor<"passport"> {
  return {
    first_name: record.firstName,
    last_name: record.lastName,
    birth_date: record.birthDate,
    expiry_date: record.expiryDate,
    nationality: countryNameForCode(record.nationality),
    document_number: record.documentNumber,
    sex: record.sex,
    country: countryNameForCode(record.issuingCountry),
    mrz_valid: record.valid,
  };
}

/** Data kept for a reviewer when no structured fields could be trusted. */
export interface OcrReviewData {
  raw_text: string | null;
  detected_type: DetectedDocumentType;
  found_dates: string[];
  found_names: Partial<Record<"first_name" | "last_name", string>>;
  [key: string]: unknown;
}

export const PASSPORT_RAW_TEXT_LIMIT = 1000;
export const DOCUMENT_RAW_TEXT_LIMIT = 2000;

export function buildOcrReviewData(
  text: string | null,
  rawTextLimit: number,
): OcrReviewData {
  const content = text?.trim() ?? "";
  return {
    raw_text: content ? content.slice(0, rawTextLimit) : null,
    detected_type: detectDocumentType(content),
    found_dates: extractDates(content),
    found_names: extractNames(content),
  };
}
