import { sql } from "drizzle-orm";
import {
  blob,
  index,
  integer,
  sqliteTable,
  text,
} from "drizzle-orm/sqlite-core";

import { users } from "./users";

export const documentTypeEnum = [
  "passport",
  "residence_permit",
  "divorce_certificate",
  "diploma",
  "employment_proof",
] as const;

export type DocumentType = (typeof documentTypeEnum)[number];

export const verificationStatusEnum = [
  "pending",
  "processing",
  "manual_review",
  "approved",
  "rejected",
  "expired",
  "cancelled",
] as const;

export type VerificationStatus = (typeof verificationStatusEnum)[number];

export const verificationMethodEnum = ["automated", "manual"] as const;

export type VerificationMethod = (typeof verificationMethodEnum)[number];

export const selfieStatusEnum = ["pending", "processed", "failed"] as const;

export type SelfieStatus = (typeof selfieStatusEnum)[number];

export const verifications = sqliteTable(
  "verifications",
  {
    id: text("id").primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    documentType: text("document_type", { enum: documentTypeEnum }).notNull(),
    documentCountry: text("document_country"),
    status: text("status", { enum: verificationStatusEnum })
      .notNull()
      .default("pending"),
    rejectionReason: text("rejection_reason"),
    extractedData: text("extracted_data", { mode: "json" }).$type<
      Record<string, unknown>
    >(),
    documentExpiryDate: text("document_expiry_date"),
    filePath: text("file_path").notNull(),
    originalFilename: text("original_filename"),
    mimeType: text("mime_type").notNull(),
    fileSize: integer("file_size").notNull(),
    verificationMethod: text("verification_method", {
      enum: verificationMethodEnum,
    }),
    verifiedBy: text("verified_by").references(() => users.id, {
      onDelete: "set null",
    }),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
    submittedAt: text("submitted_at"),
    verifiedAt: text("verified_at"),
  },
  (table) => ({
    userIdIdx: index("idx_verifications_user_id").on(table.userId),
    statusIdx: index("idx_verifications_status").on(table.status),
  }),
);

export const selfies = sqliteTable("selfies", {
  id: text("id").primaryKey(),
  userId: text("user_id")
    .notNull()
    .unique()
    .references(() => users.id, { onDelete: "cascade" }),
  filePath: text("file_path").notNull(),
  originalFilename: text("original_filename"),
  mimeType: text("mime_type").notNull(),
  fileSize: integer("file_size").notNull(),
  faceEmbedding: blob("face_embedding", { mode: "buffer" }),
  status: text("status", { enum: selfieStatusEnum })
    .notNull()
    .default("pending"),
  errorMessage: text("error_message"),
  createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
  processedAt: text("processed_at"),
});

export type Verification = typeof verifications.$inferSelect;
export type NewVerification = typeof verifications.$inferInsert;
export type Selfie = typeof selfies.$inferSelect;
export type NewSelfie = typeof selfies.$inferInsert;
