import { sql } from "drizzle-orm";
import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const userStatusEnum = ["active", "suspended", "deleted"] as const;

export type UserStatus = (typeof userStatusEnum)[number];

export const userVerificationStatusEnum = [
  "unverified",
  "pending",
  "verified",
  "expired",
] as const;

export type UserVerificationStatus =
  (typeof userVerificationStatusEnum)[number];

export const genderEnum = ["male", "female"] as const;

export type Gender = (typeof genderEnum)[number];

export const users = sqliteTable(
  "users",
  {
    id: text("id").primaryKey(),
    email: text("email").notNull().unique(),
    status: text("status", { enum: userStatusEnum })
      .notNull()
      .default("active"),
    verificationStatus: text("verification_status", {
      enum: userVerificationStatusEnum,
    })
      .notNull()
      .default("unverified"),
    verificationExpiresAt: text("verification_expires_at"),
    isAdmin: integer("is_admin", { mode: "boolean" }).notNull().default(false),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
    updatedAt: text("updated_at").notNull().default(sql`(datetime('now'))`),
  },
  (table) => ({
    statusIdx: index("idx_users_status").on(table.status),
  }),
);

export const profiles = sqliteTable(
  "profiles",
  {
    id: text("id").primaryKey(),
    userId: text("user_id")
      .notNull()
      .unique()
      .references(() => users.id, { onDelete: "cascade" }),

    // Fields copied from approved documents
    verifiedFirstName: text("verified_first_name"),
    verifiedLastInitial: text("verified_last_initial"),
    verifiedBirthDate: text("verified_birth_date"),
    verifiedBirthplaceCountry: text("verified_birthplace_country"),
    verifiedBirthplaceCity: text("verified_birthplace_city"),
    verifiedNationality: text("verified_nationality"),
    verifiedResidenceCountry: text("verified_residence_country"),
    verifiedResidenceStatus: text("verified_residence_status"),
    verifiedMaritalStatus: text("verified_marital_status"),
    verifiedEducationLevel: text("verified_education_level"),

    gender: text("gender", { enum: genderEnum }),
    seekingGender: text("seeking_gender", { enum: genderEnum }),
    heightCm: integer("height_cm"),
    ethnicity: text("ethnicity"),
    currentCity: text("current_city"),
    religiousPractice: text("religious_practice"),
    smoking: text("smoking"),
    alcohol: text("alcohol"),
    diet: text("diet"),
    isVisible: integer("is_visible", { mode: "boolean" })
      .notNull()
      .default(true),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
    updatedAt: text("updated_at").notNull().default(sql`(datetime('now'))`),
  },
  (table) => ({
    genderIdx: index("idx_profiles_gender").on(table.gender),
  }),
);

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type Profile = typeof profiles.$inferSelect;
export type NewProfile = typeof profiles.$inferInsert;
