import { sql } from "drizzle-orm";
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

import { users } from "./users";

export const searchPreferences = sqliteTable("search_preferences", {
  id: text("id").primaryKey(),
  userId: text("user_id")
    .notNull()
    .unique()
    .references(() => users.id, { onDelete: "cascade" }),
  minAge: integer("min_age").notNull().default(18),
  maxAge: integer("max_age").notNull().default(99),
  preferredCountries: text("preferred_countries", { mode: "json" }).$type<
    string[]
  >(),
  preferredCities: text("preferred_cities", { mode: "json" }).$type<
    string[]
  >(),
  willingToRelocate: integer("willing_to_relocate", { mode: "boolean" })
    .notNull()
    .default(false),
  relocationCountries: text("relocation_countries", { mode: "json" }).$type<
    string[]
  >(),
  preferredEthnicities: text("preferred_ethnicities", { mode: "json" }).$type<
    string[]
  >(),
  preferredMaritalStatuses: text("preferred_marital_statuses", {
    mode: "json",
  }).$type<string[]>(),
  preferredEducationLevels: text("preferred_education_levels", {
    mode: "json",
  }).$type<string[]>(),
  preferredReligiousPractices: text("preferred_religious_practices", {
    mode: "json",
  }).$type<string[]>(),
  minHeightCm: integer("min_height_cm"),
  maxHeightCm: integer("max_height_cm"),
  preferredSmoking: text("preferred_smoking", { mode: "json" }).$type<
    string[]
  >(),
  preferredAlcohol: text("preferred_alcohol", { mode: "json" }).$type<
    string[]
  >(),
  preferredDiet: text("preferred_diet", { mode: "json" }).$type<string[]>(),
  mustBeVerified: integer("must_be_verified", { mode: "boolean" })
    .notNull()
    .default(true),
  hasChildrenAcceptable: integer("has_children_acceptable", {
    mode: "boolean",
  })
    .notNull()
    .default(true),
  childrenPreference: text("children_preference"),
  createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
  updatedAt: text("updated_at").notNull().default(sql`(datetime('now'))`),
});

export type SearchPreference = typeof searchPreferences.$inferSelect;
export type NewSearchPreference = typeof searchPreferences.$inferInsert;
