import { sql } from "drizzle-orm";
import { index, sqliteTable, text } from "drizzle-orm/sqlite-core";

import { users } from "./users";

export const interestStatusEnum = [
  "pending",
  "accepted",
  "declined",
  "expired",
] as const;

export type InterestStatus = (typeof interestStatusEnum)[number];

export const matchStatusEnum = ["active", "unmatched"] as const;

export type MatchStatus = (typeof matchStatusEnum)[number];

export const interests = sqliteTable(
  "interests",
  {
    id: text("id").primaryKey(),
    fromUserId: text("from_user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    toUserId: text("to_user_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    status: text("status", { enum: interestStatusEnum })
      .notNull()
      .default("pending"),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
  },
  (table) => ({
    fromIdx: index("idx_interests_from").on(table.fromUserId),
    toIdx: index("idx_interests_to").on(table.toUserId),
  }),
);

export const matches = sqliteTable(
  "matches",
  {
    id: text("id").primaryKey(),
    userAId: text("user_a_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    userBId: text("user_b_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    status: text("status", { enum: matchStatusEnum })
      .notNull()
      .default("active"),
    createdAt: text("created_at").notNull().default(sql`(datetime('now'))`),
  },
  (table) => ({
    userAIdx: index("idx_matches_user_a").on(table.userAId),
    userBIdx: index("idx_matches_user_b").on(table.userBId),
  }),
);

export type Interest = typeof interests.$inferSelect;
export type Match = typeof matches.$inferSelect;
