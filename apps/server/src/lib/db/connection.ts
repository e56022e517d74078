import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";

import { getServerConfig } from "@/lib/env";
import { logger } from "@/lib/logging/logger";

import * as schema from "./schema";

const SCHEMA_SQL_PATH = fileURLToPath(new URL("./schema.sql", import.meta.url));

function ensureDatabaseDirExists(dbPath: string) {
  if (dbPath === ":memory:") return;
  const dbDir = path.dirname(dbPath);
  if (dbDir !== "." && !fs.existsSync(dbDir)) {
    fs.mkdirSync(dbDir, { recursive: true });
  }
}

function applyPragma(sqlite: Database.Database, pragma: string) {
  try {
    sqlite.pragma(pragma);
  } catch (error) {
    // Best-effort: read-only filesystems reject journal changes
    logger.warn({ pragma, error: String(error) }, "SQLite pragma not applied");
  }
}

function applyPragmas(sqlite: Database.Database) {
  applyPragma(sqlite, "journal_mode = WAL");
  applyPragma(sqlite, "synchronous = NORMAL");
  applyPragma(sqlite, "foreign_keys = ON");
  applyPragma(sqlite, "busy_timeout = 5000");
}

function applySchema(sqlite: Database.Database) {
  sqlite.exec(fs.readFileSync(SCHEMA_SQL_PATH, "utf8"));
}

/**
 * Open the database at `dbPath` with pragmas and the schema applied.
 * Modules share the single `db` handle below.
 */
function openDatabase(dbPath: string): Database.Database {
  ensureDatabaseDirExists(dbPath);
  const sqlite = new Database(dbPath);
  applyPragmas(sqlite);
  applySchema(sqlite);
  return sqlite;
}

export const db = drizzle(openDatabase(getServerConfig().DATABASE_PATH), {
  schema,
});
