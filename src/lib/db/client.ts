import fs from "fs";
import path from "path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

export type SourcingDatabase = BetterSQLite3Database<typeof schema>;

const SCHEMA_PATH = path.resolve(process.cwd(), "db/schema.sql");

/**
 * Open (or create) the SQLite database and apply db/schema.sql.
 * Pass ":memory:" for an in-process database.
 */
export function createDatabase(databaseUrl: string): { db: SourcingDatabase; sqlite: Database.Database } {
  if (databaseUrl !== ":memory:") {
    fs.mkdirSync(path.dirname(path.resolve(databaseUrl)), { recursive: true });
  }

  const sqlite = new Database(databaseUrl);
  sqlite.pragma("foreign_keys = ON");
  if (databaseUrl !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }

  sqlite.exec(fs.readFileSync(SCHEMA_PATH, "utf-8"));

  return { db: drizzle(sqlite, { schema }), sqlite };
}
