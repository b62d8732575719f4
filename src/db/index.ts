import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { applySqlitePragmas } from "./pragmas.js";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/** Repositories accept this type; tests hand them an in-memory database. */
export type DrizzleDb = BetterSQLite3Database<Schema>;

const CHECK_HISTORY_DDL = `
  CREATE TABLE IF NOT EXISTS check_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    checked_at INTEGER NOT NULL,
    container_name TEXT NOT NULL,
    image TEXT NOT NULL,
    current_version TEXT NOT NULL DEFAULT '',
    latest_version TEXT NOT NULL DEFAULT '',
    status TEXT NOT NULL,
    error TEXT NOT NULL DEFAULT ''
  );
  CREATE INDEX IF NOT EXISTS idx_check_history_checked_at ON check_history(checked_at);
  CREATE INDEX IF NOT EXISTS idx_check_history_container ON check_history(container_name, checked_at);
`;

/** Create the tables if missing. Idempotent. */
export function initSchema(sqlite: Database.Database): void {
  sqlite.exec(CHECK_HISTORY_DDL);
}

/** Create a Drizzle database instance wrapping the given handle. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

/** Open (or create) the history database at `path`, ready for use. */
export function openHistoryDb(path: string): { sqlite: Database.Database; db: DrizzleDb } {
  const sqlite = new Database(path);
  applySqlitePragmas(sqlite);
  initSchema(sqlite);
  return { sqlite, db: createDb(sqlite) };
}

export { schema };
export { applySqlitePragmas };
