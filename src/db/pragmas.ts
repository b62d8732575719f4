import type Database from "better-sqlite3";

/**
 * Pragmas for the history database. WAL lets the API read history while a
 * check run writes; busy_timeout waits up to 5 s for the write lock instead
 * of failing with SQLITE_BUSY.
 */
export function applySqlitePragmas(sqlite: Database.Database): void {
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
}
