import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/**
 * One row per container per complete update check run. Rows of a run share
 * `checked_at`.
 */
export const checkHistory = sqliteTable(
  "check_history",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    checkedAt: integer("checked_at").notNull(),
    containerName: text("container_name").notNull(),
    image: text("image").notNull(),
    currentVersion: text("current_version").notNull().default(""),
    latestVersion: text("latest_version").notNull().default(""),
    status: text("status").notNull(),
    error: text("error").notNull().default(""),
  },
  (table) => [
    index("idx_check_history_checked_at").on(table.checkedAt),
    index("idx_check_history_container").on(table.containerName, table.checkedAt),
  ],
);
