import { desc } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { checkHistory } from "../db/schema/index.js";
import type { CheckHistoryEntry, CheckHistoryStatus, ICheckHistoryRepository } from "./check-history-repository.js";

const STATUSES: ReadonlySet<string> = new Set<CheckHistoryStatus>([
  "up_to_date",
  "update_available",
  "local_image",
  "failed",
  "ignored",
  "unknown",
]);

function isHistoryStatus(value: string): value is CheckHistoryStatus {
  return STATUSES.has(value);
}

export class DrizzleCheckHistoryRepository implements ICheckHistoryRepository {
  constructor(private readonly db: DrizzleDb) {}

  async logBatch(entries: readonly CheckHistoryEntry[]): Promise<void> {
    if (entries.length === 0) return;
    this.db.transaction((tx) => {
      tx.insert(checkHistory)
        .values(entries.map((e) => ({ ...e })))
        .run();
    });
  }

  async listRecent(limit: number): Promise<CheckHistoryEntry[]> {
    const rows = await this.db
      .select()
      .from(checkHistory)
      .orderBy(desc(checkHistory.checkedAt), desc(checkHistory.id))
      .limit(limit);
    return rows.map((r) => this.toEntry(r));
  }

  private toEntry(row: typeof checkHistory.$inferSelect): CheckHistoryEntry {
    return {
      checkedAt: row.checkedAt,
      containerName: row.containerName,
      image: row.image,
      currentVersion: row.currentVersion,
      latestVersion: row.latestVersion,
      status: isHistoryStatus(row.status) ? row.status : "unknown",
      error: row.error,
    };
  }
}
