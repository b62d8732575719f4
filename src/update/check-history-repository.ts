/** Storage form of a check status. */
export type CheckHistoryStatus = "up_to_date" | "update_available" | "local_image" | "failed" | "ignored" | "unknown";

/** One checked container of one run. */
export interface CheckHistoryEntry {
  /** Run start, epoch ms. */
  checkedAt: number;
  containerName: string;
  image: string;
  currentVersion: string;
  latestVersion: string;
  status: CheckHistoryStatus;
  error: string;
}

export interface ICheckHistoryRepository {
  /** Write all entries of a run, or none of them. */
  logBatch(entries: readonly CheckHistoryEntry[]): Promise<void>;
  /** Newest first. */
  listRecent(limit: number): Promise<CheckHistoryEntry[]>;
}
