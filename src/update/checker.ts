import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import type { Container, RuntimeClient } from "../docker/types.js";
import type { RegistryClient } from "../registry/types.js";
import type { CheckHistoryEntry, CheckHistoryStatus, ICheckHistoryRepository } from "./check-history-repository.js";
import { ContainerChecker } from "./container-check.js";
import { CheckCancelledError, ContainerListError } from "./errors.js";
import { type CheckOutcome, type CheckReport, type CheckStatus, type ContainerUpdate, emptyReport } from "./types.js";

export interface UpdateCheckerOptions {
  runtime: RuntimeClient;
  registry: RegistryClient;
  /** Receives one batch per complete run. */
  history?: ICheckHistoryRepository;
  /** Per-container checks in flight at once. */
  maxConcurrency?: number;
  now?: () => number;
}

const HISTORY_STATUS: Record<CheckStatus, CheckHistoryStatus> = {
  UP_TO_DATE: "up_to_date",
  UP_TO_DATE_PINNABLE: "up_to_date",
  UPDATE_AVAILABLE: "update_available",
  LOCAL_IMAGE: "local_image",
  IGNORED: "ignored",
  CHECK_FAILED: "failed",
};

/** Counters per status over the rows that completed. */
export function buildReport(totalChecked: number, updates: readonly ContainerUpdate[]): CheckReport {
  const report = { ...emptyReport(), totalChecked, updates: Object.freeze([...updates]) };
  for (const row of updates) {
    switch (row.status) {
      case "UPDATE_AVAILABLE":
        report.updatesFound++;
        break;
      case "UP_TO_DATE":
      case "UP_TO_DATE_PINNABLE":
        report.upToDate++;
        break;
      case "LOCAL_IMAGE":
        report.localImages++;
        break;
      case "IGNORED":
        report.ignored++;
        break;
      case "CHECK_FAILED":
        report.failed++;
        break;
    }
  }
  return report;
}

/** Resolves once `signal` aborts; `dispose` drops the listener. */
function whenAborted(signal: AbortSignal | undefined): { promise: Promise<void>; dispose: () => void } {
  if (!signal) return { promise: new Promise<void>(() => {}), dispose: () => {} };
  let onAbort = () => {};
  const promise = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return { promise, dispose: () => signal.removeEventListener("abort", onAbort) };
}

/**
 * Checks every container on the host for newer images.
 *
 * Containers are checked by a bounded pool of workers. The run can be cut
 * short through the AbortSignal: dispatching stops, rows completed so far are
 * returned and late results are dropped.
 */
export class UpdateChecker {
  private readonly runtime: RuntimeClient;
  private readonly checker: ContainerChecker;
  private readonly history?: ICheckHistoryRepository;
  private readonly maxConcurrency: number;
  private readonly now: () => number;

  constructor(opts: UpdateCheckerOptions) {
    this.runtime = opts.runtime;
    this.checker = new ContainerChecker(opts.runtime, opts.registry);
    this.history = opts.history;
    this.maxConcurrency = Math.max(1, opts.maxConcurrency ?? config.check.maxConcurrency);
    this.now = opts.now ?? (() => Date.now());
  }

  /** Never rejects. Listing failure and cancellation arrive in `error`. */
  async checkForUpdates(signal?: AbortSignal): Promise<CheckOutcome> {
    if (signal?.aborted) {
      return { report: emptyReport(), error: new CheckCancelledError(signal.reason) };
    }

    let containers: Container[];
    try {
      containers = await this.runtime.listContainers(signal);
    } catch (err) {
      if (signal?.aborted) return { report: emptyReport(), error: new CheckCancelledError(signal.reason) };
      const error = new ContainerListError(err);
      logger.error("Update check could not list containers", { error: error.message });
      return { report: emptyReport(), error };
    }

    if (containers.length === 0) {
      logger.info("Update check found no containers");
      return { report: emptyReport(), error: null };
    }

    const startedAt = this.now();
    const rows: ContainerUpdate[] = [];
    let dispatched = 0;
    let stopped = false;

    const worker = async () => {
      while (!stopped && !signal?.aborted && dispatched < containers.length) {
        const container = containers[dispatched++];
        const row = await this.checker.checkContainer(container, signal);
        if (stopped || signal?.aborted) return;
        rows.push(row);
      }
    };

    const workerCount = Math.min(this.maxConcurrency, containers.length);
    const pool = Promise.all(Array.from({ length: workerCount }, worker));
    const abort = whenAborted(signal);
    try {
      await Promise.race([pool, abort.promise]);
    } finally {
      stopped = true;
      abort.dispose();
    }

    const report = buildReport(dispatched, rows);
    if (signal?.aborted) {
      logger.warn("Update check cancelled", { dispatched, completed: rows.length, total: containers.length });
      return { report, error: new CheckCancelledError(signal.reason) };
    }

    logger.info("Update check complete", {
      totalChecked: report.totalChecked,
      updatesFound: report.updatesFound,
      upToDate: report.upToDate,
      localImages: report.localImages,
      ignored: report.ignored,
      failed: report.failed,
      durationMs: this.now() - startedAt,
    });
    await this.recordHistory(report.updates, startedAt);
    return { report, error: null };
  }

  private async recordHistory(rows: readonly ContainerUpdate[], checkedAt: number): Promise<void> {
    if (!this.history) return;
    const entries: CheckHistoryEntry[] = rows.map((row) => ({
      checkedAt,
      containerName: row.containerName,
      image: row.image,
      currentVersion: row.currentVersion,
      latestVersion: row.latestVersion,
      status: HISTORY_STATUS[row.status] ?? "unknown",
      error: row.error,
    }));
    try {
      await this.history.logBatch(entries);
    } catch (err) {
      logger.error("Failed to record check history", { error: err instanceof Error ? err.message : String(err) });
    }
  }
}
