import { logger } from "../config/logger.js";
import type { UpdateChecker } from "./checker.js";
import type { CheckOutcome } from "./types.js";

export interface LastCheck {
  outcome: CheckOutcome;
  /** ISO timestamp of when the run finished. */
  checkedAt: string;
}

export interface BackgroundCheckerOptions {
  /** Time between runs (ms). 0 or less leaves the checker idle. */
  intervalMs: number;
  /** Deadline for a single run (ms). */
  timeoutMs: number;
}

/**
 * Runs update checks on an interval and keeps the last outcome in memory.
 * A tick that lands while a run is still in flight is skipped.
 */
export class BackgroundChecker {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<LastCheck> | null = null;
  private controller: AbortController | null = null;
  private last: LastCheck | null = null;

  constructor(
    private readonly checker: Pick<UpdateChecker, "checkForUpdates">,
    private readonly opts: BackgroundCheckerOptions,
  ) {}

  start(): void {
    if (this.timer) return;
    if (this.opts.intervalMs <= 0) {
      logger.info("Background update checks disabled");
      return;
    }
    void this.tick();
    this.timer = setInterval(() => void this.tick(), this.opts.intervalMs);
    logger.info("Background update checks started", { intervalMs: this.opts.intervalMs });
  }

  /** Stop scheduling and cancel the run in flight, if any. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info("Background update checks stopped");
    }
    this.controller?.abort(new Error("background checker stopped"));
  }

  /** Run a check now, or join the one already running. */
  triggerCheck(): Promise<LastCheck> {
    if (this.inFlight) return this.inFlight;

    const controller = new AbortController();
    const signal = AbortSignal.any([controller.signal, AbortSignal.timeout(this.opts.timeoutMs)]);
    this.controller = controller;
    this.inFlight = this.checker
      .checkForUpdates(signal)
      .then((outcome) => {
        const last = { outcome, checkedAt: new Date().toISOString() };
        this.last = last;
        return last;
      })
      .finally(() => {
        this.inFlight = null;
        this.controller = null;
      });
    return this.inFlight;
  }

  getLastResult(): LastCheck | null {
    return this.last;
  }

  isRunning(): boolean {
    return this.inFlight !== null;
  }

  private async tick(): Promise<void> {
    if (this.inFlight) {
      logger.debug("Previous update check still running, skipping tick");
      return;
    }
    const { outcome } = await this.triggerCheck();
    if (outcome.error) logger.warn("Background update check incomplete", { error: outcome.error.message });
  }
}
