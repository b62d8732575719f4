import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BackgroundChecker } from "./background-checker.js";
import type { UpdateChecker } from "./checker.js";
import { CheckCancelledError } from "./errors.js";
import { type CheckOutcome, emptyReport } from "./types.js";

function okOutcome(totalChecked = 0): CheckOutcome {
  return { report: { ...emptyReport(), totalChecked }, error: null };
}

function fakeChecker() {
  return { checkForUpdates: vi.fn<UpdateChecker["checkForUpdates"]>().mockResolvedValue(okOutcome()) };
}

describe("BackgroundChecker", () => {
  let checker: ReturnType<typeof fakeChecker>;
  let background: BackgroundChecker;

  describe("scheduling", () => {
    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date("2026-03-01T12:00:00Z"));
      checker = fakeChecker();
      background = new BackgroundChecker(checker, { intervalMs: 1000, timeoutMs: 60_000 });
    });

    afterEach(() => {
      background.stop();
      vi.useRealTimers();
    });

    it("checks on start and then on every interval", async () => {
      background.start();
      expect(checker.checkForUpdates).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(1000);
      expect(checker.checkForUpdates).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(1000);
      expect(checker.checkForUpdates).toHaveBeenCalledTimes(3);
    });

    it("keeps the last outcome with its time", async () => {
      expect(background.getLastResult()).toBeNull();
      checker.checkForUpdates.mockResolvedValue(okOutcome(4));

      background.start();
      await vi.advanceTimersByTimeAsync(0);

      expect(background.getLastResult()).toEqual({
        outcome: okOutcome(4),
        checkedAt: "2026-03-01T12:00:00.000Z",
      });
    });

    it("skips ticks while a run is in flight", async () => {
      let finish: (outcome: CheckOutcome) => void = () => {};
      checker.checkForUpdates.mockImplementationOnce(
        () =>
          new Promise<CheckOutcome>((resolve) => {
            finish = resolve;
          }),
      );

      background.start();
      expect(background.isRunning()).toBe(true);
      await vi.advanceTimersByTimeAsync(2500);
      expect(checker.checkForUpdates).toHaveBeenCalledTimes(1);

      finish(okOutcome());
      await vi.advanceTimersByTimeAsync(500);
      expect(checker.checkForUpdates).toHaveBeenCalledTimes(2);
    });

    it("stops scheduling and cancels the run in flight", async () => {
      let seen: AbortSignal | undefined;
      checker.checkForUpdates.mockImplementationOnce((signal) => {
        seen = signal;
        return new Promise<CheckOutcome>(() => {});
      });

      background.start();
      background.stop();
      await vi.advanceTimersByTimeAsync(5000);

      expect(seen?.aborted).toBe(true);
      expect(checker.checkForUpdates).toHaveBeenCalledTimes(1);
    });

    it("joins a run that is already going", async () => {
      const first = background.triggerCheck();
      const second = background.triggerCheck();

      expect(second).toBe(first);
      await first;
      expect(checker.checkForUpdates).toHaveBeenCalledTimes(1);
    });

    it("stays idle when the interval is zero", async () => {
      const idle = new BackgroundChecker(checker, { intervalMs: 0, timeoutMs: 60_000 });

      idle.start();
      await vi.advanceTimersByTimeAsync(10_000);

      expect(checker.checkForUpdates).not.toHaveBeenCalled();
    });
  });

  it("cancels a run that exceeds the timeout", async () => {
    checker = fakeChecker();
    checker.checkForUpdates.mockImplementation(
      (signal) =>
        new Promise<CheckOutcome>((resolve) => {
          signal?.addEventListener("abort", () =>
            resolve({ report: emptyReport(), error: new CheckCancelledError(new Error("timed out")) }),
          );
        }),
    );
    background = new BackgroundChecker(checker, { intervalMs: 0, timeoutMs: 20 });

    const { outcome } = await background.triggerCheck();

    expect(outcome.error).toBeInstanceOf(CheckCancelledError);
    expect(background.getLastResult()?.outcome).toBe(outcome);
  });
});
