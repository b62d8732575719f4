import { describe, expect, it, vi } from "vitest";
import type { BackgroundChecker } from "../update/background-checker.js";
import type { UpdateChecker } from "../update/checker.js";
import { emptyReport } from "../update/types.js";
import { createApp, errorHandler } from "./app.js";

function makeApp() {
  return createApp({
    checker: {
      checkForUpdates: vi.fn<UpdateChecker["checkForUpdates"]>().mockResolvedValue({ report: emptyReport(), error: null }),
    },
    background: { getLastResult: vi.fn<BackgroundChecker["getLastResult"]>().mockReturnValue(null) },
    checkTimeoutMs: 5000,
    isChecking: () => false,
  });
}

describe("app", () => {
  it("mounts the health route", async () => {
    const res = await makeApp().request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", service: "update-scout", checking: false });
  });

  it("mounts the update routes under /api", async () => {
    const res = await makeApp().request("/api/check");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ error: null, report: { totalChecked: 0 } });
  });

  it("sets security headers", async () => {
    const res = await makeApp().request("/health");
    expect(res.headers.get("X-Content-Type-Options")).toBe("nosniff");
  });

  it("returns JSON 404 for unknown paths", async () => {
    const res = await makeApp().request("/nope");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });

  it("turns thrown errors into a 500", async () => {
    const app = makeApp();
    app.get("/boom", () => {
      throw new Error("kaboom");
    });
    app.onError(errorHandler);

    const res = await app.request("/boom");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    });
  });
});
