import { Hono } from "hono";
import { z } from "zod";
import type { BackgroundChecker } from "../../update/background-checker.js";
import type { ICheckHistoryRepository } from "../../update/check-history-repository.js";
import type { UpdateChecker } from "../../update/checker.js";
import { ContainerListError } from "../../update/errors.js";
import { planBatchRollback, resolveRollbackVersion } from "../../update/rollback.js";

export interface UpdateRouteDeps {
  checker: Pick<UpdateChecker, "checkForUpdates">;
  background: Pick<BackgroundChecker, "getLastResult">;
  history?: ICheckHistoryRepository;
  /** Deadline for a check started through the API (ms). */
  checkTimeoutMs: number;
}

const MAX_HISTORY_LIMIT = 500;

const batchContainerDetailSchema = z.object({
  oldVersion: z.string().default(""),
  newVersion: z.string().default(""),
  oldResolvedVersion: z.string().default(""),
  newResolvedVersion: z.string().default(""),
  oldDigest: z.string().default(""),
  newDigest: z.string().default(""),
});

const rollbackPlanSchema = z.object({
  containers: z.record(z.string().min(1), batchContainerDetailSchema),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_HISTORY_LIMIT).default(50),
});

export function createUpdateRoutes(deps: UpdateRouteDeps): Hono {
  const routes = new Hono();

  /** Run a check now. 503 when the container runtime could not be listed. */
  routes.get("/check", async (c) => {
    const signal = AbortSignal.any([c.req.raw.signal, AbortSignal.timeout(deps.checkTimeoutMs)]);
    const { report, error } = await deps.checker.checkForUpdates(signal);
    const status = error instanceof ContainerListError ? 503 : 200;
    return c.json({ report, error: error?.message ?? null }, status);
  });

  /** Last background run. */
  routes.get("/status", (c) => {
    const last = deps.background.getLastResult();
    if (!last) return c.json({ error: "No update check has completed yet" }, 404);
    return c.json({
      report: last.outcome.report,
      error: last.outcome.error?.message ?? null,
      lastCheckedAt: last.checkedAt,
    });
  });

  routes.get("/history", async (c) => {
    if (!deps.history) return c.json({ error: "Check history is not enabled" }, 404);
    const parsed = historyQuerySchema.safeParse({ limit: c.req.query("limit") });
    if (!parsed.success) {
      return c.json({ error: "Validation failed", details: parsed.error.flatten() }, 400);
    }
    const entries = await deps.history.listRecent(parsed.data.limit);
    return c.json({ entries });
  });

  routes.post("/rollback/resolve", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }

    const parsed = batchContainerDetailSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "Validation failed", details: parsed.error.flatten() }, 400);
    }
    return c.json(resolveRollbackVersion(parsed.data));
  });

  /** Rollback targets for every container of an update batch. */
  routes.post("/rollback/plan", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }

    const parsed = rollbackPlanSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: "Validation failed", details: parsed.error.flatten() }, 400);
    }
    return c.json(planBatchRollback(parsed.data.containers));
  });

  return routes;
}
