import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { openHistoryDb } from "./db/index.js";
import { DockerRuntimeClient } from "./docker/runtime-client.js";
import { RegistryManager } from "./registry/manager.js";
import { BackgroundChecker } from "./update/background-checker.js";
import type { ICheckHistoryRepository } from "./update/check-history-repository.js";
import { UpdateChecker } from "./update/checker.js";
import { DrizzleCheckHistoryRepository } from "./update/drizzle-check-history-repository.js";

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
  // Don't exit; a failed check must not take the API down
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  // The process is in an undefined state. Winston's Console transport is synchronous.
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

if (process.env.NODE_ENV !== "test") {
  const runtime = new DockerRuntimeClient();
  const registry = new RegistryManager({
    cacheTtlMs: config.registry.cacheTtlMs,
    timeoutMs: config.registry.timeoutMs,
    username: config.registry.username,
    password: config.registry.password,
  });

  let history: ICheckHistoryRepository | undefined;
  let closeHistory = () => {};
  if (config.historyDbPath) {
    const { sqlite, db } = openHistoryDb(config.historyDbPath);
    history = new DrizzleCheckHistoryRepository(db);
    closeHistory = () => sqlite.close();
    logger.info("Check history enabled", { path: config.historyDbPath });
  }

  const checker = new UpdateChecker({ runtime, registry, history, maxConcurrency: config.check.maxConcurrency });
  const background = new BackgroundChecker(checker, {
    intervalMs: config.check.intervalMs,
    timeoutMs: config.check.timeoutMs,
  });

  const app = createApp({
    checker,
    background,
    history,
    checkTimeoutMs: config.check.timeoutMs,
    isChecking: () => background.isRunning(),
  });

  const server = serve({ fetch: app.fetch, port: config.port }, () => {
    logger.info(`update-scout listening on http://0.0.0.0:${config.port}`);
  });
  background.start();

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    background.stop();
    server.close(() => {
      runtime
        .close()
        .catch((err: unknown) => logger.error("Failed to close runtime client", { error: String(err) }))
        .finally(() => {
          closeHistory();
          process.exit(0);
        });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}
