import { Hono } from "hono";
import { secureHeaders } from "hono/secure-headers";
import { logger } from "../config/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createUpdateRoutes, type UpdateRouteDeps } from "./routes/updates.js";

export interface AppDeps extends UpdateRouteDeps {
  isChecking?: () => boolean;
}

export const errorHandler: Parameters<Hono["onError"]>[0] = (err, c) => {
  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.use("/*", secureHeaders());
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    logger.debug("Request handled", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
    });
  });

  app.route("/health", createHealthRoutes({ isChecking: deps.isChecking }));
  app.route("/api", createUpdateRoutes(deps));

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError(errorHandler);

  return app;
}
