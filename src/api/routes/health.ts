import { Hono } from "hono";

export interface HealthDeps {
  /** Whether a check run is in flight. Omitted when no background checker runs. */
  isChecking?: () => boolean;
}

// Public and unauthenticated; used by container healthchecks and monitoring.
export function createHealthRoutes(deps: HealthDeps = {}): Hono {
  const routes = new Hono();

  routes.get("/", (c) => {
    const health: { status: string; service: string; checking?: boolean } = {
      status: "ok",
      service: "update-scout",
    };
    if (deps.isChecking) health.checking = deps.isChecking();
    return c.json(health);
  });

  return routes;
}
