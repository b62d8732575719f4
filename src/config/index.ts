import { z } from "zod";

const configSchema = z.object({
  port: z.coerce.number().default(3200),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Docker daemon connection. */
  docker: z
    .object({
      socketPath: z.string().min(1).default("/var/run/docker.sock"),
    })
    .default({ socketPath: "/var/run/docker.sock" }),

  /** Update check run settings. */
  check: z
    .object({
      /** Upper bound on per-container checks in flight at once. */
      maxConcurrency: z.coerce.number().int().min(1).max(64).default(8),
      /** Deadline for a whole run started by the API or the background checker (ms). */
      timeoutMs: z.coerce.number().int().min(1000).default(120_000),
      /** Background check interval (ms). 0 disables the background checker. */
      intervalMs: z.coerce.number().int().min(0).default(0),
    })
    .default({ maxConcurrency: 8, timeoutMs: 120_000, intervalMs: 0 }),

  /** Registry client settings. */
  registry: z
    .object({
      cacheTtlMs: z.coerce.number().int().min(0).default(15 * 60 * 1000),
      timeoutMs: z.coerce.number().int().min(1000).default(30_000),
      username: z.string().optional(),
      password: z.string().optional(),
    })
    .default({ cacheTtlMs: 15 * 60 * 1000, timeoutMs: 30_000 }),

  /** SQLite file for check history. Unset keeps history out of the picture. */
  historyDbPath: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

/** Build a config from an env-like record. Exported for tests. */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    docker: {
      socketPath: env.DOCKER_SOCKET_PATH,
    },
    check: {
      maxConcurrency: env.CHECK_MAX_CONCURRENCY,
      timeoutMs: env.CHECK_TIMEOUT_MS,
      intervalMs: env.CHECK_INTERVAL_MS,
    },
    registry: {
      cacheTtlMs: env.REGISTRY_CACHE_TTL_MS,
      timeoutMs: env.REGISTRY_TIMEOUT_MS,
      username: env.REGISTRY_USERNAME || undefined,
      password: env.REGISTRY_PASSWORD || undefined,
    },
    historyDbPath: env.HISTORY_DB_PATH || undefined,
  });
}

export const config = Object.freeze(loadConfig(process.env));
