import winston from "winston";

/**
 * Process-wide logger. JSON lines with an ISO timestamp; the level comes from
 * LOG_LEVEL so that importing the logger never pulls in the full config.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "update-scout" },
  transports: [new winston.transports.Console()],
  silent: process.env.NODE_ENV === "test",
});
