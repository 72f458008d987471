import winston from "winston";

/**
 * Process-wide structured logger.
 *
 * Call as `logger.info(message, meta)`. The Console transport writes
 * synchronously, so a log line emitted right before `process.exit()` is kept.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "edge-proxy" },
  transports: [new winston.transports.Console()],
});
