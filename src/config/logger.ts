import winston from "winston";
import { config } from "./index.js";

/**
 * Shared process logger.
 *
 * Call style is `logger.info(message, meta)`; meta is merged into the JSON line.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === "test",
  defaultMeta: { service: "snapshot-lifecycle" },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: [new winston.transports.Console()],
});
