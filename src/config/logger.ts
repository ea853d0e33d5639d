import winston from "winston";
import { config } from "./index.js";

/**
 * Process-wide structured logger.
 *
 * Console transport is synchronous, so entries written just before a crash
 * still reach stdout. Never pass token material (access/refresh/id tokens,
 * code verifiers, authorization codes) in the meta object.
 */
export const logger = winston.createLogger({
  level: config.logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service: "relay-credential-core" },
  transports: [new winston.transports.Console()],
});
