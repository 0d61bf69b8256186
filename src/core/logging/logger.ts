// src/core/logging/logger.ts
import pino from "pino";

/**
 * Central logger for the service.
 * Only this module knows about pino; everything else imports `logger`.
 * Starts at "info"; the launcher applies the validated LOG_LEVEL.
 */
export const logger = pino({
  level: "info",
  base: { service: "personal-chat-backend" },
  timestamp: pino.stdTimeFunctions.isoTime,
});
