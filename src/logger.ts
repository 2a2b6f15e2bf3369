// ---------------------------------------------------------------------------
// Barte SDK – Logging
// ---------------------------------------------------------------------------
// Structured logging on pino. The SDK stays silent unless BARTE_LOG_LEVEL is
// set or the caller injects their own pino logger.
// ---------------------------------------------------------------------------

import pino, { type Logger } from "pino";

export type { Logger };

const SERVICE_NAME = "barte-node";

/** Paths scrubbed from every log line. */
const REDACTED_PATHS = [
  'headers["X-Token-Api"]',
  "config.apiKey",
  "apiKey",
];

/** Build the default SDK logger. */
export function createLogger(
  level: string = process.env.BARTE_LOG_LEVEL ?? "silent",
): Logger {
  return pino({
    level,
    base: { service: SERVICE_NAME },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
  });
}
