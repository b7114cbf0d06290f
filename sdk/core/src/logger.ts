import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

/**
 * Root logger for the SDK. Level comes from LOG_LEVEL unless overridden.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: "saledesk",
    level: process.env.LOG_LEVEL || "info",
    ...options,
  });
}
