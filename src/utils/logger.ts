/**
 * Structured logger. One pino root, one child per module.
 */

import { pino, type Logger } from "pino";

const level = process.env.LOG_LEVEL ?? "info";

export const logger = pino({
  level,
  base: { service: "toolgate" },
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: ["token", "password", "authorization", "apiKey"],
});

export type { Logger };

export function createLogger(name: string): Logger {
  return logger.child({ module: name });
}
