import { destination, pino, type Level } from "pino";

const LEVELS: readonly Level[] = ["fatal", "error", "warn", "info", "debug", "trace"];

export function isLogLevel(value: string): value is Level {
  return LEVELS.some((level) => level === value);
}

// Diagnostics go to stderr; stdout is reserved for command results.
export const logger = pino(
  {
    level: "warn",
    base: { app: "airhound" },
    formatters: {
      level: (label) => ({ level: label }),
    },
  },
  destination({ dest: 2, sync: true }),
);

export function setLogLevel(level: Level): void {
  logger.level = level;
}
