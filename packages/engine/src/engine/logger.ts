// ─── Logger ────────────────────────────────────────────────────────
// Diagnostics go to the console, filtered by the configured level.

import type { LogLevel } from "../types/index";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  silent: 3,
};

/** Console-backed logger that drops messages below `level`. */
export function createConsoleLogger(level: LogLevel = "warn"): Logger {
  const enabled = (messageLevel: Exclude<LogLevel, "silent">): boolean =>
    LEVEL_RANK[messageLevel] >= LEVEL_RANK[level];

  return {
    debug(message) {
      if (enabled("debug")) console.debug(message);
    },
    info(message) {
      if (enabled("info")) console.info(message);
    },
    warn(message) {
      if (enabled("warn")) console.warn(message);
    },
  };
}

export const silentLogger: Logger = createConsoleLogger("silent");
