// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

/** Scoped console logger with a process-wide threshold (`logging.level`). */

import chalk from "chalk";

import type { LogLevel } from "../types.js";

const RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

let threshold: LogLevel = "INFO";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = chalk.dim(`[novelseek:${scope}]`);
  const enabled = (level: LogLevel) => RANK[level] >= RANK[threshold];

  return {
    debug(message) {
      if (enabled("DEBUG")) console.debug(`${prefix} ${message}`);
    },
    info(message) {
      if (enabled("INFO")) console.info(`${prefix} ${message}`);
    },
    warn(message) {
      if (enabled("WARNING")) console.warn(`${prefix} ${chalk.yellow(message)}`);
    },
    error(message) {
      if (enabled("ERROR")) console.error(`${prefix} ${chalk.red(message)}`);
    },
  };
}
