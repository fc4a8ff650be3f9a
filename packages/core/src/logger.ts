/**
 * Console logging gated by the configured level.
 *
 * Messages are written as `[equasets/<scope>] LEVEL: message`.
 */

import { config, type LogLevel } from "./config.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const SEVERITY: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

/**
 * The effective level: "debug" when debug mode is on, else `log.level`,
 * falling back to "warn" for unrecognised values.
 */
export function currentLogLevel(): LogLevel {
  if (config.has("debug")) return "debug";
  const level = config.get("log.level");
  return isLogLevel(level) ? level : "warn";
}

export function isLevelEnabled(level: Exclude<LogLevel, "silent">): boolean {
  return SEVERITY[level] <= SEVERITY[currentLogLevel()];
}

export function createLogger(scope: string): Logger {
  const prefix = `[equasets/${scope}]`;
  return {
    debug(message) {
      if (isLevelEnabled("debug")) console.debug(`${prefix} DEBUG: ${message}`);
    },
    info(message) {
      if (isLevelEnabled("info")) console.info(`${prefix} INFO: ${message}`);
    },
    warn(message) {
      if (isLevelEnabled("warn")) console.warn(`${prefix} WARN: ${message}`);
    },
    error(message) {
      if (isLevelEnabled("error")) console.error(`${prefix} ERROR: ${message}`);
    },
  };
}
