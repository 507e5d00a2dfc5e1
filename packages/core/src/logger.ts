import { ENV } from "./constants.js";
import type { Logger, LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

/** Level from GREENLIGHT_LOG_LEVEL, falling back to "info". */
export function logLevelFromEnv(env: Record<string, string | undefined> = process.env): LogLevel {
  const raw = env[ENV.LOG_LEVEL]?.toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

/**
 * Console-backed logger. Messages are prefixed "[greenlight:<scope>]".
 */
export function createLogger(scope: string, level: LogLevel = logLevelFromEnv()): Logger {
  const prefix = `[greenlight:${scope}]`;
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];

  return {
    debug(message, ...details) {
      if (enabled("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled("info")) console.info(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled("warn")) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled("error")) console.error(`${prefix} ${message}`, ...details);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, level);
    },
  };
}

/** Logger that drops everything (tests, embedding hosts with their own logging). */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
