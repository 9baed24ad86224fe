/**
 * Logger - system-tagged console logging
 *
 * Every line is prefixed with the name of the subsystem that wrote it,
 * e.g. `[Quadtree] Cleared 12 nodes`.
 *
 * The initial level comes from the `SPATIAL_LOG_LEVEL` environment variable
 * when running under Node, and defaults to `info`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function initialLevel(): LogLevel {
  if (typeof process !== "undefined" && process.env?.SPATIAL_LOG_LEVEL) {
    const level = process.env.SPATIAL_LOG_LEVEL.toLowerCase();
    if (isLogLevel(level)) {
      return level;
    }
  }
  return "info";
}

let currentLevel: LogLevel = initialLevel();

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export const Logger = {
  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  systemDebug(system: string, message: string): void {
    if (enabled("debug")) {
      console.debug(`[${system}] ${message}`);
    }
  },

  system(system: string, message: string): void {
    if (enabled("info")) {
      console.info(`[${system}] ${message}`);
    }
  },

  systemWarn(system: string, message: string): void {
    if (enabled("warn")) {
      console.warn(`[${system}] ${message}`);
    }
  },

  systemError(system: string, message: string, error?: Error): void {
    if (!enabled("error")) return;
    if (error) {
      console.error(`[${system}] ${message}`, error);
    } else {
      console.error(`[${system}] ${message}`);
    }
  },
};
