/**
 * Structured logging utility
 */

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  if (process.env.DEBUG) return "debug";
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("debug")) {
      console.log(`[DEBUG] ${msg}`, meta ? JSON.stringify(meta) : "");
    }
  },

  info: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("info")) {
      console.log(`[INFO] ${msg}`, meta ? JSON.stringify(meta) : "");
    }
  },

  warn: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("warn")) {
      console.warn(`[WARN] ${msg}`, meta ? JSON.stringify(meta) : "");
    }
  },

  error: (msg: string, error?: unknown) => {
    console.error(`[ERROR] ${msg}`, error ?? "");
  },
};
