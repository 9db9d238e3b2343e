const LEVELS = { silent: -1, error: 0, warn: 1, info: 2 } as const;
type LogLevel = keyof typeof LEVELS;

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

// Read on every call so tests and scripts can change LOG_LEVEL after import.
const enabled = (level: Exclude<LogLevel, "silent">): boolean => {
  const configured = (process.env.LOG_LEVEL || "info").toLowerCase();
  const threshold = isLogLevel(configured) ? LEVELS[configured] : LEVELS.info;
  return LEVELS[level] <= threshold;
};

export const logInfo = (message: string, data?: unknown) => {
  if (enabled("info")) {
    console.log(`${new Date().toISOString()} - INFO: ${message}`, data ?? "");
  }
};

export const logWarn = (message: string, data?: unknown) => {
  if (enabled("warn")) {
    console.warn(`${new Date().toISOString()} - WARN: ${message}`, data ?? "");
  }
};

export const logError = (message: string, error?: unknown) => {
  if (enabled("error")) {
    console.error(`${new Date().toISOString()} - ERROR: ${message}`, error ?? "");
  }
};
