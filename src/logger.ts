/* Tiny logger with leveled output, on stderr */
export type LogLevel = "info" | "warn" | "error" | "debug";

const levelOrder: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in levelOrder;
}

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] <= levelOrder[currentLevel];
}

function format(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
}

export const logger = {
  info: (message: string): void => {
    if (shouldLog("info")) {
      console.error(format("info", message));
    }
  },
  warn: (message: string): void => {
    if (shouldLog("warn")) {
      console.error(format("warn", message));
    }
  },
  error: (message: string, error?: unknown): void => {
    if (shouldLog("error")) {
      console.error(format("error", message), error ?? "");
    }
  },
  debug: (message: string): void => {
    if (shouldLog("debug")) {
      console.error(format("debug", message));
    }
  },
};
