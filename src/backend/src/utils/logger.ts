/**
 * Simple levelled console logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

export class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = "info") {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[this.level] <= LOG_LEVELS[level];
  }

  debug(...args: unknown[]): void {
    if (this.isEnabled("debug")) {
      console.log(`[DEBUG]`, ...args);
    }
  }

  info(...args: unknown[]): void {
    if (this.isEnabled("info")) {
      console.log(`[INFO]`, ...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.isEnabled("warn")) {
      console.warn(`[WARN]`, ...args);
    }
  }

  error(...args: unknown[]): void {
    if (this.isEnabled("error")) {
      console.error(`[ERROR]`, ...args);
    }
  }
}

// Quiet under Jest unless LOG_LEVEL says otherwise
export function defaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env.LOG_LEVEL?.toLowerCase();
  if (configured && isLogLevel(configured)) return configured;
  return env.NODE_ENV === "test" ? "warn" : "info";
}

export const logger = new Logger(defaultLogLevel());
