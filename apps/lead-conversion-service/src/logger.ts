import { config, LogLevel } from "./config";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Tagged console logger.
 * Lines look like `[predict] Predicted 3 records: { duration_ms: 2 }`.
 */
export function createLogger(tag: string, level: LogLevel = config.logLevel): Logger {
  const threshold = LOG_LEVEL_PRIORITY[level];

  const write = (entryLevel: LogLevel, message: string, context?: Record<string, unknown>) => {
    if (LOG_LEVEL_PRIORITY[entryLevel] < threshold) {
      return;
    }

    const line = context ? `[${tag}] ${message}:` : `[${tag}] ${message}`;
    const sink =
      entryLevel === "error" ? console.error : entryLevel === "warn" ? console.warn : console.log;

    if (context) {
      sink(line, context);
    } else {
      sink(line);
    }
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
  };
}
