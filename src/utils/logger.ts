/**
 * Logging
 * Console logger with an optional append-only log file
 */

import { appendFileSync } from "fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Lowest level that is emitted (default: 'info') */
  level?: LogLevel;
  /** File that receives a copy of every emitted line */
  logFile?: string;
  /** Clock used for timestamps, overridable in tests */
  now?: () => Date;
}

/**
 * Formats a log line as `<ISO time> - <LEVEL> - <message>`
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  time: Date
): string {
  return `${time.toISOString()} - ${level.toUpperCase()} - ${message}`;
}

/**
 * Creates a logger writing to the console and, optionally, a file
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', logFile: 'fijian_pipeline.log' });
 * logger.info('Starting');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const now = options.now ?? ((): Date => new Date());
  const logFile = options.logFile;

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }

    const line = formatLogLine(level, message, now());

    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      default:
        console.log(line);
        break;
    }

    if (logFile !== undefined) {
      appendFileSync(logFile, line + "\n", "utf-8");
    }
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Extracts a message from a caught value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
