import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event(type: string, payload: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: string;
  file?: string | undefined;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function consoleFor(level: LogLevel): (...args: unknown[]) => void {
  if (level === "error") return console.error;
  if (level === "warn") return console.warn;
  return console.log;
}

/**
 * JSON logger writing to the console and, optionally, a JSON-lines file.
 *
 * - Uses ISO timestamps.
 * - log() records the level; entries below the configured level are dropped.
 * - event() keeps the { timestamp, type, ...payload } shape and is logged at
 *   info level.
 */
export function createLogger(options: LoggerOptions = {}): LoggerPort {
  const requested = (options.level ?? "info").toLowerCase();
  const threshold = LEVEL_ORDER[isLogLevel(requested) ? requested : "info"];
  const file = options.file ? path.resolve(options.file) : undefined;

  function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }

    consoleFor(level)(JSON.stringify(entry));

    if (!file) {
      return;
    }

    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      fs.appendFileSync(file, JSON.stringify(entry) + "\n", {
        encoding: "utf-8",
      });
    } catch (err) {
      console.error("Failed to write log file:", err);
    }
  }

  return {
    log(level, message, meta) {
      writeEntry(level, {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(meta || {}),
      });
    },

    event(type, payload) {
      writeEntry("info", {
        timestamp: new Date().toISOString(),
        type,
        ...payload,
      });
    },
  };
}

let active: LoggerPort = createLogger();

/**
 * Replaces the process-wide logger. The entry point calls this with
 * `config.logging` once the config is loaded.
 */
export function configureLogger(options: LoggerOptions): void {
  active = createLogger(options);
}

export const logger: LoggerPort = {
  log(level, message, meta) {
    active.log(level, message, meta);
  },
  event(type, payload) {
    active.event(type, payload);
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  logger.event(type, payload);
}
