// Import the LogLevel type we defined in types.ts
import type { LogLevel } from "./types.ts";

// Every accepted level, lowest first. config.ts validates LOG_LEVEL against this list.
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

// LEVELS maps each log level to a numeric priority
// Higher numbers = more severe, so "warn" (30) outranks "info" (20)
const LEVELS: Record<LogLevel, number> = {
  debug: 10,  // Detailed debugging info (row-level load details)
  info: 20,   // Normal operations (roster loaded, roster saved)
  warn: 30,   // Something concerning but not broken (save failed, row skipped)
  error: 40,  // Something is broken
};

// Logger class encapsulates all logging functionality
export class Logger {
  // Minimum level to log (everything below this is ignored)
  #level: LogLevel;

  constructor(level: LogLevel) {
    this.#level = level;
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.#log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.#log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.#log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.#log("error", message, meta);
  }

  #log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVELS[level] < LEVELS[this.#level]) return;

    const timestamp = new Date().toISOString();
    const payload = meta ? ` ${JSON.stringify(meta)}` : "";

    // [2026-01-07T10:30:45.123Z] INFO Roster loaded {"count":3}
    const line = `[${timestamp}] ${level.toUpperCase()} ${message}${payload}`;

    // warn and error go to stderr so they never interleave with menu output on stdout
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

// Factory function to create a Logger instance
export function createLogger(level: LogLevel) {
  return new Logger(level);
}
