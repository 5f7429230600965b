// Import the LogLevel type we defined in types.ts
import type { LogLevel } from "./types.ts";

// The levels a message can be written at ("silent" is only a threshold).
export type MessageLevel = Exclude<LogLevel, "silent">;

// LEVELS maps each log level to a numeric priority
// Higher numbers = more severe. "silent" sits above everything so nothing passes.
const LEVELS: Record<LogLevel, number> = {
  debug: 10,   // Detailed tracing (skipped lines, file paths)
  info: 20,    // Normal operations (record added, backup written)
  warn: 30,    // Something refused or missing, but the session carries on
  error: 40,   // A file operation failed
  silent: 100,
};

// A sink receives each formatted line. Swapping it lets tests capture output.
export type LogSink = (level: MessageLevel, line: string) => void;

// The engine must not write to stdout (that belongs to the menu layer),
// so every level goes to stderr by default.
const stderrSink: LogSink = (level, line) => {
  if (level === "warn") {
    console.warn(line);   // console.warn also writes to stderr
  } else {
    console.error(line);
  }
};

// Logger class encapsulates all logging functionality
export class Logger {
  #level: LogLevel;  // Minimum level to write
  #sink: LogSink;

  constructor(level: LogLevel, sink: LogSink = stderrSink) {
    this.#level = level;
    this.#sink = sink;
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

  #log(level: MessageLevel, message: string, meta?: Record<string, unknown>) {
    // Skip anything below the configured threshold
    if (LEVELS[level] < LEVELS[this.#level]) return;

    const timestamp = new Date().toISOString();
    const payload = meta ? ` ${JSON.stringify(meta)}` : "";

    // [2026-01-07T10:30:45.123Z] INFO Student added {"id":7}
    this.#sink(level, `[${timestamp}] ${level.toUpperCase()} ${message}${payload}`);
  }
}

// Factory function to create a Logger instance
export function createLogger(level: LogLevel, sink?: LogSink) {
  return new Logger(level, sink);
}
