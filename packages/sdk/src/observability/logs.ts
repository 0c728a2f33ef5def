/**
 * Structured logging for store operations
 */

import type { LogData, StoreLogger } from "../types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Resolve the minimum level from RUNSTORE_LOG_LEVEL (default: info)
 */
export function resolveLogLevel(value = process.env.RUNSTORE_LOG_LEVEL): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

export class Logger implements StoreLogger {
  #enabled = true;
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = resolveLogLevel()) {
    this.#minLevel = minLevel;
  }

  /**
   * Format an entry for console output
   */
  static format(entry: LogEntry): string {
    const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    return parts.join(" ");
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: LogData): void {
    if (!this.#enabled || LEVELS.indexOf(level) < LEVELS.indexOf(this.#minLevel)) return;

    const line = Logger.format({
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    });

    // Route to appropriate console method
    switch (level) {
      case "debug":
        if (process.env.RUNSTORE_DEBUG) {
          console.debug(line);
        }
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(event: string, data?: LogData): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: LogData): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: LogData): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Change the minimum level
   */
  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
