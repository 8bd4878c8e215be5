/**
 * Logger types
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  /** Unix timestamp in milliseconds */
  timestamp: number;
  level: LogLevel;
  /** Component that produced the entry, e.g. "scanner" */
  scope: string;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * Minimal logging surface handed to components
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}
