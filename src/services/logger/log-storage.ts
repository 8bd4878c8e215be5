/**
 * Log storage: a bounded in-memory buffer mirrored to an append-only file.
 */

import { appendFile } from "node:fs/promises";
import type { LogEntry, LogLevel } from "../../types/logger.js";
import { LOG_LEVEL_PRIORITY } from "../../types/logger.js";

/**
 * Configuration for log storage
 */
export interface LogStorageConfig {
  /** Maximum number of entries to keep in memory */
  maxEntries: number;
  /** Optional file the entries are appended to, one line each */
  persistPath?: string;
}

const DEFAULT_CONFIG: LogStorageConfig = {
  maxEntries: 1000,
};

/**
 * Format an entry as a single log-file line
 */
export function formatLogLine(entry: LogEntry): string {
  const time = new Date(entry.timestamp).toISOString();
  const level = entry.level.toUpperCase().padEnd(5);
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
  return `${time} ${level} [${entry.scope}] ${entry.message}${data}`;
}

export class LogStorage {
  private entries: LogEntry[] = [];
  private config: LogStorageConfig;
  private writes: Promise<void> = Promise.resolve();
  private writeFailed = false;

  constructor(config: Partial<LogStorageConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Add a log entry and queue its file write.
   * Writes are chained so lines land in the order they were logged.
   */
  add(entry: LogEntry): void {
    this.entries.push(entry);

    // Trim old entries when exceeding max
    if (this.entries.length > this.config.maxEntries) {
      this.entries = this.entries.slice(-this.config.maxEntries);
    }

    const path = this.config.persistPath;
    if (!path) return;

    const line = formatLogLine(entry) + "\n";
    this.writes = this.writes
      .then(() => appendFile(path, line, "utf-8"))
      .catch((error: unknown) => {
        if (this.writeFailed) return;
        this.writeFailed = true;
        const reason = error instanceof Error ? error.message : String(error);
        process.stderr.write(`[tickler] cannot write log file ${path}: ${reason}\n`);
      });
  }

  /**
   * Query log entries with filters
   */
  query(options: {
    level?: LogLevel;
    scope?: string;
    since?: number;
    limit?: number;
  } = {}): LogEntry[] {
    let results = [...this.entries];

    // Filter by level (include entries at or above the specified level)
    const { level } = options;
    if (level) {
      results = results.filter(
        (e) => LOG_LEVEL_PRIORITY[e.level] >= LOG_LEVEL_PRIORITY[level],
      );
    }

    if (options.scope) {
      results = results.filter((e) => e.scope === options.scope);
    }

    const { since } = options;
    if (since !== undefined) {
      results = results.filter((e) => e.timestamp >= since);
    }

    // Limit results (from the end, most recent)
    if (options.limit) {
      results = results.slice(-options.limit);
    }

    return results;
  }

  /**
   * Get all entries (copy)
   */
  getAll(): LogEntry[] {
    return [...this.entries];
  }

  size(): number {
    return this.entries.length;
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Wait until every queued line has been written
   */
  async flush(): Promise<void> {
    await this.writes;
  }
}
