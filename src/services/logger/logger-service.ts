/**
 * Logger service - leveled, scoped logging for the editor and the daemon.
 */

import chalk from "chalk";
import type { Config } from "../../config/config.js";
import type { LogEntry, Logger, LogLevel } from "../../types/logger.js";
import { LOG_LEVEL_PRIORITY } from "../../types/logger.js";
import { formatLogLine, LogStorage, type LogStorageConfig } from "./log-storage.js";

/**
 * Logger service configuration
 */
export interface LoggerServiceConfig extends Partial<LogStorageConfig> {
  /** Minimum level that is recorded */
  level?: LogLevel;
  /** Echo recorded lines to stderr */
  echo?: boolean;
}

/** State shared by a logger and all of its children */
interface SharedState {
  storage: LogStorage;
  level: LogLevel;
  echo: boolean;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export class LoggerService implements Logger {
  private readonly state: SharedState;
  readonly scope: string;

  constructor(config: LoggerServiceConfig = {}, scope = "tickler", state?: SharedState) {
    this.scope = scope;
    this.state = state ?? {
      storage: new LogStorage(config),
      level: config.level ?? "info",
      echo: config.echo ?? false,
    };
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  /**
   * Logger for a sub-component; shares storage and level with this one
   */
  child(scope: string): LoggerService {
    return new LoggerService({}, scope, this.state);
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  query(options: Parameters<LogStorage["query"]>[0] = {}): LogEntry[] {
    return this.state.storage.query(options);
  }

  getAll(): LogEntry[] {
    return this.state.storage.getAll();
  }

  /**
   * Wait for pending log-file writes
   */
  async flush(): Promise<void> {
    await this.state.storage.flush();
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.state.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      scope: this.scope,
      message,
      ...(data ? { data } : {}),
    };
    this.state.storage.add(entry);

    if (this.state.echo) {
      process.stderr.write(LEVEL_COLORS[level](formatLogLine(entry)) + "\n");
    }
  }
}

/**
 * Build the root logger for a loaded config and report config fallbacks
 */
export function createLogger(config: Config): LoggerService {
  const logger = new LoggerService({
    persistPath: config.logFile,
    level: config.verbose ? "debug" : config.logLevel,
    echo: config.verbose,
  });

  for (const warning of config.warnings) {
    logger.warn(`config fallback: ${warning}`, { configPath: config.configPath });
  }

  return logger;
}
