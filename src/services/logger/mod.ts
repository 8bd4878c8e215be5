/**
 * Logger module exports
 */

export { createLogger, LoggerService, type LoggerServiceConfig } from "./logger-service.js";
export { formatLogLine, LogStorage, type LogStorageConfig } from "./log-storage.js";
