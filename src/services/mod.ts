/**
 * Services module - unified entry point for all services.
 *
 * This module provides:
 * - Re-exports of the service classes
 * - `initializeServices` to build everything a process needs from a config
 *
 * @example
 * ```typescript
 * import { initializeServices } from "./services/mod.js";
 *
 * const services = initializeServices(loadConfig({}));
 * const { tasks } = await services.store.load();
 * ```
 */

import type { Config } from "../config/config.js";
import type { Notifier } from "../types/notifier.js";
import { PasskeyStore } from "./auth/mod.js";
import { createLogger, type LoggerService } from "./logger/mod.js";
import { createNotifier } from "./notifier/mod.js";
import { TaskScanner } from "./scanner/mod.js";
import { HistoryStore, TaskStore } from "./store/mod.js";

// === Service re-exports ===

export { createLogger, LoggerService } from "./logger/mod.js";
export { HistoryStore, TaskStore } from "./store/mod.js";
export { createNotifier, deliver, NOTIFICATION_TITLE } from "./notifier/mod.js";
export { TaskScanner } from "./scanner/mod.js";
export { PasskeyStore } from "./auth/mod.js";

export interface Services {
  config: Config;
  logger: LoggerService;
  store: TaskStore;
  history: HistoryStore;
  passkeys: PasskeyStore;
  notifier: Notifier;
}

/**
 * Build the services for one process from a loaded config.
 * The logger is created first; the others log through children of it.
 */
export function initializeServices(config: Config, logger: LoggerService = createLogger(config)): Services {
  const storeLogger = logger.child("store");
  return {
    config,
    logger,
    store: new TaskStore(config.tasksFile, storeLogger),
    history: new HistoryStore(config.completedTasksFile, storeLogger),
    passkeys: new PasskeyStore(config.passkeyFile, logger.child("auth")),
    notifier: createNotifier(config),
  };
}

/**
 * Scanner wired to the given services
 */
export function createScanner(services: Services): TaskScanner {
  return new TaskScanner({
    store: services.store,
    history: services.history,
    notifier: services.notifier,
    logger: services.logger.child("scanner"),
    settings: services.config.scan,
  });
}

/**
 * Close notifier connections and flush pending log writes before the
 * process exits
 */
export async function cleanupServices(services: Services): Promise<void> {
  services.notifier.close?.();
  await services.logger.flush();
}
