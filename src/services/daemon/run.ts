/**
 * Foreground daemon: runs the scanner until SIGINT/SIGTERM.
 *
 * SIGHUP reloads the config file and applies the new scan settings;
 * transports and file paths keep their startup values.
 */

import { rm, writeFile } from "node:fs/promises";
import type { Config } from "../../config/config.js";
import { createScanner, type Services } from "../mod.js";
import { DaemonLifecycle } from "./lifecycle.js";

export interface DaemonRunOptions {
  /** Re-read the configuration (SIGHUP) */
  reload?: () => Config;
}

/**
 * Run the daemon in this process.
 * Resolves once a termination signal has been handled and the
 * in-flight scan cycle has finished.
 */
export async function runDaemon(services: Services, options: DaemonRunOptions = {}): Promise<void> {
  const { config } = services;
  const logger = services.logger.child("daemon");

  const lifecycle = new DaemonLifecycle({ pidFile: config.pidFile });
  const other = await lifecycle.runningPid();
  if (other !== null && other !== process.pid) {
    throw new Error(`Daemon already running (pid ${other})`);
  }

  await writeFile(config.pidFile, `${process.pid}\n`, "utf-8");

  const scanner = createScanner(services);
  scanner.start();
  logger.info("daemon started", { pid: process.pid, configPath: config.configPath });

  const onReload = () => {
    if (!options.reload) return;
    try {
      const next = options.reload();
      scanner.updateSettings(next.scan);
      for (const warning of next.warnings) {
        logger.warn(`config fallback: ${warning}`);
      }
    } catch (error) {
      logger.error("config reload failed; keeping current settings", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };
  process.on("SIGHUP", onReload);

  await new Promise<void>((resolve) => {
    let stopping = false;
    const shutdown = (signal: NodeJS.Signals) => {
      if (stopping) return;
      stopping = true;
      logger.info("shutting down", { signal });

      scanner.stop()
        .then(() => removePidFile(lifecycle, config.pidFile))
        .catch((error: unknown) => {
          logger.error("error during shutdown", {
            error: error instanceof Error ? error.message : String(error),
          });
        })
        .finally(() => {
          process.off("SIGINT", shutdown);
          process.off("SIGTERM", shutdown);
          process.off("SIGHUP", onReload);
          resolve();
        });
    };

    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });
}

/**
 * Remove the pid file if it still names this process
 */
async function removePidFile(lifecycle: DaemonLifecycle, path: string): Promise<void> {
  if ((await lifecycle.readPid()) === process.pid) {
    await rm(path, { force: true });
  }
}
