/**
 * Daemon lifecycle management - start/stop/status.
 *
 * The running daemon records its pid in the configured pid file; a pid
 * that names a live process means the daemon is running.
 */

import { spawn } from "node:child_process";
import { readFile, rm } from "node:fs/promises";

/** Lifecycle configuration */
export interface LifecycleConfig {
  pidFile: string;
  /** Config file handed to the spawned daemon */
  configPath?: string;
  /** Script that implements the CLI; defaults to the running one */
  entryPath?: string;
  /** Maximum time to wait for the daemon to start or stop (ms) */
  timeout?: number;
  /** Polling interval while waiting (ms) */
  retryInterval?: number;
}

/** Default start/stop timeout (5 seconds) */
const DEFAULT_TIMEOUT = 5000;

/** Default retry interval (100 ms) */
const DEFAULT_RETRY_INTERVAL = 100;

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * True when a process with this pid exists (EPERM still means it exists)
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

/**
 * Manages the daemon process - starting, stopping, and checking status.
 */
export class DaemonLifecycle {
  private readonly pidFile: string;
  private readonly configPath?: string;
  private readonly entryPath?: string;
  private readonly timeout: number;
  private readonly retryInterval: number;

  constructor(config: LifecycleConfig) {
    this.pidFile = config.pidFile;
    this.configPath = config.configPath;
    this.entryPath = config.entryPath ?? process.argv[1];
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.retryInterval = config.retryInterval ?? DEFAULT_RETRY_INTERVAL;
  }

  /**
   * Pid recorded in the pid file, or null when there is none
   */
  async readPid(): Promise<number | null> {
    let content: string;
    try {
      content = await readFile(this.pidFile, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    const value = content.trim();
    if (!/^\d+$/.test(value)) return null;
    const pid = parseInt(value, 10);
    return pid > 0 ? pid : null;
  }

  /**
   * Pid of the running daemon, or null
   */
  async runningPid(): Promise<number | null> {
    const pid = await this.readPid();
    return pid !== null && isProcessAlive(pid) ? pid : null;
  }

  async isRunning(): Promise<boolean> {
    return (await this.runningPid()) !== null;
  }

  /**
   * Start the daemon process detached from this one.
   * If already running, returns its pid immediately.
   */
  async start(): Promise<number> {
    const existing = await this.runningPid();
    if (existing !== null) {
      return existing;
    }

    if (!this.entryPath) {
      throw new Error("Failed to start daemon: cannot locate the tickler entry script");
    }

    const args = [...process.execArgv, this.entryPath, "daemon", "run"];
    if (this.configPath) {
      args.push("--config", this.configPath);
    }

    const child = spawn(process.execPath, args, {
      detached: true,
      stdio: "ignore",
      env: process.env,
    });
    child.unref();

    // Wait for the daemon to record its pid
    const startTime = Date.now();
    while (Date.now() - startTime < this.timeout) {
      const pid = await this.runningPid();
      if (pid !== null) {
        return pid;
      }
      await delay(this.retryInterval);
    }

    throw new Error("Failed to start daemon: timeout waiting for pid file");
  }

  /**
   * Stop the daemon with SIGTERM and wait for it to exit.
   * A stale pid file is removed.
   * @returns false when no daemon was running
   */
  async stop(): Promise<boolean> {
    const pid = await this.runningPid();
    if (pid === null) {
      await rm(this.pidFile, { force: true });
      return false;
    }

    process.kill(pid, "SIGTERM");

    const startTime = Date.now();
    while (Date.now() - startTime < this.timeout) {
      if (!isProcessAlive(pid)) {
        return true;
      }
      await delay(this.retryInterval);
    }

    throw new Error(`Daemon (pid ${pid}) did not stop within ${this.timeout} ms`);
  }

  /**
   * Restart the daemon process.
   */
  async restart(): Promise<number> {
    await this.stop();
    return await this.start();
  }
}
