/**
 * Task scanner - the periodic due-task engine run by the daemon.
 *
 * Each cycle loads the pending tasks, notifies tasks entering the
 * due-soon window, fires due tasks (notification, optional command,
 * follow-up notification), appends the fired tasks to history and then
 * rewrites the pending list without them.
 */

import type { Logger } from "../../types/logger.js";
import type { Notifier } from "../../types/notifier.js";
import type { CommandResult, ScanReport, ScanSettings } from "../../types/scanner.js";
import type { Task } from "../../types/task.js";
import { toCanonicalString } from "../../utils/time.js";
import { deliver, NOTIFICATION_TITLE } from "../notifier/mod.js";
import { extractCommand, runCommand, type RunOptions } from "../runner/command-runner.js";
import type { HistoryStore, TaskStore } from "../store/task-store.js";
import { classifyTask, commandResultMessage, dueMessage, dueSoonMessage } from "./classify.js";

export type CommandRunner = (command: string, options: RunOptions) => Promise<CommandResult>;

export interface TaskScannerOptions {
  store: TaskStore;
  history: HistoryStore;
  notifier: Notifier;
  logger: Logger;
  settings: ScanSettings;
  /** Defaults to the shell runner */
  runCommand?: CommandRunner;
  /** Clock, injectable for tests */
  now?: () => Date;
}

export class TaskScanner {
  private readonly store: TaskStore;
  private readonly history: HistoryStore;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly run: CommandRunner;
  private readonly now: () => Date;
  private settings: ScanSettings;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<ScanReport | null> | null = null;
  private abort = new AbortController();

  constructor(options: TaskScannerOptions) {
    this.store = options.store;
    this.history = options.history;
    this.notifier = options.notifier;
    this.logger = options.logger;
    this.settings = options.settings;
    this.run = options.runCommand ?? runCommand;
    this.now = options.now ?? (() => new Date());
  }

  getSettings(): ScanSettings {
    return { ...this.settings };
  }

  /**
   * Apply new settings. A changed frequency reschedules a running timer.
   */
  updateSettings(settings: ScanSettings): void {
    const reschedule = this.timer !== null &&
      settings.checkFrequencySeconds !== this.settings.checkFrequencySeconds;
    this.settings = { ...settings };
    if (reschedule) {
      this.clearTimer();
      this.schedule();
    }
    this.logger.info("scan settings updated", { ...settings });
  }

  isStarted(): boolean {
    return this.timer !== null;
  }

  isScanning(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Scan now and then every `checkFrequencySeconds`
   */
  start(): void {
    if (this.timer) return;
    if (this.abort.signal.aborted) this.abort = new AbortController();
    this.logger.info("scanner started", { ...this.settings });
    this.schedule();
    void this.tick();
  }

  /**
   * Stop the timer and wait for the cycle in flight, if any. Running
   * task commands are killed; the cycle still records what it fired.
   */
  async stop(): Promise<void> {
    this.clearTimer();
    this.abort.abort();
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.info("scanner stopped");
  }

  /**
   * Start one cycle unless the previous one is still running.
   * Errors are contained here so the timer keeps going.
   */
  tick(): Promise<ScanReport | null> {
    if (this.inFlight) {
      this.logger.warn("previous scan still running; skipping this tick");
      return Promise.resolve(null);
    }

    const cycle = this.scanOnce()
      .catch((error: unknown) => {
        this.logger.error("scan cycle failed", { error: describe(error) });
        return null;
      })
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = cycle;
    return cycle;
  }

  /**
   * Run one full scan cycle
   */
  async scanOnce(): Promise<ScanReport> {
    const settings = this.settings;
    const { tasks, unreadable } = await this.store.load();
    const now = this.now();

    const report: ScanReport = {
      startedAt: now.getTime(),
      scanned: tasks.length,
      dueSoon: [],
      fired: [],
      commands: [],
      failed: [],
      unreadable: unreadable.length,
      historySaved: false,
      pendingSaved: false,
    };

    if (unreadable.length > 0) {
      this.logger.warn("pending document has unreadable entries; leaving them in place", {
        count: unreadable.length,
      });
    }

    const fired: Task[] = [];
    for (const task of tasks) {
      try {
        await this.processTask(task, now, settings, fired, report);
      } catch (error) {
        report.failed.push({ name: task.name, error: describe(error) });
        this.logger.error("failed to process task; leaving it pending", {
          task: task.name,
          error: describe(error),
        });
      }
    }

    if (fired.length === 0) {
      return report;
    }

    // History first: a crash between the two writes leaves a task in
    // both documents rather than in neither.
    const historyResult = await this.history.append(fired);
    report.historySaved = historyResult.success;
    if (!historyResult.success) {
      this.logger.error("fired tasks were not recorded in history", {
        tasks: report.fired,
        error: historyResult.error,
      });
      await deliver(
        this.notifier,
        this.logger,
        NOTIFICATION_TITLE,
        "Error:\nUnable to append completed tasks. Check file permissions and try again.",
      );
    }

    const remaining = tasks.filter((task) => !fired.includes(task));
    const pendingResult = await this.store.save(remaining, unreadable);
    report.pendingSaved = pendingResult.success;
    if (!pendingResult.success) {
      await deliver(
        this.notifier,
        this.logger,
        NOTIFICATION_TITLE,
        "Error:\nUnable to save tasks. Check file permissions and try again.",
      );
    }

    return report;
  }

  private async processTask(
    task: Task,
    now: Date,
    settings: ScanSettings,
    fired: Task[],
    report: ScanReport,
  ): Promise<void> {
    const { deltaSeconds, dueSoon, dueNow } = classifyTask(task, now, settings);
    if (Number.isNaN(deltaSeconds)) {
      throw new Error("task time is not a valid date");
    }

    if (dueSoon) {
      report.dueSoon.push(task.name);
      this.logger.info("task due soon", { task: task.name, deltaSeconds });
      await deliver(this.notifier, this.logger, NOTIFICATION_TITLE, dueSoonMessage(task, deltaSeconds));
    }

    if (!dueNow) return;

    this.logger.info("task due", { task: task.name, time: toCanonicalString(task.time) });
    await deliver(this.notifier, this.logger, NOTIFICATION_TITLE, dueMessage(task));
    fired.push(task);
    report.fired.push({
      name: task.name,
      time: toCanonicalString(task.time),
      priority: task.priority,
    });

    const command = extractCommand(task.name);
    if (!command) return;

    const result = await this.execute(command, settings);
    report.commands.push({ command, result });
    await deliver(this.notifier, this.logger, NOTIFICATION_TITLE, commandResultMessage(command, result));
  }

  private async execute(command: string, settings: ScanSettings): Promise<CommandResult> {
    this.logger.info("running task command", { command });
    try {
      const result = await this.run(command, {
        timeoutMs: settings.commandTimeoutSeconds * 1000,
        signal: this.abort.signal,
      });
      this.logger.info("task command finished", {
        command,
        exitCode: result.exitCode,
        timedOut: result.timedOut,
        durationMs: result.durationMs,
      });
      return result;
    } catch (error) {
      this.logger.error("task command could not be run", { command, error: describe(error) });
      return { stdout: "", stderr: describe(error), exitCode: -1, timedOut: false, durationMs: 0 };
    }
  }

  private schedule(): void {
    this.timer = setInterval(() => {
      void this.tick();
    }, this.settings.checkFrequencySeconds * 1000);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
