/**
 * Command runner - executes the shell command attached to a task.
 */

import { type ChildProcess, spawn } from "node:child_process";
import type { CommandResult } from "../../types/scanner.js";

export const DEFAULT_TIMEOUT_MS = 300_000; // 5 minutes
const MAX_OUTPUT = 30_000; // characters per stream
const KILL_GRACE_MS = 2_000;
const STOPPED_NOTE = "Command stopped before it finished";

const EMBEDDED_COMMAND = /^(-e|--execute)\s+(.*)$/;

export interface RunOptions {
  timeoutMs?: number;
  cwd?: string;
  /** Aborting kills the command's process group */
  signal?: AbortSignal;
}

/**
 * Extract the command from a task name of the form `-e <cmd>` or
 * `--execute <cmd>`.
 * @returns the command, or null when the name embeds none
 */
export function extractCommand(taskName: string): string | null {
  const match = taskName.match(EMBEDDED_COMMAND);
  const command = match?.[2];
  return command ? command : null;
}

/**
 * Run `command` through the system shell.
 *
 * Never rejects: a spawn failure is reported through `stderr` with
 * exit code -1, so callers always get two strings to report. The command
 * runs in its own process group. On timeout or abort the whole group is
 * sent SIGTERM, then SIGKILL after a grace period, and the result is
 * returned as soon as the shell exits.
 */
export function runCommand(command: string, options: RunOptions = {}): Promise<CommandResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const start = Date.now();

  if (options.signal?.aborted) {
    return Promise.resolve({
      stdout: "",
      stderr: STOPPED_NOTE,
      exitCode: -1,
      timedOut: false,
      durationMs: 0,
    });
  }

  return new Promise((resolve) => {
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let stopped: "timeout" | "abort" | null = null;
    let exitCode: number | null = null;
    let settled = false;

    let child: ChildProcess;
    try {
      child = spawn(command, {
        shell: true,
        cwd: options.cwd,
        detached: true,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      resolve({
        stdout: "",
        stderr: error instanceof Error ? error.message : String(error),
        exitCode: -1,
        timedOut: false,
        durationMs: Date.now() - start,
      });
      return;
    }

    const finish = (code: number, failure?: string): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);

      let err = truncate(Buffer.concat(stderr).toString("utf-8"));
      if (failure) {
        err = err ? `${err}\n${failure}` : failure;
      }
      if (stopped) {
        const note = stopped === "timeout" ? `Command timed out after ${formatTimeout(timeoutMs)}` : STOPPED_NOTE;
        err = err ? `${err}\n${note}` : note;
      }

      resolve({
        stdout: truncate(Buffer.concat(stdout).toString("utf-8")),
        stderr: err,
        exitCode: code,
        timedOut: stopped === "timeout",
        durationMs: Date.now() - start,
      });
    };

    const terminate = (reason: "timeout" | "abort"): void => {
      if (settled || stopped) return;
      stopped = reason;
      killGroup(child, "SIGTERM");
      setTimeout(() => killGroup(child, "SIGKILL"), KILL_GRACE_MS).unref();
      // a forked grandchild may hold the pipes open; stop waiting on them
      child.stdout?.destroy();
      child.stderr?.destroy();
      if (exitCode !== null) finish(exitCode);
    };

    const timer = setTimeout(() => terminate("timeout"), timeoutMs);
    const onAbort = () => terminate("abort");
    options.signal?.addEventListener("abort", onAbort, { once: true });

    child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (error) => finish(-1, error.message));
    child.on("exit", (code) => {
      exitCode = code ?? -1;
      if (stopped) finish(exitCode);
    });
    child.on("close", (code) => finish(code ?? -1));
  });
}

/**
 * Signal the child's process group, or the child alone where there is no group
 */
function killGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  const pid = child.pid;
  if (pid === undefined) return;
  try {
    process.kill(-pid, signal);
  } catch {
    // group already gone, or no process groups on this platform
    child.kill(signal);
  }
}

function formatTimeout(ms: number): string {
  return ms % 1000 === 0 ? `${ms / 1000} seconds` : `${ms} ms`;
}

function truncate(text: string): string {
  return text.length > MAX_OUTPUT ? text.slice(0, MAX_OUTPUT) + "\n... (truncated)" : text;
}
