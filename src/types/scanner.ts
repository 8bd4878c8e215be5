/**
 * Scanner types for due-task detection
 */

import type { StoredTask } from "./task.js";

/**
 * Timing knobs for a scan cycle, in seconds
 */
export interface ScanSettings {
  checkFrequencySeconds: number;
  dueSoonThresholdSeconds: number;
  commandTimeoutSeconds: number;
}

/**
 * Outcome of classifying one task against "now".
 * Both flags can be set when the threshold is smaller than the frequency.
 */
export interface TaskClassification {
  /** Signed seconds until the task is due; negative when overdue */
  deltaSeconds: number;
  dueSoon: boolean;
  dueNow: boolean;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  durationMs: number;
}

/**
 * Summary of one scan cycle
 */
export interface ScanReport {
  startedAt: number;
  scanned: number;
  dueSoon: string[];
  fired: StoredTask[];
  commands: { command: string; result: CommandResult }[];
  /** Tasks whose processing raised and were left pending */
  failed: { name: string; error: string }[];
  unreadable: number;
  historySaved: boolean;
  pendingSaved: boolean;
}
