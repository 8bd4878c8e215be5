/**
 * Due-task classification and notification texts.
 */

import type { CommandResult, ScanSettings, TaskClassification } from "../../types/scanner.js";
import type { Task } from "../../types/task.js";
import { toCanonicalString } from "../../utils/time.js";

type WindowSettings = Pick<ScanSettings, "checkFrequencySeconds" | "dueSoonThresholdSeconds">;

/**
 * The due-soon window `(lower, upper]` in seconds before the due time.
 * Its width equals the check frequency, so a steady scanner sees each
 * task inside it on exactly one cycle.
 */
export function dueSoonWindow(settings: WindowSettings): { lower: number; upper: number } {
  return {
    lower: settings.dueSoonThresholdSeconds - settings.checkFrequencySeconds,
    upper: settings.dueSoonThresholdSeconds,
  };
}

/**
 * Classify a task against `now`. The two flags are independent.
 */
export function classifyTask(task: Task, now: Date, settings: WindowSettings): TaskClassification {
  const deltaSeconds = (task.time.getTime() - now.getTime()) / 1000;
  const { lower, upper } = dueSoonWindow(settings);

  return {
    deltaSeconds,
    dueSoon: lower < deltaSeconds && deltaSeconds <= upper,
    dueNow: deltaSeconds <= 0,
  };
}

export function dueSoonMessage(task: Task, deltaSeconds: number): string {
  return `Task Due Soon\nTask: ${task.name} due in ${Math.ceil(deltaSeconds)} seconds`;
}

export function dueMessage(task: Task): string {
  return [
    "Task Due",
    `Task: ${task.name}`,
    `Time: ${toCanonicalString(task.time)}`,
    `Priority: ${task.priority}`,
  ].join("\n");
}

export function commandResultMessage(command: string, result: CommandResult): string {
  return [
    "Command Execution Result",
    `Command: ${command}`,
    `Output: ${result.stdout}`,
    `Error: ${result.stderr}`,
  ].join("\n");
}
