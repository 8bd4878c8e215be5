/**
 * Terminal rendering for task lists
 */

import chalk from "chalk";
import { isPriority, PRIORITY_LABELS, type Task } from "../types/task.js";
import { toCanonicalString } from "../utils/time.js";

const HEADERS = ["Index", "Task", "Time", "Priority Level"] as const;

export function formatPriority(priority: number): string {
  return isPriority(priority) ? `${priority} (${PRIORITY_LABELS[priority]})` : String(priority);
}

/**
 * Plain-text table rows: header, separator, one row per task (1-based index)
 */
export function formatTaskRows(tasks: readonly Task[]): string[] {
  const rows: string[][] = tasks.map((task, i) => [
    String(i + 1),
    task.name,
    toCanonicalString(task.time),
    formatPriority(task.priority),
  ]);

  const widths = HEADERS.map((header, col) =>
    Math.max(header.length, ...rows.map((row) => row[col]?.length ?? 0))
  );
  const line = (cells: readonly string[]) =>
    cells.map((cell, col) => cell.padEnd(widths[col] ?? 0)).join("  ").trimEnd();

  return [
    line(HEADERS),
    widths.map((w) => "-".repeat(w)).join("  "),
    ...rows.map(line),
  ];
}

/**
 * Titled table, or `emptyMessage` when there are no tasks
 */
export function renderTaskTable(title: string, tasks: readonly Task[], emptyMessage: string): string {
  if (tasks.length === 0) {
    return chalk.bold(emptyMessage);
  }

  const [header = "", separator = "", ...rows] = formatTaskRows(tasks);
  return [
    chalk.bold.magenta.underline(title),
    "",
    chalk.bold(header),
    chalk.dim(separator),
    ...rows,
  ].join("\n");
}

export function renderMenu(options: readonly { key: number; label: string }[]): string {
  return [
    chalk.bold.underline("\nOPTIONS"),
    ...options.map((o) => chalk.magenta(`${o.key}: ${o.label}`)),
  ].join("\n");
}
