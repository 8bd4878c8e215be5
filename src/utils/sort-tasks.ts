import type { Task } from "../types/task.js";

/**
 * Compare by time ascending, then priority ascending
 */
export function compareTasks(a: Task, b: Task): number {
  const byTime = a.time.getTime() - b.time.getTime();
  if (byTime !== 0) return byTime;
  return a.priority - b.priority;
}

/**
 * Return a sorted copy of `tasks`. Array.prototype.sort is stable, so
 * re-sorting an already sorted list leaves it unchanged.
 */
export function sortTasks(tasks: readonly Task[]): Task[] {
  return [...tasks].sort(compareTasks);
}
