/**
 * Editor session - the in-memory copy of the pending tasks.
 *
 * The editor reloads from disk at the start of each menu operation and
 * writes the whole list back after every mutation.
 */

import type { HistoryStore, TaskStore } from "../services/store/mod.js";
import type { SaveResult, Task } from "../types/task.js";
import { sortTasks } from "../utils/sort-tasks.js";

/** A task picked by 1-based index or by exact name */
export type TaskSelection =
  | { kind: "index"; task: Task }
  | { kind: "name"; name: string; task: Task };

export type SelectionResult =
  | { ok: true; selection: TaskSelection }
  | { ok: false; reason: string };

export class EditorSession {
  private tasks: Task[] = [];
  private unreadable: unknown[] = [];

  constructor(
    private readonly store: TaskStore,
    private readonly history: HistoryStore,
  ) {}

  /** Pending tasks, sorted by (time, priority) */
  get list(): readonly Task[] {
    return this.tasks;
  }

  get isEmpty(): boolean {
    return this.tasks.length === 0;
  }

  async refresh(): Promise<void> {
    const document = await this.store.load();
    this.tasks = document.tasks;
    this.unreadable = document.unreadable;
  }

  add(task: Task): void {
    this.tasks = sortTasks([...this.tasks, task]);
  }

  /** Remove one specific task */
  remove(task: Task): void {
    this.tasks = this.tasks.filter((t) => t !== task);
  }

  /**
   * Remove every task with this exact name
   * @returns how many were removed
   */
  removeByName(name: string): number {
    const before = this.tasks.length;
    this.tasks = this.tasks.filter((t) => t.name !== name);
    return before - this.tasks.length;
  }

  /** The pending task equal to `task` by name, time and priority */
  findSame(task: Task): Task | undefined {
    return this.tasks.find((t) =>
      t.name === task.name && t.time.getTime() === task.time.getTime() && t.priority === task.priority
    );
  }

  replace(previous: Task, next: Task): void {
    this.tasks = sortTasks(this.tasks.map((t) => (t === previous ? next : t)));
  }

  /**
   * Resolve user input: all digits means a 1-based index into the sorted
   * list, anything else an exact task name (first match).
   */
  select(input: string): SelectionResult {
    const value = input.trim();
    if (/^\d+$/.test(value)) {
      const task = this.tasks[Number(value) - 1];
      return task
        ? { ok: true, selection: { kind: "index", task } }
        : { ok: false, reason: "Invalid index. Please enter a valid index." };
    }

    const task = this.tasks.find((t) => t.name === value);
    return task
      ? { ok: true, selection: { kind: "name", name: value, task } }
      : { ok: false, reason: "Invalid input. Please enter a valid index or task name." };
  }

  /** Sort, then write tasks and unreadable entries back */
  persist(): Promise<SaveResult> {
    this.tasks = sortTasks(this.tasks);
    return this.store.save(this.tasks, this.unreadable);
  }

  async loadHistory(): Promise<Task[]> {
    const { tasks } = await this.history.load();
    return sortTasks(tasks);
  }
}
