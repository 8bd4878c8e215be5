/**
 * Task store - the pending-task document and the history document.
 *
 * Both are whole-file JSON arrays of `{ name, time, priority }`. There is
 * no cross-process lock: every change is a full read-modify-write, so the
 * editor and the daemon can overwrite each other's concurrent edits.
 */

import type { Logger } from "../../types/logger.js";
import type { SaveResult, Task, TaskDocument } from "../../types/task.js";
import { sortTasks } from "../../utils/sort-tasks.js";
import { decodeTask, encodeTask } from "./codec.js";
import { readDocument, writeDocument } from "./json-document.js";

/**
 * Split raw entries into decoded tasks and entries kept verbatim
 */
function decodeDocument(entries: unknown[], path: string, logger?: Logger): TaskDocument {
  const document: TaskDocument = { tasks: [], unreadable: [] };

  entries.forEach((entry, index) => {
    const result = decodeTask(entry);
    if (result.ok) {
      document.tasks.push(result.task);
    } else {
      document.unreadable.push(entry);
      logger?.warn("skipping unreadable task entry", {
        path,
        index,
        reason: result.reason,
      });
    }
  });

  return document;
}

/**
 * Pending tasks
 */
export class TaskStore {
  constructor(readonly path: string, private readonly logger?: Logger) {}

  /**
   * Load pending tasks sorted by (time, priority). Never throws.
   */
  async load(): Promise<TaskDocument> {
    const entries = await readDocument(this.path, this.logger);
    const document = decodeDocument(entries, this.path, this.logger);
    return { tasks: sortTasks(document.tasks), unreadable: document.unreadable };
  }

  /**
   * Overwrite the store with `tasks` (sorted) followed by `unreadable`
   * entries exactly as they were read.
   */
  async save(tasks: readonly Task[], unreadable: readonly unknown[] = []): Promise<SaveResult> {
    const entries = [...sortTasks(tasks).map(encodeTask), ...unreadable];
    const result = await writeDocument(this.path, entries);
    if (!result.success) {
      this.logger?.error("failed to save tasks", { path: this.path, error: result.error });
    }
    return result;
  }
}

/**
 * Completed tasks, in the order they fired
 */
export class HistoryStore {
  constructor(readonly path: string, private readonly logger?: Logger) {}

  async load(): Promise<TaskDocument> {
    const entries = await readDocument(this.path, this.logger);
    return decodeDocument(entries, this.path, this.logger);
  }

  /**
   * Read the existing history, concatenate `entries` and write it back.
   * Not an atomic append: two concurrent appends can lose entries.
   */
  async append(entries: readonly Task[]): Promise<SaveResult> {
    if (entries.length === 0) return { success: true };

    const existing = await readDocument(this.path, this.logger);
    const result = await writeDocument(this.path, [...existing, ...entries.map(encodeTask)]);
    if (!result.success) {
      this.logger?.error("failed to append history", { path: this.path, error: result.error });
    }
    return result;
  }
}
