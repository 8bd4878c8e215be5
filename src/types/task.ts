/**
 * Task types shared by the editor, the store and the scanner
 */

/** 1 = High, 2 = Medium, 3 = Low */
export type Priority = 1 | 2 | 3;

export const PRIORITY_LABELS: Record<Priority, string> = {
  1: "High",
  2: "Medium",
  3: "Low",
};

/**
 * A pending reminder as held in memory.
 * `priority` is whatever number was stored; only the editor restricts it to 1..3.
 */
export interface Task {
  name: string;
  time: Date;
  priority: number;
}

/**
 * Persisted form of a task.
 * `time` is always `YYYY-MM-DD HH:MM:SS` in local wall-clock time.
 */
export interface StoredTask {
  name: string;
  time: string;
  priority: number;
}

/**
 * Result of loading a task document.
 * Entries that could not be decoded are kept verbatim so a later save
 * writes them back instead of dropping them.
 */
export interface TaskDocument {
  tasks: Task[];
  unreadable: unknown[];
}

export interface SaveResult {
  success: boolean;
  error?: string;
}

export function isPriority(value: number): value is Priority {
  return value === 1 || value === 2 || value === 3;
}
