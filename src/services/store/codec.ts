/**
 * Conversion between in-memory tasks and their stored JSON form.
 */

import { z } from "zod";
import type { StoredTask, Task } from "../../types/task.js";
import { parseCanonical, toCanonicalString } from "../../utils/time.js";

const prioritySchema = z.union([
  z.number().finite(),
  z.string().trim().regex(/^-?\d+$/).transform((value) => parseInt(value, 10)),
]);

export const StoredTaskSchema = z.object({
  name: z.string(),
  time: z.string(),
  priority: prioritySchema,
});

export type DecodeResult =
  | { ok: true; task: Task }
  | { ok: false; reason: string };

export function encodeTask(task: Task): StoredTask {
  return {
    name: task.name,
    time: toCanonicalString(task.time),
    priority: task.priority,
  };
}

/**
 * Decode one stored entry. The time must be in the canonical format.
 */
export function decodeTask(raw: unknown): DecodeResult {
  const parsed = StoredTaskSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "entry";
    return { ok: false, reason: `${where}: ${issue?.message ?? "invalid"}` };
  }

  const time = parseCanonical(parsed.data.time);
  if (!time) {
    return {
      ok: false,
      reason: `time: "${parsed.data.time}" is not YYYY-MM-DD HH:MM:SS`,
    };
  }

  return {
    ok: true,
    task: { name: parsed.data.name, time, priority: parsed.data.priority },
  };
}
