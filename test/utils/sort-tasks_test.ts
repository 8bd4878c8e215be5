/**
 * Tests for src/utils/sort-tasks.ts
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import type { Task } from "../../src/types/task.js";
import { compareTasks, sortTasks } from "../../src/utils/sort-tasks.js";
import { localTime } from "../_helpers/mod.js";

const at = (hour: number, name: string, priority: number): Task => ({
  name,
  time: localTime(2024, 5, 1, hour),
  priority,
});

test("sortTasks - orders by time, then priority", () => {
  const tasks = [at(12, "lunch", 2), at(9, "stand-up", 3), at(12, "call", 1), at(9, "email", 1)];
  assert.deepEqual(sortTasks(tasks).map((t) => t.name), ["email", "stand-up", "call", "lunch"]);
});

test("sortTasks - equal keys keep their input order", () => {
  const tasks = [at(9, "first", 2), at(9, "second", 2), at(9, "third", 2)];
  assert.deepEqual(sortTasks(tasks).map((t) => t.name), ["first", "second", "third"]);
});

test("sortTasks - sorting twice changes nothing", () => {
  const tasks = [at(15, "c", 1), at(8, "a", 3), at(8, "b", 2), at(15, "d", 1)];
  const once = sortTasks(tasks);
  assert.deepEqual(sortTasks(once), once);
});

test("sortTasks - does not mutate its input", () => {
  const tasks = [at(10, "late", 1), at(9, "early", 1)];
  sortTasks(tasks);
  assert.deepEqual(tasks.map((t) => t.name), ["late", "early"]);
});

test("compareTasks - priority breaks time ties", () => {
  assert.ok(compareTasks(at(9, "a", 1), at(9, "b", 3)) < 0);
  assert.ok(compareTasks(at(10, "a", 1), at(9, "b", 3)) > 0);
  assert.equal(compareTasks(at(9, "a", 2), at(9, "b", 2)), 0);
});
