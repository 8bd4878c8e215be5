/**
 * Tests for due-task classification and notification texts
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import {
  classifyTask,
  commandResultMessage,
  dueMessage,
  dueSoonMessage,
  dueSoonWindow,
} from "../../../src/services/scanner/mod.js";
import type { Task } from "../../../src/types/task.js";
import { localTime } from "../../_helpers/mod.js";

const NOW = localTime(2024, 5, 1, 10, 0, 0);
const SETTINGS = { checkFrequencySeconds: 20, dueSoonThresholdSeconds: 60 };

const inSeconds = (seconds: number, name = "task"): Task => ({
  name,
  time: new Date(NOW.getTime() + seconds * 1000),
  priority: 2,
});

test("dueSoonWindow - one check period ending at the threshold", () => {
  assert.deepEqual(dueSoonWindow(SETTINGS), { lower: 40, upper: 60 });
});

test("classifyTask - inside the window is due soon, not due", () => {
  assert.deepEqual(classifyTask(inSeconds(50), NOW, SETTINGS), {
    deltaSeconds: 50,
    dueSoon: true,
    dueNow: false,
  });
});

test("classifyTask - window is open below and closed above", () => {
  assert.equal(classifyTask(inSeconds(60), NOW, SETTINGS).dueSoon, true);
  assert.equal(classifyTask(inSeconds(40), NOW, SETTINGS).dueSoon, false);
  assert.equal(classifyTask(inSeconds(30), NOW, SETTINGS).dueSoon, false);
  assert.equal(classifyTask(inSeconds(61), NOW, SETTINGS).dueSoon, false);
});

test("classifyTask - due at or after its time", () => {
  assert.equal(classifyTask(inSeconds(0), NOW, SETTINGS).dueNow, true);
  assert.equal(classifyTask(inSeconds(-3600), NOW, SETTINGS).dueNow, true);
  assert.equal(classifyTask(inSeconds(1), NOW, SETTINGS).dueNow, false);
});

test("classifyTask - a window reaching past zero flags both", () => {
  const wide = { checkFrequencySeconds: 90, dueSoonThresholdSeconds: 60 };
  assert.deepEqual(classifyTask(inSeconds(-10), NOW, wide), {
    deltaSeconds: -10,
    dueSoon: true,
    dueNow: true,
  });
});

test("dueSoonMessage - rounds the remaining seconds up", () => {
  assert.equal(dueSoonMessage(inSeconds(0, "stand-up"), 42.3), "Task Due Soon\nTask: stand-up due in 43 seconds");
});

test("dueMessage - name, canonical time and priority", () => {
  const task: Task = { name: "stand-up", time: localTime(2024, 5, 1, 9, 30), priority: 1 };
  assert.equal(dueMessage(task), "Task Due\nTask: stand-up\nTime: 2024-05-01 09:30:00\nPriority: 1");
});

test("commandResultMessage - both streams verbatim", () => {
  const message = commandResultMessage("echo hi", {
    stdout: "hi\n",
    stderr: "",
    exitCode: 0,
    timedOut: false,
    durationMs: 5,
  });
  assert.equal(message, "Command Execution Result\nCommand: echo hi\nOutput: hi\n\nError: ");
});
