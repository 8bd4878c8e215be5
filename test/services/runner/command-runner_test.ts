/**
 * Tests for the task command runner
 */

import assert from "node:assert/strict";
import { stat } from "node:fs/promises";
import { join } from "node:path";
import { test } from "node:test";
import { extractCommand, runCommand } from "../../../src/services/runner/mod.js";
import { withTempDir } from "../../_helpers/mod.js";

// =============================================================================
// extractCommand
// =============================================================================

test("extractCommand - short and long prefixes", () => {
  assert.equal(extractCommand("-e echo hi"), "echo hi");
  assert.equal(extractCommand("--execute   backup.sh --full"), "backup.sh --full");
});

test("extractCommand - plain names and bare prefixes embed nothing", () => {
  assert.equal(extractCommand("Call the dentist"), null);
  assert.equal(extractCommand("-e"), null);
  assert.equal(extractCommand("-e "), null);
  assert.equal(extractCommand("-exec ls"), null);
  assert.equal(extractCommand(" -e ls"), null);
});

// =============================================================================
// runCommand
// =============================================================================

test("runCommand - captures stdout and the exit code", async () => {
  const result = await runCommand("echo hello");
  assert.equal(result.stdout, "hello\n");
  assert.equal(result.stderr, "");
  assert.equal(result.exitCode, 0);
  assert.equal(result.timedOut, false);
});

test("runCommand - captures stderr and a failing exit code", async () => {
  const result = await runCommand("echo oops 1>&2; exit 3");
  assert.equal(result.stdout, "");
  assert.equal(result.stderr, "oops\n");
  assert.equal(result.exitCode, 3);
});

test("runCommand - runs in the given directory", async () => {
  await withTempDir(async (dir) => {
    const result = await runCommand("pwd", { cwd: dir });
    assert.ok(result.stdout.trim().endsWith(dir.split("/").pop() ?? dir));
  });
});

test("runCommand - kills a command that outlives its timeout", async () => {
  const result = await runCommand("exec sleep 5", { timeoutMs: 1000 });
  assert.equal(result.timedOut, true);
  assert.equal(result.exitCode, -1);
  assert.equal(result.stderr, "Command timed out after 1 seconds");
  assert.ok(result.durationMs < 5000);
});

test("runCommand - a timeout kills commands the shell forked", async () => {
  const result = await runCommand("sleep 5; echo done", { timeoutMs: 500 });
  assert.equal(result.timedOut, true);
  assert.equal(result.stdout, "");
  assert.equal(result.stderr, "Command timed out after 500 ms");
  assert.ok(result.durationMs < 2000);
});

test("runCommand - abort stops a running pipeline", async () => {
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 200);
  const result = await runCommand("sleep 5 | cat; echo done", { signal: controller.signal });
  assert.equal(result.timedOut, false);
  assert.equal(result.exitCode, -1);
  assert.equal(result.stdout, "");
  assert.equal(result.stderr, "Command stopped before it finished");
  assert.ok(result.durationMs < 2000);
});

test("runCommand - an already aborted signal runs nothing", async () => {
  await withTempDir(async (dir) => {
    const controller = new AbortController();
    controller.abort();
    const result = await runCommand("touch marker", { cwd: dir, signal: controller.signal });
    assert.equal(result.exitCode, -1);
    assert.equal(result.stderr, "Command stopped before it finished");
    await assert.rejects(stat(join(dir, "marker")), { code: "ENOENT" });
  });
});

test("runCommand - an unknown program reports through stderr", async () => {
  const result = await runCommand("definitely-not-a-real-program-xyz");
  assert.equal(result.exitCode, 127);
  assert.match(result.stderr, /not found/);
});
