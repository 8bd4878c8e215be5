/**
 * Tests for src/config/config.ts
 */

import assert from "node:assert/strict";
import { join, resolve } from "node:path";
import { test } from "node:test";
import { ConfigError, DEFAULTS, loadConfig, resolveConfigPath } from "../../src/config/config.js";
import { createTempFile, withTempDir } from "../_helpers/mod.js";

async function configIn(dir: string, content: unknown): Promise<string> {
  return await createTempFile(dir, "tickler.config.json", JSON.stringify(content));
}

// =============================================================================
// Defaults and paths
// =============================================================================

test("loadConfig - empty object uses defaults beside the config file", async () => {
  await withTempDir(async (dir) => {
    const path = await configIn(dir, {});
    const config = loadConfig({ config: path }, {});

    assert.equal(config.configPath, path);
    assert.equal(config.tasksFile, join(dir, "tasks.json"));
    assert.equal(config.completedTasksFile, join(dir, "completed_tasks.json"));
    assert.equal(config.passkeyFile, join(dir, "passkey.txt"));
    assert.equal(config.pidFile, join(dir, "tickler.pid"));
    assert.equal(config.logFile, join(dir, "tickler.log"));
    assert.equal(config.logLevel, "info");
    assert.deepEqual(config.scan, {
      checkFrequencySeconds: DEFAULTS.checkFrequencySeconds,
      dueSoonThresholdSeconds: DEFAULTS.dueSoonThresholdSeconds,
      commandTimeoutSeconds: DEFAULTS.commandTimeoutSeconds,
    });
    assert.equal(config.pushbulletToken, undefined);
    assert.equal(config.smtp, undefined);
    assert.equal(config.verbose, false);
    assert.deepEqual(config.warnings, []);
  });
});

test("loadConfig - reads every section", async () => {
  await withTempDir(async (dir) => {
    const path = await configIn(dir, {
      logs: { logFile: "logs/app.log", level: "debug" },
      paths: { tasksFile: "data/pending.json", completedTasksFile: "/var/tmp/done.json" },
      notification: { checkFrequencySeconds: 5, dueSoonThresholdSeconds: 30, commandTimeoutSeconds: 10 },
      pushbullet: { accessToken: "test-token" },
      smtp: {
        host: "smtp.example.test",
        port: 465,
        secure: true,
        user: "mailer",
        pass: "test-secret",
        from: "tickler@example.test",
        recipients: ["me@example.test"],
      },
    });
    const config = loadConfig({ config: path, verbose: true }, {});

    assert.equal(config.logFile, join(dir, "logs", "app.log"));
    assert.equal(config.logLevel, "debug");
    assert.equal(config.tasksFile, join(dir, "data", "pending.json"));
    assert.equal(config.completedTasksFile, "/var/tmp/done.json");
    assert.deepEqual(config.scan, {
      checkFrequencySeconds: 5,
      dueSoonThresholdSeconds: 30,
      commandTimeoutSeconds: 10,
    });
    assert.equal(config.pushbulletToken, "test-token");
    assert.deepEqual(config.smtp, {
      host: "smtp.example.test",
      port: 465,
      secure: true,
      user: "mailer",
      pass: "test-secret",
      from: "tickler@example.test",
      recipients: ["me@example.test"],
    });
    assert.equal(config.verbose, true);
  });
});

// =============================================================================
// Fallbacks
// =============================================================================

test("loadConfig - invalid fields fall back with a warning", async () => {
  await withTempDir(async (dir) => {
    const path = await configIn(dir, {
      logs: { level: "loud" },
      notification: { checkFrequencySeconds: "fast", dueSoonThresholdSeconds: -1 },
    });
    const config = loadConfig({ config: path }, {});

    assert.equal(config.logLevel, "info");
    assert.equal(config.scan.checkFrequencySeconds, 20);
    assert.equal(config.scan.dueSoonThresholdSeconds, 60);
    assert.equal(config.warnings.length, 3);
    assert.ok(config.warnings[0]?.startsWith("logs.level: "));
    assert.ok(config.warnings[1]?.startsWith("notification.checkFrequencySeconds: "));
    assert.ok(config.warnings[1]?.endsWith("; using default 20"));
    assert.ok(config.warnings[2]?.endsWith("; using default 60"));
  });
});

test("loadConfig - a section that is not an object uses defaults", async () => {
  await withTempDir(async (dir) => {
    const path = await configIn(dir, { paths: "elsewhere" });
    const config = loadConfig({ config: path }, {});

    assert.equal(config.tasksFile, join(dir, "tasks.json"));
    assert.deepEqual(config.warnings, ["paths: expected an object; using defaults"]);
  });
});

test("loadConfig - SMTP stays off without recipients", async () => {
  await withTempDir(async (dir) => {
    const path = await configIn(dir, { smtp: { host: "smtp.example.test", from: "a@example.test" } });
    assert.equal(loadConfig({ config: path }, {}).smtp, undefined);
  });
});

// =============================================================================
// Environment
// =============================================================================

test("loadConfig - environment overrides credentials and log level", async () => {
  await withTempDir(async (dir) => {
    const path = await configIn(dir, {
      logs: { level: "warn" },
      pushbullet: { accessToken: "from-file" },
      smtp: { host: "smtp.example.test", from: "a@example.test", recipients: ["b@example.test"], pass: "from-file" },
    });
    const config = loadConfig({ config: path }, {
      TICKLER_LOG_LEVEL: "error",
      TICKLER_PUSHBULLET_TOKEN: "test-token",
      TICKLER_SMTP_PASS: "test-secret",
    });

    assert.equal(config.logLevel, "error");
    assert.equal(config.pushbulletToken, "test-token");
    assert.equal(config.smtp?.pass, "test-secret");
  });
});

test("loadConfig - invalid TICKLER_LOG_LEVEL is ignored", async () => {
  await withTempDir(async (dir) => {
    const path = await configIn(dir, { logs: { level: "warn" } });
    assert.equal(loadConfig({ config: path }, { TICKLER_LOG_LEVEL: "chatty" }).logLevel, "warn");
  });
});

test("resolveConfigPath - CLI option, then TICKLER_CONFIG, then the default", () => {
  assert.equal(resolveConfigPath({ config: "a.json" }, { TICKLER_CONFIG: "b.json" }), resolve("a.json"));
  assert.equal(resolveConfigPath({}, { TICKLER_CONFIG: "b.json" }), resolve("b.json"));
  assert.equal(resolveConfigPath({}, {}), resolve("tickler.config.json"));
});

// =============================================================================
// Fatal errors
// =============================================================================

test("loadConfig - missing file is a ConfigError", async () => {
  await withTempDir(async (dir) => {
    const path = join(dir, "absent.json");
    assert.throws(() => loadConfig({ config: path }, {}), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.equal(error.path, path);
      assert.ok(error.message.startsWith(`Cannot read config file ${path}`));
      return true;
    });
  });
});

test("loadConfig - malformed JSON and non-object roots are ConfigErrors", async () => {
  await withTempDir(async (dir) => {
    const malformed = await createTempFile(dir, "bad.json", "{ not json");
    const list = await createTempFile(dir, "list.json", "[]");

    assert.throws(() => loadConfig({ config: malformed }, {}), ConfigError);
    assert.throws(() => loadConfig({ config: list }, {}), {
      name: "ConfigError",
      message: `Config file ${list} must contain a JSON object`,
    });
  });
});
