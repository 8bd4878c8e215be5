/**
 * Tests for the notification transports
 */

import assert from "node:assert/strict";
import { test } from "node:test";
import nodemailer from "nodemailer";
import {
  createNotifier,
  deliver,
  MultiNotifier,
  PUSHBULLET_PUSHES_URL,
  PushbulletNotifier,
  SMTPNotifier,
  UnconfiguredNotifier,
} from "../../../src/services/notifier/mod.js";
import type { Notifier, SMTPConfig } from "../../../src/types/notifier.js";
import { createTestLogger, RecordingNotifier } from "../../_helpers/mod.js";
import { errorResponse, jsonResponse, mockFetch, type RecordedRequest } from "../../_mocks/mod.js";

const SMTP: SMTPConfig = {
  host: "smtp.example.test",
  port: 587,
  secure: false,
  user: "mailer",
  pass: "test-secret",
  from: "tickler@example.test",
  recipients: ["a@example.test", "b@example.test"],
};

// =============================================================================
// Pushbullet
// =============================================================================

test("PushbulletNotifier - posts a note with the access token", async () => {
  const requests: RecordedRequest[] = [];
  const restore = mockFetch(() => jsonResponse({ active: true }), requests);
  try {
    const result = await new PushbulletNotifier("test-token").notify("Tickler", "Task Due\nTask: stand-up");

    assert.deepEqual(result, { success: true });
    assert.equal(requests.length, 1);
    const [request] = requests;
    assert.equal(request?.url, PUSHBULLET_PUSHES_URL);
    assert.equal(request?.init?.method, "POST");
    assert.deepEqual(request?.init?.headers, {
      "Access-Token": "test-token",
      "Content-Type": "application/json",
    });
    assert.equal(
      request?.init?.body,
      JSON.stringify({ type: "note", title: "Tickler", body: "Task Due\nTask: stand-up" }),
    );
  } finally {
    restore();
  }
});

test("PushbulletNotifier - reports the API error message", async () => {
  const restore = mockFetch(() => errorResponse("Access token is missing or invalid.", 401));
  try {
    const result = await new PushbulletNotifier("test-token").notify("Tickler", "body");
    assert.deepEqual(result, {
      success: false,
      error: "Pushbullet responded 401: Access token is missing or invalid.",
    });
  } finally {
    restore();
  }
});

test("PushbulletNotifier - non-JSON error bodies are quoted as text", async () => {
  const restore = mockFetch(() => new Response("rate limited", { status: 429 }));
  try {
    const result = await new PushbulletNotifier("test-token").notify("Tickler", "body");
    assert.equal(result.error, "Pushbullet responded 429: rate limited");
  } finally {
    restore();
  }
});

test("PushbulletNotifier - network failures become results", async () => {
  const restore = mockFetch(() => {
    throw new Error("getaddrinfo ENOTFOUND api.pushbullet.com");
  });
  try {
    const result = await new PushbulletNotifier("test-token").notify("Tickler", "body");
    assert.deepEqual(result, { success: false, error: "getaddrinfo ENOTFOUND api.pushbullet.com" });
  } finally {
    restore();
  }
});

test("PushbulletNotifier - without a token nothing is sent", async () => {
  const requests: RecordedRequest[] = [];
  const restore = mockFetch(() => jsonResponse({}), requests);
  try {
    const result = await new PushbulletNotifier(undefined).notify("Tickler", "body");
    assert.deepEqual(result, { success: false, error: "Pushbullet access token not configured" });
    assert.equal(requests.length, 0);
  } finally {
    restore();
  }
});

// =============================================================================
// SMTP
// =============================================================================

test("SMTPNotifier - mails every recipient with the title as subject", async () => {
  const transporter = nodemailer.createTransport({ jsonTransport: true });
  const sent: Array<Record<string, unknown>> = [];
  transporter.use("compile", (mail, done) => {
    sent.push({ from: mail.data.from, to: mail.data.to, subject: mail.data.subject, text: mail.data.text });
    done();
  });

  const result = await new SMTPNotifier(SMTP, transporter).notify("Tickler", "Task Due\nTask: stand-up");

  assert.deepEqual(result, { success: true });
  assert.deepEqual(sent, [{
    from: "tickler@example.test",
    to: "a@example.test, b@example.test",
    subject: "Tickler",
    text: "Task Due\nTask: stand-up",
  }]);
});

test("SMTPNotifier - send failures become results", async () => {
  const transporter = nodemailer.createTransport({ jsonTransport: true });
  transporter.use("compile", (_mail, done) => done(new Error("relay refused")));

  const result = await new SMTPNotifier(SMTP, transporter).notify("Tickler", "body");
  assert.deepEqual(result, { success: false, error: "relay refused" });
});

test("SMTPNotifier - close releases the transporter", () => {
  const transporter = nodemailer.createTransport({ jsonTransport: true });
  let closed = 0;
  transporter.close = () => {
    closed++;
  };

  new SMTPNotifier(SMTP, transporter).close();
  assert.equal(closed, 1);
});

// =============================================================================
// Composition
// =============================================================================

test("MultiNotifier - succeeds when any transport does", async () => {
  const ok = new RecordingNotifier();
  const down = new RecordingNotifier("offline");
  const result = await new MultiNotifier([down, ok]).notify("Tickler", "hello");

  assert.deepEqual(result, { success: true });
  assert.deepEqual(ok.bodies, ["hello"]);
  assert.deepEqual(down.bodies, ["hello"]);
});

test("MultiNotifier - joins every error when all fail", async () => {
  const result = await new MultiNotifier([new RecordingNotifier("offline"), new UnconfiguredNotifier()])
    .notify("Tickler", "hello");
  assert.deepEqual(result, {
    success: false,
    error: "recording: offline; none: No notification transport configured",
  });
});

test("MultiNotifier - close reaches every transport", () => {
  const first = new RecordingNotifier();
  const second = new RecordingNotifier();
  new MultiNotifier([first, new UnconfiguredNotifier(), second]).close();

  assert.equal(first.closed, true);
  assert.equal(second.closed, true);
});

test("createNotifier - picks transports from config", () => {
  assert.equal(createNotifier({}).name, "none");
  assert.equal(createNotifier({ pushbulletToken: "test-token" }).name, "pushbullet");
  assert.equal(createNotifier({ smtp: SMTP }).name, "smtp");
  assert.equal(createNotifier({ pushbulletToken: "test-token", smtp: SMTP }).name, "pushbullet+smtp");
});

test("deliver - failures are logged, never thrown", async () => {
  const logger = createTestLogger();
  const throwing: Notifier = {
    name: "broken",
    notify: () => Promise.reject(new Error("boom")),
  };

  assert.equal(await deliver(new RecordingNotifier(), logger, "Tickler", "ok"), true);
  assert.equal(await deliver(new RecordingNotifier("offline"), logger, "Tickler", "lost"), false);
  assert.equal(await deliver(throwing, logger, "Tickler", "lost"), false);

  assert.deepEqual(logger.query({ level: "warn" }).map((e) => [e.message, e.data?.error]), [
    ["notification not delivered", "offline"],
    ["notification transport failed", "boom"],
  ]);
});
