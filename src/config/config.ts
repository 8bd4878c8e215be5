/**
 * Configuration management for tickler
 *
 * One JSON file, loaded once at startup and passed down to the
 * components that need it. Environment variables override credentials
 * and the log level; CLI options override the config location.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import type { LogLevel } from "../types/logger.js";
import type { SMTPConfig } from "../types/notifier.js";
import type { ScanSettings } from "../types/scanner.js";

export const DEFAULT_CONFIG_FILE = "tickler.config.json";

export const DEFAULTS = {
  logFile: "tickler.log",
  logLevel: "info" as LogLevel,
  tasksFile: "tasks.json",
  completedTasksFile: "completed_tasks.json",
  passkeyFile: "passkey.txt",
  pidFile: "tickler.pid",
  checkFrequencySeconds: 20,
  dueSoonThresholdSeconds: 60,
  commandTimeoutSeconds: 300,
  smtpPort: 587,
};

export interface Config {
  /** Absolute path of the file this config was read from */
  configPath: string;
  logFile: string;
  logLevel: LogLevel;
  tasksFile: string;
  completedTasksFile: string;
  passkeyFile: string;
  pidFile: string;
  scan: ScanSettings;
  pushbulletToken?: string;
  smtp?: SMTPConfig;
  verbose: boolean;
  /** Fields that were present but invalid and fell back to defaults */
  warnings: string[];
}

export interface CLIOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Raised when the config file is missing or is not a JSON object.
 * Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(message: string, readonly path: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);
const pathSchema = z.string().trim().min(1);
const secondsSchema = z.number().int().positive();
const secretSchema = z.string().trim();

type Section = Record<string, unknown>;

/**
 * Resolve the config file location: CLI > TICKLER_CONFIG > ./tickler.config.json
 */
export function resolveConfigPath(
  options: CLIOptions,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return resolve(options.config || env.TICKLER_CONFIG || DEFAULT_CONFIG_FILE);
}

/**
 * Load configuration from the config file, environment and CLI options.
 * @throws ConfigError when the file is missing or unreadable as a JSON object
 */
export function loadConfig(
  options: CLIOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): Config {
  const configPath = resolveConfigPath(options, env);

  let text: string;
  try {
    text = readFileSync(configPath, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Cannot read config file ${configPath}: ${reason}`, configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${reason}`, configPath);
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`, configPath);
  }

  const warnings: string[] = [];
  const baseDir = dirname(configPath);
  const logs = section(raw, "logs", warnings);
  const paths = section(raw, "paths", warnings);
  const notification = section(raw, "notification", warnings);
  const pushbullet = section(raw, "pushbullet", warnings);

  const read = <T>(
    source: Section,
    path: string,
    key: string,
    schema: z.ZodType<T>,
    fallback: T,
  ): T => pick(source, `${path}.${key}`, key, schema, fallback, warnings);

  const envLevel = logLevelSchema.safeParse(env.TICKLER_LOG_LEVEL);

  const pushbulletToken = env.TICKLER_PUSHBULLET_TOKEN ||
    read(pushbullet, "pushbullet", "accessToken", secretSchema, "");

  return {
    configPath,
    logFile: resolve(baseDir, read(logs, "logs", "logFile", pathSchema, DEFAULTS.logFile)),
    logLevel: envLevel.success
      ? envLevel.data
      : read(logs, "logs", "level", logLevelSchema, DEFAULTS.logLevel),
    tasksFile: resolve(baseDir, read(paths, "paths", "tasksFile", pathSchema, DEFAULTS.tasksFile)),
    completedTasksFile: resolve(
      baseDir,
      read(paths, "paths", "completedTasksFile", pathSchema, DEFAULTS.completedTasksFile),
    ),
    passkeyFile: resolve(
      baseDir,
      read(paths, "paths", "passkeyFile", pathSchema, DEFAULTS.passkeyFile),
    ),
    pidFile: resolve(baseDir, read(paths, "paths", "pidFile", pathSchema, DEFAULTS.pidFile)),
    scan: {
      checkFrequencySeconds: read(
        notification,
        "notification",
        "checkFrequencySeconds",
        secondsSchema,
        DEFAULTS.checkFrequencySeconds,
      ),
      dueSoonThresholdSeconds: read(
        notification,
        "notification",
        "dueSoonThresholdSeconds",
        secondsSchema,
        DEFAULTS.dueSoonThresholdSeconds,
      ),
      commandTimeoutSeconds: read(
        notification,
        "notification",
        "commandTimeoutSeconds",
        secondsSchema,
        DEFAULTS.commandTimeoutSeconds,
      ),
    },
    pushbulletToken: pushbulletToken || undefined,
    smtp: loadSMTPConfig(section(raw, "smtp", warnings), env, warnings),
    verbose: options.verbose ?? false,
    warnings,
  };
}

/**
 * SMTP is enabled only when host, sender and at least one recipient are set
 */
function loadSMTPConfig(
  smtp: Section,
  env: NodeJS.ProcessEnv,
  warnings: string[],
): SMTPConfig | undefined {
  const host = pick(smtp, "smtp.host", "host", secretSchema, "", warnings);
  const from = pick(smtp, "smtp.from", "from", secretSchema, "", warnings);
  const recipients = pick(
    smtp,
    "smtp.recipients",
    "recipients",
    z.array(z.string().trim().min(1)),
    [],
    warnings,
  );
  if (!host || !from || recipients.length === 0) {
    return undefined;
  }

  return {
    host,
    from,
    recipients,
    port: pick(smtp, "smtp.port", "port", secondsSchema, DEFAULTS.smtpPort, warnings),
    secure: pick(smtp, "smtp.secure", "secure", z.boolean(), false, warnings),
    user: pick(smtp, "smtp.user", "user", secretSchema, "", warnings),
    pass: env.TICKLER_SMTP_PASS || pick(smtp, "smtp.pass", "pass", z.string(), "", warnings),
  };
}

/**
 * Read one field, falling back to its default when absent or invalid
 */
function pick<T>(
  source: Section,
  path: string,
  key: string,
  schema: z.ZodType<T>,
  fallback: T,
  warnings: string[],
): T {
  const value = source[key];
  if (value === undefined) return fallback;

  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0]?.message ?? "invalid value";
  warnings.push(`${path}: ${issue}; using default ${JSON.stringify(fallback)}`);
  return fallback;
}

function section(raw: Section, name: string, warnings: string[]): Section {
  const value = raw[name];
  if (value === undefined) return {};
  if (isRecord(value)) return value;
  warnings.push(`${name}: expected an object; using defaults`);
  return {};
}

function isRecord(value: unknown): value is Section {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
