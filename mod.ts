#!/usr/bin/env node
/**
 * tickler - terminal reminders with a background notifier
 *
 * Usage:
 *   tickler [options]                 open the passkey-gated task editor
 *   tickler daemon run                run the scanner in the foreground
 *   tickler daemon start|stop|restart|status  manage the background daemon
 *   tickler scan                      run one scan cycle and exit
 *
 * Options:
 *   -c, --config <path>  Config file (default ./tickler.config.json, or TICKLER_CONFIG)
 *   -v, --verbose        Debug logging, echoed to stderr
 *   -h, --help           Show this help
 *   -V, --version        Show version
 */

import chalk from "chalk";
import { Command } from "commander";
import { type CLIOptions, ConfigError, loadConfig } from "./src/config/config.js";
import { DaemonLifecycle, runDaemon } from "./src/services/daemon/mod.js";
import { cleanupServices, createScanner, initializeServices, type Services } from "./src/services/mod.js";
import { EditorExitError, runEditor } from "./src/ui/editor.js";
import { InquirerPrompter, isPromptExit } from "./src/ui/prompter.js";
import { EditorSession } from "./src/ui/session.js";

const VERSION = "0.1.0";

const program = new Command()
  .name("tickler")
  .version(VERSION)
  .description("Schedule reminders and shell commands; get notified when they are due")
  .option("-c, --config <path>", "Config file path")
  .option("-v, --verbose", "Debug logging, echoed to stderr");

function globalOptions(): CLIOptions {
  const { config, verbose } = program.opts();
  return {
    config: typeof config === "string" ? config : undefined,
    verbose: verbose === true,
  };
}

/**
 * Load config and services, run `action`, flush the log.
 * Config errors and editor exits become the process exit code.
 */
async function withServices(action: (services: Services) => Promise<number | void>): Promise<void> {
  const options = globalOptions();
  let services: Services;
  try {
    services = initializeServices(loadConfig(options));
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(error.message));
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  try {
    const code = await action(services);
    if (typeof code === "number") process.exitCode = code;
  } catch (error) {
    if (error instanceof EditorExitError) {
      process.exitCode = error.exitCode;
    } else if (isPromptExit(error)) {
      console.log(chalk.dim("\nProgram interrupted. Exiting..."));
    } else {
      const message = error instanceof Error ? error.message : String(error);
      services.logger.error("command failed", { error: message });
      console.error(chalk.red(`Error: ${message}`));
      process.exitCode = 1;
    }
  } finally {
    await cleanupServices(services);
  }
}

function lifecycleFor(services: Services): DaemonLifecycle {
  return new DaemonLifecycle({
    pidFile: services.config.pidFile,
    configPath: services.config.configPath,
  });
}

program.action(() =>
  withServices((services) =>
    runEditor({
      session: new EditorSession(services.store, services.history),
      passkeys: services.passkeys,
      notifier: services.notifier,
      logger: services.logger.child("editor"),
      prompter: new InquirerPrompter(),
      print: (text) => console.log(text),
      now: () => new Date(),
    })
  )
);

const daemon = program.command("daemon").description("Background notifier");

daemon
  .command("run")
  .description("Run the scanner in the foreground until SIGINT/SIGTERM")
  .action(() =>
    withServices((services) =>
      runDaemon(services, { reload: () => loadConfig(globalOptions()) })
    )
  );

daemon
  .command("start")
  .description("Start the daemon in the background")
  .action(() =>
    withServices(async (services) => {
      const lifecycle = lifecycleFor(services);
      const running = await lifecycle.runningPid();
      if (running !== null) {
        console.log(chalk.yellow(`Daemon already running (pid ${running})`));
        return;
      }
      const pid = await lifecycle.start();
      console.log(chalk.green(`Daemon started (pid ${pid})`));
    })
  );

daemon
  .command("stop")
  .description("Stop the background daemon")
  .action(() =>
    withServices(async (services) => {
      const stopped = await lifecycleFor(services).stop();
      console.log(stopped ? chalk.green("Daemon stopped") : chalk.dim("Daemon is not running"));
    })
  );

daemon
  .command("restart")
  .description("Stop the background daemon, then start it again")
  .action(() =>
    withServices(async (services) => {
      const pid = await lifecycleFor(services).restart();
      console.log(chalk.green(`Daemon restarted (pid ${pid})`));
    })
  );

daemon
  .command("status")
  .description("Show whether the daemon is running")
  .action(() =>
    withServices(async (services) => {
      const pid = await lifecycleFor(services).runningPid();
      console.log(pid === null ? "Daemon is not running" : `Daemon running (pid ${pid})`);
      return pid === null ? 3 : 0;
    })
  );

program
  .command("scan")
  .description("Run one scan cycle and exit")
  .action(() =>
    withServices(async (services) => {
      const report = await createScanner(services).scanOnce();
      console.log(
        `Scanned ${report.scanned} task(s): ${report.fired.length} due, ` +
          `${report.dueSoon.length} due soon, ${report.failed.length} failed`,
      );
      const saved = report.fired.length === 0 || (report.pendingSaved && report.historySaved);
      return saved ? 0 : 1;
    })
  );

await program.parseAsync(process.argv);
